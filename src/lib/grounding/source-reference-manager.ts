import {
  calculateConfidence,
  enhanceConfidenceWithValidation,
  getConfidenceLevelLabel,
  getConfidenceQualityIndicator,
  validateStepGrounding,
  type ConfidenceLevelLabel,
  type ConfidenceQuality,
  type StepGroundingCheck,
} from "@/lib/grounding/confidence";
import { GroundingSession, type GroundingSettings, type MatchWeights } from "@/lib/grounding/grounding-session";
import { LexicalSimilarityScorer, type SimilarityScorer } from "@/lib/grounding/similarity";
import { assertUnitInterval, assertWeightsSumToOne, ConfigurationError } from "@/lib/pipeline/errors";
import type { Logger, ParsedSentence } from "@/lib/pipeline/types";
import type { SourceReference, StepSourceData } from "@/types/steps";

export type SourceReferenceManagerOptions = {
  weights?: Partial<MatchWeights>;
  similarityScorer?: SimilarityScorer | null;
  minSimilarity?: number;
  minSharedWords?: number;
  maxTranscriptSources?: number;
  reusePenaltyPerUse?: number;
  maxReusePenalty?: number;
  logger?: Logger;
};

export type OpenSessionOptions = {
  documentId: string;
};

export const DEFAULT_MATCH_WEIGHTS: MatchWeights = {
  word: 0.5,
  keyword: 0,
  phrase: 0,
  semantic: 0.5,
  char: 0,
};

/**
 * Stateless grounding entry point. Holds validated settings and the
 * similarity scorer; all per-document state lives in the sessions it opens.
 */
export class SourceReferenceManager {
  readonly settings: GroundingSettings;
  readonly similarityScorer: SimilarityScorer | null;
  private readonly logger: Logger;

  constructor(options: SourceReferenceManagerOptions = {}) {
    this.settings = {
      weights: { ...DEFAULT_MATCH_WEIGHTS, ...options.weights },
      minSimilarity: options.minSimilarity ?? 0.15,
      minSharedWords: options.minSharedWords ?? 3,
      maxTranscriptSources: options.maxTranscriptSources ?? 5,
      reusePenaltyPerUse: options.reusePenaltyPerUse ?? 0.15,
      maxReusePenalty: options.maxReusePenalty ?? 0.6,
    };
    this.similarityScorer = options.similarityScorer === undefined ? new LexicalSimilarityScorer() : options.similarityScorer;
    this.logger = options.logger ?? (() => undefined);

    assertWeightsSumToOne("Matching", this.settings.weights);
    assertUnitInterval("minSimilarity", this.settings.minSimilarity);
    assertUnitInterval("reusePenaltyPerUse", this.settings.reusePenaltyPerUse);
    assertUnitInterval("maxReusePenalty", this.settings.maxReusePenalty);

    if (!Number.isInteger(this.settings.maxTranscriptSources) || this.settings.maxTranscriptSources < 1) {
      throw new ConfigurationError(`maxTranscriptSources must be at least 1, got ${this.settings.maxTranscriptSources}`);
    }

    if (!Number.isInteger(this.settings.minSharedWords) || this.settings.minSharedWords < 0) {
      throw new ConfigurationError(`minSharedWords must be >= 0, got ${this.settings.minSharedWords}`);
    }
  }

  async openSession(sentences: ParsedSentence[], options: OpenSessionOptions): Promise<GroundingSession> {
    const context = this.similarityScorer?.createContext(this.logger) ?? null;

    if (context && this.settings.weights.semantic > 0) {
      await context.warm(sentences.map((sentence) => sentence.text));
    }

    this.logger(
      `[ground] session ${options.documentId}: ${sentences.length} sentences, ` +
        `similarity ${this.similarityScorer?.name ?? "off"}`,
    );

    return new GroundingSession({
      documentId: options.documentId,
      sentences,
      settings: this.settings,
      context,
      logger: this.logger,
    });
  }

  calculateConfidence(sources: SourceReference[]): number {
    return calculateConfidence(sources);
  }

  enhanceConfidenceWithValidation(confidence: number, qualityScore: number): number {
    return enhanceConfidenceWithValidation(confidence, qualityScore);
  }

  validateStep(stepData: Pick<StepSourceData, "overallConfidence" | "hasTranscriptSupport" | "sources">): StepGroundingCheck {
    return validateStepGrounding(stepData);
  }

  getConfidenceQualityIndicator(confidence: number): ConfidenceQuality {
    return getConfidenceQualityIndicator(confidence);
  }

  getConfidenceLevelLabel(confidence: number): ConfidenceLevelLabel {
    return getConfidenceLevelLabel(confidence);
  }
}
