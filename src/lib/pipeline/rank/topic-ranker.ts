import { assertUnitInterval, assertWeightsSumToOne, ConfigurationError } from "@/lib/pipeline/errors";
import { countTermHits, normalizeToken } from "@/lib/pipeline/keywords";
import lexicon from "@/lib/pipeline/lexicon.json";
import type { Logger, TopicScore, TopicSegment } from "@/lib/pipeline/types";

export type ImportanceWeights = {
  procedural: number;
  actionDensity: number;
  coherence: number;
};

export type TopicRankerOptions = {
  weights?: Partial<ImportanceWeights>;
  minImportanceThreshold?: number;
  keepTopN?: number | null;
  actionVerbs?: readonly string[];
  sequenceIndicators?: readonly string[];
  logger?: Logger;
};

export type RankingReportEntry = {
  segmentIndex: number;
  importance: number;
  procedural: number;
  actionDensity: number;
  coherence: number;
};

export type RankingReport = {
  totalSegments: number;
  scores: RankingReportEntry[];
  statistics: {
    avgImportance: number;
    maxImportance: number;
    minImportance: number;
    stdImportance: number;
    highImportanceCount: number;
    mediumImportanceCount: number;
    lowImportanceCount: number;
  } | null;
};

export const DEFAULT_IMPORTANCE_WEIGHTS: ImportanceWeights = {
  procedural: 0.4,
  actionDensity: 0.3,
  coherence: 0.3,
};

export const DEFAULT_ACTION_VERBS: readonly string[] = lexicon.rankingActionVerbs;
export const DEFAULT_SEQUENCE_INDICATORS: readonly string[] = lexicon.sequenceIndicators;

export class TopicRanker {
  readonly weights: ImportanceWeights;
  readonly minImportanceThreshold: number;
  readonly keepTopN: number | null;
  private readonly actionVerbs: readonly string[];
  private readonly actionVerbSet: ReadonlySet<string>;
  private readonly sequenceIndicators: readonly string[];
  private readonly logger: Logger;

  constructor(options: TopicRankerOptions = {}) {
    this.weights = { ...DEFAULT_IMPORTANCE_WEIGHTS, ...options.weights };
    this.minImportanceThreshold = options.minImportanceThreshold ?? 0.3;
    this.keepTopN = options.keepTopN ?? null;
    this.actionVerbs = (options.actionVerbs ?? DEFAULT_ACTION_VERBS).map((verb) => verb.toLowerCase());
    this.actionVerbSet = new Set(this.actionVerbs);
    this.sequenceIndicators = (options.sequenceIndicators ?? DEFAULT_SEQUENCE_INDICATORS).map((term) =>
      term.toLowerCase(),
    );
    this.logger = options.logger ?? (() => undefined);

    assertWeightsSumToOne("Ranking", this.weights);
    assertUnitInterval("minImportanceThreshold", this.minImportanceThreshold);

    if (this.keepTopN !== null && (!Number.isInteger(this.keepTopN) || this.keepTopN < 1)) {
      throw new ConfigurationError(`keepTopN must be a positive integer, got ${this.keepTopN}`);
    }
  }

  scoreSegments(segments: TopicSegment[]): TopicScore[] {
    return segments.map((segment) => this.scoreSegment(segment));
  }

  scoreSegment(segment: TopicSegment): TopicScore {
    const proceduralScore = this.computeProceduralScore(segment);
    const actionDensity = this.computeActionDensity(segment);
    const coherenceScore = segment.coherenceScore;
    const weightedProcedural = proceduralScore * this.weights.procedural;
    const weightedActionDensity = actionDensity * this.weights.actionDensity;
    const weightedCoherence = coherenceScore * this.weights.coherence;

    return {
      segmentIndex: segment.segmentIndex,
      importanceScore: Math.min(1, weightedProcedural + weightedActionDensity + weightedCoherence),
      proceduralScore,
      actionDensity,
      coherenceScore,
      weightedProcedural,
      weightedActionDensity,
      weightedCoherence,
    };
  }

  rankByImportance(segments: TopicSegment[]): TopicSegment[] {
    const scores = this.scoreSegments(segments);

    return segments
      .map((segment, index) => ({ segment, importance: scores[index]?.importanceScore ?? 0 }))
      .sort((left, right) => right.importance - left.importance)
      .map((entry) => entry.segment);
  }

  filterLowImportance(segments: TopicSegment[], threshold?: number): TopicSegment[] {
    const cutoff = threshold ?? this.minImportanceThreshold;
    const scores = this.scoreSegments(segments);
    let kept = segments.filter((segment, index) => {
      const importance = scores[index]?.importanceScore ?? 0;

      if (importance < cutoff) {
        this.logger(`[rank] dropping segment ${segment.segmentIndex}: ${importance.toFixed(2)} < ${cutoff.toFixed(2)}`);
        return false;
      }

      return true;
    });

    if (this.keepTopN !== null && kept.length > this.keepTopN) {
      const top = new Set(this.rankByImportance(kept).slice(0, this.keepTopN));
      kept = kept.filter((segment) => top.has(segment));
      this.logger(`[rank] keeping top ${this.keepTopN} segments`);
    }

    this.logger(`[rank] ${segments.length} -> ${kept.length} segments (threshold ${cutoff.toFixed(2)})`);
    return kept;
  }

  getRankingReport(segments: TopicSegment[]): RankingReport {
    const scores = this.scoreSegments(segments);

    if (scores.length === 0) {
      return { totalSegments: 0, scores: [], statistics: null };
    }

    const importances = scores.map((score) => score.importanceScore);
    const mean = importances.reduce((sum, value) => sum + value, 0) / importances.length;
    const variance = importances.reduce((sum, value) => sum + (value - mean) ** 2, 0) / importances.length;

    return {
      totalSegments: segments.length,
      scores: scores.map((score) => ({
        segmentIndex: score.segmentIndex,
        importance: round3(score.importanceScore),
        procedural: round3(score.proceduralScore),
        actionDensity: round3(score.actionDensity),
        coherence: round3(score.coherenceScore),
      })),
      statistics: {
        avgImportance: mean,
        maxImportance: Math.max(...importances),
        minImportance: Math.min(...importances),
        stdImportance: Math.sqrt(variance),
        highImportanceCount: importances.filter((value) => value >= 0.7).length,
        mediumImportanceCount: importances.filter((value) => value >= 0.3 && value < 0.7).length,
        lowImportanceCount: importances.filter((value) => value < 0.3).length,
      },
    };
  }

  /**
   * 0.5 action-verb hits (about two per sentence saturates), 0.3 share of
   * imperative sentences, 0.2 sequence cues (about one per three sentences).
   */
  computeProceduralScore(segment: TopicSegment): number {
    const sentenceCount = segment.sentences.length;

    if (sentenceCount === 0) {
      return 0;
    }

    const text = segmentLowerText(segment);
    const actionHits = countHits(text, this.actionVerbs);
    const sequenceHits = countHits(text, this.sequenceIndicators);
    const imperativeCount = segment.sentences.filter((sentence) => this.isImperative(sentence.text)).length;

    const actionScore = Math.min(1, actionHits / (sentenceCount * 2));
    const sequenceScore = Math.min(1, sequenceHits / Math.max(1, sentenceCount / 3));
    const imperativeScore = imperativeCount / sentenceCount;

    return Math.min(1, actionScore * 0.5 + imperativeScore * 0.3 + sequenceScore * 0.2);
  }

  computeActionDensity(segment: TopicSegment): number {
    const sentenceCount = segment.sentences.length;

    if (sentenceCount === 0) {
      return 0;
    }

    const actionHits = countHits(segmentLowerText(segment), this.actionVerbs);
    return Math.min(1, actionHits / sentenceCount / 3);
  }

  private isImperative(sentence: string): boolean {
    return sentence
      .split(/\s+/)
      .slice(0, 2)
      .some((word) => this.actionVerbSet.has(normalizeToken(word)));
  }
}

function segmentLowerText(segment: TopicSegment): string {
  return segment.sentences.map((sentence) => sentence.text.toLowerCase()).join(" ");
}

function countHits(lowerText: string, terms: readonly string[]): number {
  return terms.reduce((sum, term) => sum + countTermHits(lowerText, term), 0);
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
