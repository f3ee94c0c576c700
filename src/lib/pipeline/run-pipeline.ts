import { enhanceConfidenceWithValidation } from "@/lib/grounding/confidence";
import type { GroundingSession, StepEvidence } from "@/lib/grounding/grounding-session";
import { SourceReferenceManager, type SourceReferenceManagerOptions } from "@/lib/grounding/source-reference-manager";
import { NoSegmentsSurvivedError, NoValidStepsError } from "@/lib/pipeline/errors";
import { QAFilter, type QAFilterOptions, type QAFilterStatistics } from "@/lib/pipeline/filter/qa-filter";
import { TopicRanker, type RankingReport, type TopicRankerOptions } from "@/lib/pipeline/rank/topic-ranker";
import { getSegmentText } from "@/lib/pipeline/segment/topic-segment";
import { TopicSegmenter, type TopicSegmenterOptions } from "@/lib/pipeline/segment/topic-segmenter";
import { normalizeGeneratedStep } from "@/lib/pipeline/steps/normalize-step";
import { TranscriptCleaner, type TranscriptCleanerOptions } from "@/lib/pipeline/transcript/clean-transcript";
import { parseTranscript } from "@/lib/pipeline/transcript/parse-transcript";
import type { Logger, TopicSegment, TranscriptMetadata } from "@/lib/pipeline/types";
import {
  ActionValidator,
  type ActionValidationResult,
  type ActionValidatorOptions,
} from "@/lib/validation/action-validator";
import { StepValidator, type StepValidatorOptions, type ValidationReport } from "@/lib/validation/step-validator";
import type {
  GeneratedStep,
  KnowledgeSource,
  ScreenshotData,
  StepSourceData,
  ValidationResult,
} from "@/types/steps";

export type StepGenerationRequest = {
  segmentText: string;
  segmentIndex: number;
  totalSegments: number;
  tone: string;
  audience: string;
};

export type StepGenerator = (request: StepGenerationRequest) => Promise<unknown>;

export type TrainingPipelineOptions = {
  transcript: string;
  generateStep: StepGenerator;
  documentId?: string;
  tone?: string;
  audience?: string;
  enableQaFilter?: boolean;
  enableImportanceFilter?: boolean;
  minConfidence?: number;
  knowledgeSources?: KnowledgeSource[];
  screenshots?: ScreenshotData[];
  segmenter?: TopicSegmenterOptions;
  qaFilter?: QAFilterOptions;
  ranker?: TopicRankerOptions;
  grounding?: SourceReferenceManagerOptions;
  validator?: StepValidatorOptions;
  actionValidator?: ActionValidatorOptions;
  // `false` parses the transcript exactly as given.
  cleaning?: TranscriptCleanerOptions | false;
  logger?: Logger;
};

export type StepOutcome = {
  segmentIndex: number | null;
  step: GeneratedStep;
  grounding: StepSourceData;
  validation: ValidationResult;
  actionValidation: ActionValidationResult;
  confidence: number;
};

export type RejectedStep = StepOutcome & {
  reason: string;
};

export type TrainingPipelineResult = {
  metadata: TranscriptMetadata;
  segments: TopicSegment[];
  acceptedSteps: StepOutcome[];
  rejectedSteps: RejectedStep[];
  failedSegments: Array<{ segmentIndex: number; reason: string }>;
  qaStatistics: QAFilterStatistics | null;
  rankingReport: RankingReport | null;
  validationReport: ValidationReport;
};

export const DEFAULT_MIN_CONFIDENCE = 0.25;
// A step with at least one source is still accepted down to this confidence.
const SOURCED_MIN_CONFIDENCE = 0.2;

export async function runTrainingPipeline(options: TrainingPipelineOptions): Promise<TrainingPipelineResult> {
  const logger = options.logger ?? (() => undefined);
  const documentId = options.documentId ?? "document";
  const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;

  const segmenter = new TopicSegmenter({ logger, ...options.segmenter });
  const qaFilter = new QAFilter({ logger, ...options.qaFilter });
  const ranker = new TopicRanker({ logger, ...options.ranker });
  const manager = new SourceReferenceManager({ logger, ...options.grounding });
  const validator = new StepValidator({ logger, ...options.validator });
  const actionValidator = new ActionValidator({ logger, ...options.actionValidator });
  const cleaner = options.cleaning === false ? null : new TranscriptCleaner({ logger, ...options.cleaning });

  const { sentences, metadata } = parseTranscript(options.transcript, { cleaner, logger });
  const segments = segmenter.segment(sentences);

  let qaStatistics: QAFilterStatistics | null = null;
  let afterQa = segments;

  if (options.enableQaFilter ?? true) {
    afterQa = qaFilter.filterSegments(segments);
    qaStatistics = qaFilter.getStatistics(segments);
  }

  let rankingReport: RankingReport | null = null;
  let selected = afterQa;

  if (options.enableImportanceFilter ?? true) {
    rankingReport = ranker.getRankingReport(afterQa);
    selected = ranker.filterLowImportance(afterQa);
  }

  if (selected.length === 0) {
    throw new NoSegmentsSurvivedError({
      segmentsBeforeFiltering: segments.length,
      segmentsAfterQaFilter: afterQa.length,
    });
  }

  logger(`[pipeline] ${documentId}: ${selected.length} of ${segments.length} segments selected`);

  const session = await manager.openSession(sentences, { documentId });
  const failedSegments: TrainingPipelineResult["failedSegments"] = [];
  const acceptedSteps: StepOutcome[] = [];
  const rejectedSteps: RejectedStep[] = [];
  const validations: ValidationResult[] = [];

  for (const [position, segment] of selected.entries()) {
    let raw: unknown;

    try {
      raw = await options.generateStep({
        segmentText: getSegmentText(segment),
        segmentIndex: position,
        totalSegments: selected.length,
        tone: options.tone ?? "Professional",
        audience: options.audience ?? "Technical Users",
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : "Unknown generation error";
      failedSegments.push({ segmentIndex: segment.segmentIndex, reason });
      logger(`[pipeline] generation failed for segment ${segment.segmentIndex}: ${reason}`);
      continue;
    }

    const step = normalizeGeneratedStep(raw);

    if (!step) {
      failedSegments.push({ segmentIndex: segment.segmentIndex, reason: "Generator returned no step object" });
      logger(`[pipeline] segment ${segment.segmentIndex} produced no step`);
      continue;
    }

    const stepIndex = validations.length;
    const outcome = await evaluateStep({
      session,
      validator,
      actionValidator,
      stepIndex,
      segmentIndex: segment.segmentIndex,
      step,
      evidence: { knowledgeSources: options.knowledgeSources, screenshots: options.screenshots },
    });

    validations.push(outcome.validation);

    const rejection = rejectionReason(outcome, minConfidence);

    if (rejection) {
      rejectedSteps.push({ ...outcome, reason: rejection });
      logger(`[pipeline] rejected step ${stepIndex}: ${rejection}`);
      continue;
    }

    acceptedSteps.push(outcome);
  }

  if (acceptedSteps.length === 0) {
    throw new NoValidStepsError({
      generatedSteps: validations.length,
      failedSegments: failedSegments.length,
    });
  }

  logger(
    `[pipeline] ${documentId}: accepted ${acceptedSteps.length}, rejected ${rejectedSteps.length}, ` +
      `failed ${failedSegments.length}`,
  );

  return {
    metadata,
    segments: selected,
    acceptedSteps,
    rejectedSteps,
    failedSegments,
    qaStatistics,
    rankingReport,
    validationReport: validator.getValidationReport(validations),
  };
}

/**
 * Grounds one step against the session, validates its structure with the
 * grounding confidence and blends the two into the final confidence. The
 * action check runs on the step as generated and does not touch confidence.
 */
export async function evaluateStep(input: {
  session: GroundingSession;
  validator: StepValidator;
  actionValidator: ActionValidator;
  stepIndex: number;
  segmentIndex: number | null;
  step: GeneratedStep;
  evidence?: StepEvidence;
}): Promise<StepOutcome> {
  const { session, validator, actionValidator, stepIndex, step } = input;
  const grounding = await session.buildStepSources(stepIndex, step, input.evidence);
  const validation = validator.validateStep({ ...step, confidenceScore: grounding.overallConfidence }, stepIndex);

  return {
    segmentIndex: input.segmentIndex,
    step,
    grounding,
    validation,
    actionValidation: actionValidator.validateStep(step, stepIndex),
    confidence: enhanceConfidenceWithValidation(grounding.overallConfidence, validation.qualityScore),
  };
}

// Null when the step is accepted.
export function rejectionReason(outcome: StepOutcome, minConfidence = DEFAULT_MIN_CONFIDENCE): string | null {
  if (!outcome.actionValidation.passed) {
    return `action check failed: ${outcome.actionValidation.issues.join("; ")}`;
  }

  if (!outcome.validation.isValid) {
    return `${outcome.validation.errors.length} structural errors`;
  }

  if (outcome.confidence >= minConfidence) {
    return null;
  }

  if (outcome.grounding.sources.length > 0 && outcome.confidence >= SOURCED_MIN_CONFIDENCE) {
    return null;
  }

  return `confidence ${outcome.confidence.toFixed(2)} below ${minConfidence}`;
}
