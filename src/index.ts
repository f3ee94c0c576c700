export { parseTranscript, formatTimestamp } from "@/lib/pipeline/transcript/parse-transcript";
export type { ParsedTranscript, ParseTranscriptOptions } from "@/lib/pipeline/transcript/parse-transcript";
export { TranscriptCleaner, DEFAULT_FILLER_WORDS } from "@/lib/pipeline/transcript/clean-transcript";
export type { TranscriptCleanerOptions } from "@/lib/pipeline/transcript/clean-transcript";
export { tokenizeSentences } from "@/lib/pipeline/transcript/sentence-tokenizer";
export { extractKeywords } from "@/lib/pipeline/keywords";

export { TopicSegmenter, DEFAULT_BOUNDARY_WEIGHTS } from "@/lib/pipeline/segment/topic-segmenter";
export type { BoundarySignals, BoundaryWeights, TopicSegmenterOptions } from "@/lib/pipeline/segment/topic-segmenter";
export { ensureMinimumSegments } from "@/lib/pipeline/segment/ensure-minimum";
export { getSegmentText } from "@/lib/pipeline/segment/topic-segment";

export { QAFilter } from "@/lib/pipeline/filter/qa-filter";
export type { QAFilterOptions, QAFilterStatistics } from "@/lib/pipeline/filter/qa-filter";

export { TopicRanker, DEFAULT_IMPORTANCE_WEIGHTS } from "@/lib/pipeline/rank/topic-ranker";
export type { ImportanceWeights, RankingReport, TopicRankerOptions } from "@/lib/pipeline/rank/topic-ranker";

export { SourceReferenceManager, DEFAULT_MATCH_WEIGHTS } from "@/lib/grounding/source-reference-manager";
export type { SourceReferenceManagerOptions } from "@/lib/grounding/source-reference-manager";
export { GroundingSession } from "@/lib/grounding/grounding-session";
export type { MatchWeights, StepEvidence } from "@/lib/grounding/grounding-session";
export { EmbeddingSimilarityScorer, LexicalSimilarityScorer } from "@/lib/grounding/similarity";
export type { Embedder, SimilarityScorer } from "@/lib/grounding/similarity";
export { createOpenAiEmbedder } from "@/lib/grounding/openai-embedder";

export { StepValidator } from "@/lib/validation/step-validator";
export type { StepValidatorOptions, ValidationReport } from "@/lib/validation/step-validator";

export { ActionValidator, isWeakVerb, suggestVerbReplacement } from "@/lib/validation/action-validator";
export type {
  ActionValidationResult,
  ActionValidationSummary,
  ActionValidatorOptions,
  ActionVerbCheck,
} from "@/lib/validation/action-validator";

export { normalizeGeneratedStep } from "@/lib/pipeline/steps/normalize-step";
export { runTrainingPipeline } from "@/lib/pipeline/run-pipeline";
export type {
  StepGenerationRequest,
  StepGenerator,
  StepOutcome,
  TrainingPipelineOptions,
  TrainingPipelineResult,
} from "@/lib/pipeline/run-pipeline";

export { ConfigurationError, NoSegmentsSurvivedError, NoValidStepsError } from "@/lib/pipeline/errors";
export type * from "@/lib/pipeline/types";
export type * from "@/types/steps";
