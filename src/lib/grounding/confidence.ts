import type { SourceReference, StepSourceData } from "@/types/steps";

export type ConfidenceQuality = "high" | "medium" | "low";
export type ConfidenceLevelLabel = "Very High" | "High" | "Medium" | "Low" | "Very Low";

export type StepGroundingCheck = {
  isValid: boolean;
  warnings: string[];
};

const MIN_VALID_CONFIDENCE = 0.4;

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Trust score from transcript and knowledge sources. Visual evidence is left
 * out. The top three sources are weighted 50/30/20 (60/40 for two), then
 * multiplied up for source count, mixed evidence and any strong match.
 */
export function calculateConfidence(sources: SourceReference[]): number {
  const textual = sources
    .filter((source) => source.type === "transcript" || source.type === "knowledge")
    .sort((left, right) => right.confidence - left.confidence);

  const [first, second, third] = textual;

  if (!first) {
    return 0;
  }

  let confidence: number;

  if (!second) {
    confidence = first.confidence;
  } else if (!third) {
    confidence = first.confidence * 0.6 + second.confidence * 0.4;
  } else {
    confidence = first.confidence * 0.5 + second.confidence * 0.3 + third.confidence * 0.2;
  }

  if (textual.length >= 4) {
    confidence *= 1.25;
  } else if (textual.length === 3) {
    confidence *= 1.15;
  } else if (textual.length === 2) {
    confidence *= 1.08;
  }

  const hasTranscript = textual.some((source) => source.type === "transcript");
  const hasKnowledge = textual.some((source) => source.type === "knowledge");

  if (hasTranscript && hasKnowledge) {
    confidence *= 1.12;
  }

  if (textual.some((source) => source.confidence > 0.5)) {
    confidence *= 1.1;
  }

  return clampUnit(confidence);
}

// 70% source confidence, 30% structural quality, nudged at the extremes.
export function enhanceConfidenceWithValidation(confidence: number, qualityScore: number): number {
  let enhanced = confidence * 0.7 + qualityScore * 0.3;

  if (qualityScore >= 0.8) {
    enhanced *= 1.1;
  } else if (qualityScore >= 0.6) {
    enhanced *= 1.05;
  } else if (qualityScore < 0.3) {
    enhanced *= 0.95;
  }

  return clampUnit(enhanced);
}

export function validateStepGrounding(
  stepData: Pick<StepSourceData, "overallConfidence" | "hasTranscriptSupport" | "sources">,
): StepGroundingCheck {
  const warnings: string[] = [];
  const confidence = stepData.overallConfidence;

  if (confidence < 0.3) {
    warnings.push(`Very low confidence (${confidence.toFixed(2)}) - may be hallucinated`);
  } else if (confidence < 0.5) {
    warnings.push(`Low confidence (${confidence.toFixed(2)}) - verify accuracy`);
  } else if (confidence < 0.7) {
    warnings.push(`Medium confidence (${confidence.toFixed(2)}) - generally reliable`);
  }

  if (!stepData.hasTranscriptSupport) {
    warnings.push("No transcript support found - verify against source material");
  }

  if (stepData.sources.length === 0) {
    warnings.push("No source references found - content may be fabricated");
  } else if (stepData.sources.length === 1) {
    warnings.push("Only one source reference - limited validation");
  }

  return {
    isValid: confidence >= MIN_VALID_CONFIDENCE && stepData.hasTranscriptSupport && stepData.sources.length > 0,
    warnings,
  };
}

export function getConfidenceQualityIndicator(confidence: number): ConfidenceQuality {
  if (confidence >= 0.7) {
    return "high";
  }

  if (confidence >= 0.4) {
    return "medium";
  }

  return "low";
}

export function getConfidenceLevelLabel(confidence: number): ConfidenceLevelLabel {
  if (confidence >= 0.75) {
    return "Very High";
  }

  if (confidence >= 0.55) {
    return "High";
  }

  if (confidence >= 0.35) {
    return "Medium";
  }

  if (confidence >= 0.2) {
    return "Low";
  }

  return "Very Low";
}
