import { assertUnitInterval, assertWeightsSumToOne, ConfigurationError } from "@/lib/pipeline/errors";
import type { Logger } from "@/lib/pipeline/types";
import type { GeneratedStep, IssueSeverity, ValidationIssue, ValidationResult } from "@/types/steps";

export type StepForValidation = Pick<GeneratedStep, "title" | "details" | "actions"> & {
  confidenceScore: number;
};

export type QualityWeights = {
  actions: number;
  title: number;
  details: number;
  confidence: number;
};

export type StepValidatorOptions = {
  minActions?: number;
  maxActions?: number;
  warnDuplicateActions?: boolean;
  minTitleLength?: number;
  maxTitleLength?: number;
  requireDescriptiveTitle?: boolean;
  minDetailsLength?: number;
  requireDetails?: boolean;
  minConfidenceThreshold?: number;
  lowConfidenceThreshold?: number;
  weights?: Partial<QualityWeights>;
  enableAutoFixSuggestions?: boolean;
  logger?: Logger;
};

export type ValidationReport = {
  totalSteps: number;
  validSteps: number;
  invalidSteps: number;
  validationRate: number;
  statistics: {
    avgQualityScore: number;
    minQualityScore: number;
    maxQualityScore: number;
    avgActionCount: number;
    avgConfidence: number;
    highQualitySteps: number;
    mediumQualitySteps: number;
    lowQualitySteps: number;
  } | null;
  issuesByType: Record<string, number>;
  issuesBySeverity: Record<IssueSeverity, number>;
};

export const DEFAULT_QUALITY_WEIGHTS: QualityWeights = {
  actions: 0.4,
  title: 0.2,
  details: 0.2,
  confidence: 0.2,
};

const GENERIC_TITLE_PATTERNS: RegExp[] = [/^step \d+$/, /^untitled/, /^new step/, /^todo/, /^instructions?$/];

type ResolvedOptions = Required<Omit<StepValidatorOptions, "weights" | "logger">>;

export class StepValidator {
  readonly options: ResolvedOptions;
  readonly weights: QualityWeights;
  private readonly logger: Logger;

  constructor(options: StepValidatorOptions = {}) {
    this.options = {
      minActions: options.minActions ?? 3,
      maxActions: options.maxActions ?? 15,
      warnDuplicateActions: options.warnDuplicateActions ?? true,
      minTitleLength: options.minTitleLength ?? 10,
      maxTitleLength: options.maxTitleLength ?? 100,
      requireDescriptiveTitle: options.requireDescriptiveTitle ?? true,
      minDetailsLength: options.minDetailsLength ?? 20,
      requireDetails: options.requireDetails ?? true,
      minConfidenceThreshold: options.minConfidenceThreshold ?? 0.2,
      lowConfidenceThreshold: options.lowConfidenceThreshold ?? 0.4,
      enableAutoFixSuggestions: options.enableAutoFixSuggestions ?? true,
    };
    this.weights = { ...DEFAULT_QUALITY_WEIGHTS, ...options.weights };
    this.logger = options.logger ?? (() => undefined);

    const resolved = this.options;

    if (!Number.isInteger(resolved.minActions) || resolved.minActions < 1) {
      throw new ConfigurationError(`minActions must be >= 1, got ${resolved.minActions}`);
    }

    if (resolved.maxActions < resolved.minActions) {
      throw new ConfigurationError(`maxActions (${resolved.maxActions}) must be >= minActions (${resolved.minActions})`);
    }

    if (resolved.minTitleLength < 1 || resolved.maxTitleLength < resolved.minTitleLength) {
      throw new ConfigurationError(
        `Title length bounds are invalid: min ${resolved.minTitleLength}, max ${resolved.maxTitleLength}`,
      );
    }

    if (resolved.minDetailsLength < 1) {
      throw new ConfigurationError(`minDetailsLength must be >= 1, got ${resolved.minDetailsLength}`);
    }

    assertUnitInterval("minConfidenceThreshold", resolved.minConfidenceThreshold);
    assertUnitInterval("lowConfidenceThreshold", resolved.lowConfidenceThreshold);

    if (resolved.minConfidenceThreshold > resolved.lowConfidenceThreshold) {
      throw new ConfigurationError(
        `minConfidenceThreshold (${resolved.minConfidenceThreshold}) must not exceed ` +
          `lowConfidenceThreshold (${resolved.lowConfidenceThreshold})`,
      );
    }

    assertWeightsSumToOne("Validation", this.weights);
  }

  validateStep(step: StepForValidation, stepIndex = 0): ValidationResult {
    const result: ValidationResult = {
      stepIndex,
      isValid: true,
      qualityScore: 0,
      errors: [],
      warnings: [],
      info: [],
      actionCount: step.actions.length,
      titleLength: step.title.length,
      detailsLength: step.details.length,
      confidenceScore: step.confidenceScore,
      hasDuplicates: false,
      autoFixAvailable: false,
      suggestedFixes: [],
    };

    this.checkActions(step.actions, result);
    this.checkTitle(step.title, result);
    this.checkDetails(step.details, result);
    this.checkConfidence(step.confidenceScore, result);
    this.checkDuplicates(step.actions, result);

    result.qualityScore = this.computeQualityScore(result);
    result.isValid = result.errors.length === 0;

    if (this.options.enableAutoFixSuggestions && !result.isValid) {
      this.attachAutoFixes(result);
    }

    this.logger(
      `[validate] step ${stepIndex}: valid ${result.isValid}, quality ${result.qualityScore.toFixed(2)}, ` +
        `${result.errors.length} errors, ${result.warnings.length} warnings`,
    );

    return result;
  }

  validateSteps(steps: StepForValidation[]): ValidationResult[] {
    return steps.map((step, index) => this.validateStep(step, index));
  }

  getValidationReport(results: ValidationResult[]): ValidationReport {
    const issuesByType: Record<string, number> = {};
    const issuesBySeverity: Record<IssueSeverity, number> = { error: 0, warning: 0, info: 0 };

    for (const result of results) {
      for (const entry of [...result.errors, ...result.warnings, ...result.info]) {
        issuesByType[entry.issueType] = (issuesByType[entry.issueType] ?? 0) + 1;
        issuesBySeverity[entry.severity] += 1;
      }
    }

    const validSteps = results.filter((result) => result.isValid).length;

    if (results.length === 0) {
      return {
        totalSteps: 0,
        validSteps: 0,
        invalidSteps: 0,
        validationRate: 0,
        statistics: null,
        issuesByType,
        issuesBySeverity,
      };
    }

    const qualityScores = results.map((result) => result.qualityScore);

    return {
      totalSteps: results.length,
      validSteps,
      invalidSteps: results.length - validSteps,
      validationRate: validSteps / results.length,
      statistics: {
        avgQualityScore: average(qualityScores),
        minQualityScore: Math.min(...qualityScores),
        maxQualityScore: Math.max(...qualityScores),
        avgActionCount: average(results.map((result) => result.actionCount)),
        avgConfidence: average(results.map((result) => result.confidenceScore)),
        highQualitySteps: qualityScores.filter((score) => score >= 0.8).length,
        mediumQualitySteps: qualityScores.filter((score) => score >= 0.5 && score < 0.8).length,
        lowQualitySteps: qualityScores.filter((score) => score < 0.5).length,
      },
      issuesByType,
      issuesBySeverity,
    };
  }

  isGenericTitle(title: string): boolean {
    const normalized = title.toLowerCase().trim();
    return GENERIC_TITLE_PATTERNS.some((pattern) => pattern.test(normalized));
  }

  private checkActions(actions: string[], result: ValidationResult): void {
    const { minActions, maxActions } = this.options;

    if (actions.length < minActions) {
      result.errors.push(
        issue(
          "insufficient_actions",
          "error",
          `Step has ${actions.length} actions, minimum is ${minActions}`,
          "actions",
          `Add at least ${minActions - actions.length} more action(s)`,
        ),
      );
    }

    if (actions.length > maxActions) {
      result.warnings.push(
        issue(
          "too_many_actions",
          "warning",
          `Step has ${actions.length} actions, which may be too many (max recommended: ${maxActions})`,
          "actions",
          "Consider splitting this step into multiple steps",
        ),
      );
    }

    const emptyIndices = actions.flatMap((action, index) => (action.trim() ? [] : [index]));

    if (emptyIndices.length > 0) {
      result.errors.push(
        issue(
          "empty_actions",
          "error",
          `Step has ${emptyIndices.length} empty action(s) at indices: ${emptyIndices.join(", ")}`,
          "actions",
          "Remove empty actions or add descriptive text",
        ),
      );
    }
  }

  private checkTitle(title: string, result: ValidationResult): void {
    const { minTitleLength, maxTitleLength } = this.options;

    if (!title.trim()) {
      result.errors.push(issue("missing_title", "error", "Step has no title", "title", "Add a descriptive title for this step"));
      return;
    }

    if (title.length < minTitleLength) {
      result.warnings.push(
        issue(
          "short_title",
          "warning",
          `Title is too short (${title.length} chars, minimum ${minTitleLength})`,
          "title",
          "Use a more descriptive title",
        ),
      );
    }

    if (title.length > maxTitleLength) {
      result.warnings.push(
        issue(
          "long_title",
          "warning",
          `Title is too long (${title.length} chars, maximum ${maxTitleLength})`,
          "title",
          "Shorten the title or move details to the details field",
        ),
      );
    }

    if (this.options.requireDescriptiveTitle && this.isGenericTitle(title)) {
      result.info.push(
        issue(
          "generic_title",
          "info",
          "Title may not be descriptive enough",
          "title",
          "Use specific action words (e.g., 'Configure', 'Create', 'Navigate')",
        ),
      );
    }
  }

  // Optional details that are left empty raise nothing.
  private checkDetails(details: string, result: ValidationResult): void {
    const { minDetailsLength, requireDetails } = this.options;

    if (!details.trim()) {
      if (requireDetails) {
        result.errors.push(
          issue(
            "missing_details",
            "error",
            "Step has no details",
            "details",
            "Add context or additional information about this step",
          ),
        );
      }

      return;
    }

    if (details.length < minDetailsLength) {
      result.warnings.push(
        issue(
          "insufficient_details",
          "warning",
          `Details are too short (${details.length} chars, minimum ${minDetailsLength})`,
          "details",
          "Add more context or explanation about this step",
        ),
      );
    }
  }

  private checkConfidence(confidence: number, result: ValidationResult): void {
    const { minConfidenceThreshold, lowConfidenceThreshold } = this.options;

    if (confidence < minConfidenceThreshold) {
      result.errors.push(
        issue(
          "very_low_confidence",
          "error",
          `Step has very low confidence (${confidence.toFixed(2)} < ${minConfidenceThreshold.toFixed(2)})`,
          "confidenceScore",
          "Review step quality - may need more source information",
        ),
      );
    } else if (confidence < lowConfidenceThreshold) {
      result.warnings.push(
        issue(
          "low_confidence",
          "warning",
          `Step has low confidence (${confidence.toFixed(2)} < ${lowConfidenceThreshold.toFixed(2)})`,
          "confidenceScore",
          "Consider adding more context from source material",
        ),
      );
    }
  }

  private checkDuplicates(actions: string[], result: ValidationResult): void {
    if (!this.options.warnDuplicateActions) {
      return;
    }

    const seen = new Set<string>();
    const duplicates: number[] = [];

    actions.forEach((action, index) => {
      const normalized = action.toLowerCase().trim();

      if (seen.has(normalized)) {
        duplicates.push(index);
      } else {
        seen.add(normalized);
      }
    });

    if (duplicates.length > 0) {
      result.hasDuplicates = true;
      result.warnings.push(
        issue(
          "duplicate_actions",
          "warning",
          `Step has ${duplicates.length} duplicate action(s) at indices: ${duplicates.join(", ")}`,
          "actions",
          "Remove or rephrase duplicate actions",
        ),
      );
    }
  }

  private computeQualityScore(result: ValidationResult): number {
    const { minActions, minTitleLength, maxTitleLength, minDetailsLength, requireDetails } = this.options;

    const actionScore =
      result.actionCount >= minActions ? Math.min(1, result.actionCount / (minActions * 2)) : result.actionCount / minActions;
    const titleScore =
      result.titleLength >= minTitleLength
        ? Math.min(1, result.titleLength / maxTitleLength)
        : result.titleLength / minTitleLength;

    let detailsScore = 1;

    if (result.detailsLength >= minDetailsLength) {
      detailsScore = Math.min(1, result.detailsLength / (minDetailsLength * 3));
    } else if (requireDetails) {
      detailsScore = result.detailsLength / minDetailsLength;
    }

    const score =
      actionScore * this.weights.actions +
      titleScore * this.weights.title +
      detailsScore * this.weights.details +
      result.confidenceScore * this.weights.confidence;

    return Math.min(1, Math.max(0, score));
  }

  private attachAutoFixes(result: ValidationResult): void {
    const has = (issueType: string) => result.errors.some((entry) => entry.issueType === issueType);
    const suggestions: string[] = [];

    if (has("insufficient_actions")) {
      suggestions.push(`Add ${this.options.minActions - result.actionCount} more action(s) to meet minimum requirement`);
    }

    if (has("missing_title")) {
      suggestions.push("Generate title from step actions or context");
    }

    if (has("missing_details")) {
      suggestions.push("Generate details from source transcript or knowledge");
    }

    if (result.hasDuplicates) {
      suggestions.push("Remove duplicate actions automatically");
    }

    if (suggestions.length > 0) {
      result.autoFixAvailable = true;
      result.suggestedFixes = suggestions;
    }
  }
}

function issue(
  issueType: string,
  severity: IssueSeverity,
  message: string,
  field: string | null,
  suggestion: string | null,
): ValidationIssue {
  return { issueType, severity, message, field, suggestion };
}

function average(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}
