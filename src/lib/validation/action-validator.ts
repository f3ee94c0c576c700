import { ConfigurationError } from "@/lib/pipeline/errors";
import type { Logger } from "@/lib/pipeline/types";
import verbs from "@/lib/validation/action-verbs.json";
import type { GeneratedStep } from "@/types/steps";

export type ActionVerbCheck = {
  verb: string;
  isValid: boolean;
  isWeak: boolean;
  suggestion: string | null;
  warning: string | null;
};

export type ActionValidationResult = {
  passed: boolean;
  actionCount: number;
  issues: string[];
  warnings: string[];
  weakVerbsFound: string[];
};

export type ActionValidationSummary = {
  totalSteps: number;
  validSteps: number;
  invalidSteps: number;
  uniqueWeakVerbs: string[];
  totalIssues: number;
  totalWarnings: number;
};

export type ActionValidatorOptions = {
  minActions?: number;
  maxActions?: number;
  minContentWords?: number;
  logger?: Logger;
};

// Multi-word entries ("make sure") must win over their first word ("make").
const byLengthDesc = (left: string, right: string) => right.length - left.length;
const WEAK_VERBS = [...verbs.weakVerbs].sort(byLengthDesc);
const STRONG_VERBS = [...verbs.strongVerbs].sort(byLengthDesc);
const VERB_SUGGESTIONS = new Map<string, string>(Object.entries(verbs.verbSuggestions));
const EDGE_PUNCTUATION = /^[.,!?;:()[\]{}"']+|[.,!?;:()[\]{}"']+$/g;

export function isWeakVerb(verb: string): boolean {
  return WEAK_VERBS.includes(verb.trim().toLowerCase());
}

export function suggestVerbReplacement(verb: string): string | null {
  return VERB_SUGGESTIONS.get(verb.trim().toLowerCase()) ?? null;
}

function leadingPhrase(text: string, candidates: readonly string[]): string | null {
  return candidates.find((candidate) => text === candidate || text.startsWith(`${candidate} `)) ?? null;
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Checks that a step reads as instructions: every action opens with a
 * concrete verb, the action count is in range and the body has enough words.
 */
export class ActionValidator {
  readonly minActions: number;
  readonly maxActions: number;
  readonly minContentWords: number;
  private readonly logger: Logger;

  constructor(options: ActionValidatorOptions = {}) {
    this.minActions = options.minActions ?? 3;
    this.maxActions = options.maxActions ?? 6;
    this.minContentWords = options.minContentWords ?? 50;
    this.logger = options.logger ?? (() => undefined);

    if (!Number.isInteger(this.minActions) || this.minActions < 1) {
      throw new ConfigurationError(`minActions must be >= 1, got ${this.minActions}`);
    }

    if (this.maxActions < this.minActions) {
      throw new ConfigurationError(`maxActions (${this.maxActions}) must be >= minActions (${this.minActions})`);
    }

    if (this.minContentWords < 0) {
      throw new ConfigurationError(`minContentWords must be >= 0, got ${this.minContentWords}`);
    }
  }

  checkActionVerb(action: string): ActionVerbCheck {
    const lower = action.trim().toLowerCase().replace(/\s+/g, " ");

    if (!lower) {
      return { verb: "", isValid: false, isWeak: true, suggestion: null, warning: "Empty action text" };
    }

    const weak = leadingPhrase(lower, WEAK_VERBS);

    if (weak) {
      return {
        verb: weak,
        isValid: false,
        isWeak: true,
        suggestion: suggestVerbReplacement(weak) ?? `Use a specific action verb instead of '${weak}'`,
        warning: null,
      };
    }

    const strong = leadingPhrase(lower, STRONG_VERBS);

    if (strong) {
      return { verb: strong, isValid: true, isWeak: false, suggestion: null, warning: null };
    }

    const verb = (lower.split(" ")[0] ?? "").replace(EDGE_PUNCTUATION, "");

    return {
      verb,
      isValid: true,
      isWeak: false,
      suggestion: null,
      warning: `Consider using a more specific verb than '${verb}'`,
    };
  }

  validateStep(step: GeneratedStep, stepIndex = 0): ActionValidationResult {
    const issues: string[] = [];
    const warnings: string[] = [];
    const weakVerbsFound: string[] = [];
    const actionCount = step.actions.length;

    if (actionCount < this.minActions) {
      issues.push(`Insufficient actions: ${actionCount} (minimum ${this.minActions})`);
    } else if (actionCount > this.maxActions) {
      issues.push(`Too many actions: ${actionCount} (maximum ${this.maxActions})`);
    }

    step.actions.forEach((action, index) => {
      const check = this.checkActionVerb(action);

      if (!check.verb) {
        issues.push(`Action ${index + 1} is empty`);
      } else if (check.isWeak) {
        weakVerbsFound.push(check.verb);
        issues.push(`Action ${index + 1} has weak verb '${check.verb}': ${check.suggestion ?? ""}`);
      } else if (check.warning) {
        warnings.push(`Action ${index + 1}: ${check.warning}`);
      }
    });

    const wordCount = countWords(step.details || step.summary);

    if (wordCount < this.minContentWords) {
      issues.push(`Content too thin: ${wordCount} words (minimum ${this.minContentWords})`);
    }

    const title = step.title.trim();

    if (!title) {
      issues.push("Missing title");
    } else {
      const firstWord = (title.split(/\s+/)[0] ?? "").toLowerCase();

      if (!firstWord.endsWith("ing") && !leadingPhrase(title.toLowerCase(), STRONG_VERBS)) {
        warnings.push(`Title '${title}' should start with an action verb or gerund (e.g. 'Configuring...')`);
      }
    }

    const summary = step.summary.trim();

    if (!summary) {
      warnings.push("Missing overview/summary");
    } else if (summary.toLowerCase() === title.toLowerCase()) {
      warnings.push("Overview should not repeat the title");
    }

    if (issues.length > 0) {
      this.logger(`[actions] step ${stepIndex}: ${issues.join("; ")}`);
    }

    return { passed: issues.length === 0, actionCount, issues, warnings, weakVerbsFound };
  }

  validateSteps(steps: GeneratedStep[]): {
    results: ActionValidationResult[];
    summary: ActionValidationSummary;
  } {
    const results = steps.map((step, index) => this.validateStep(step, index));
    const validSteps = results.filter((result) => result.passed).length;

    const summary: ActionValidationSummary = {
      totalSteps: steps.length,
      validSteps,
      invalidSteps: steps.length - validSteps,
      uniqueWeakVerbs: Array.from(new Set(results.flatMap((result) => result.weakVerbsFound))),
      totalIssues: results.reduce((sum, result) => sum + result.issues.length, 0),
      totalWarnings: results.reduce((sum, result) => sum + result.warnings.length, 0),
    };

    this.logger(
      `[actions] ${summary.validSteps}/${summary.totalSteps} steps passed, ` +
        `${summary.totalIssues} issues, ${summary.totalWarnings} warnings`,
    );

    return { results, summary };
  }
}
