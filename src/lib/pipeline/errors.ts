export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class NoSegmentsSurvivedError extends Error {
  readonly segmentsBeforeFiltering: number;
  readonly segmentsAfterQaFilter: number;

  constructor(input: { segmentsBeforeFiltering: number; segmentsAfterQaFilter: number }) {
    super(
      `All ${input.segmentsBeforeFiltering} topic segments were filtered out ` +
        `(${input.segmentsAfterQaFilter} left after Q&A filtering). ` +
        "Thresholds may be too aggressive or the transcript has no procedural content.",
    );
    this.name = "NoSegmentsSurvivedError";
    this.segmentsBeforeFiltering = input.segmentsBeforeFiltering;
    this.segmentsAfterQaFilter = input.segmentsAfterQaFilter;
  }
}

export class NoValidStepsError extends Error {
  readonly generatedSteps: number;
  readonly failedSegments: number;

  constructor(input: { generatedSteps: number; failedSegments: number }) {
    super(
      `None of the ${input.generatedSteps} generated steps passed validation ` +
        `(${input.failedSegments} segments failed during generation). ` +
        "Steps are not grounded in the transcript well enough to build a document.",
    );
    this.name = "NoValidStepsError";
    this.generatedSteps = input.generatedSteps;
    this.failedSegments = input.failedSegments;
  }
}

export function assertWeightsSumToOne(label: string, weights: Record<string, number>): void {
  const total = Object.values(weights).reduce((sum, weight) => sum + weight, 0);

  if (Math.abs(total - 1) > 0.01) {
    const parts = Object.entries(weights)
      .map(([name, weight]) => `${name}=${weight}`)
      .join(", ");
    throw new ConfigurationError(`${label} weights must sum to 1.0, got ${total.toFixed(3)} (${parts})`);
  }
}

export function assertUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`${name} must be between 0.0 and 1.0, got ${value}`);
  }
}
