import { assertUnitInterval, assertWeightsSumToOne, ConfigurationError } from "@/lib/pipeline/errors";
import { contentWordSet, jaccardSimilarity } from "@/lib/pipeline/keywords";
import { ensureMinimumSegments } from "@/lib/pipeline/segment/ensure-minimum";
import { buildTopicSegment, reindexSegments } from "@/lib/pipeline/segment/topic-segment";
import type { Logger, ParsedSentence, TopicSegment } from "@/lib/pipeline/types";

export type BoundaryWeights = {
  timestampGap: number;
  speakerTransition: number;
  transitionPhrase: number;
  semantic: number;
};

export type TopicSegmenterOptions = {
  weights?: Partial<BoundaryWeights>;
  gapThresholdSeconds?: number;
  boundaryThreshold?: number;
  minSegmentSentences?: number;
  minTotalSegments?: number;
  useSemanticSimilarity?: boolean;
  mergeSmallSegments?: boolean;
  logger?: Logger;
};

export type BoundarySignals = {
  timestampGap: number;
  speakerTransition: number;
  transitionPhrase: number;
  semantic: number;
  score: number;
};

export const DEFAULT_BOUNDARY_WEIGHTS: BoundaryWeights = {
  timestampGap: 0.35,
  speakerTransition: 0.25,
  transitionPhrase: 0.3,
  semantic: 0.1,
};

const TRANSITION_OVERRIDE_SCORE = 0.3;

export class TopicSegmenter {
  readonly weights: BoundaryWeights;
  readonly gapThresholdSeconds: number;
  readonly boundaryThreshold: number;
  readonly minSegmentSentences: number;
  readonly minTotalSegments: number;
  readonly useSemanticSimilarity: boolean;
  readonly mergeSmallSegments: boolean;
  private readonly logger: Logger;

  constructor(options: TopicSegmenterOptions = {}) {
    this.weights = { ...DEFAULT_BOUNDARY_WEIGHTS, ...options.weights };
    this.gapThresholdSeconds = options.gapThresholdSeconds ?? 90;
    this.boundaryThreshold = options.boundaryThreshold ?? 0.4;
    this.minSegmentSentences = options.minSegmentSentences ?? 2;
    this.minTotalSegments = options.minTotalSegments ?? 3;
    this.useSemanticSimilarity = options.useSemanticSimilarity ?? false;
    this.mergeSmallSegments = options.mergeSmallSegments ?? true;
    this.logger = options.logger ?? (() => undefined);

    assertWeightsSumToOne("Segmentation", this.weights);
    assertUnitInterval("boundaryThreshold", this.boundaryThreshold);

    if (!(this.gapThresholdSeconds > 0)) {
      throw new ConfigurationError(`gapThresholdSeconds must be positive, got ${this.gapThresholdSeconds}`);
    }

    if (!Number.isInteger(this.minSegmentSentences) || this.minSegmentSentences < 1) {
      throw new ConfigurationError(`minSegmentSentences must be at least 1, got ${this.minSegmentSentences}`);
    }

    if (!Number.isInteger(this.minTotalSegments) || this.minTotalSegments < 1) {
      throw new ConfigurationError(`minTotalSegments must be at least 1, got ${this.minTotalSegments}`);
    }
  }

  segment(sentences: ParsedSentence[]): TopicSegment[] {
    if (sentences.length === 0) {
      this.logger("[segment] no sentences to segment");
      return [];
    }

    const boundaries = this.identifyBoundaries(sentences);
    let segments = boundaries.map((start, index) =>
      buildTopicSegment(index, sentences.slice(start, boundaries[index + 1] ?? sentences.length)),
    );
    this.logger(`[segment] ${segments.length} initial segments from ${sentences.length} sentences`);

    if (this.mergeSmallSegments) {
      segments = this.mergeSmall(segments);
    }

    if (segments.length < this.minTotalSegments) {
      this.logger(`[segment] ${segments.length} below minimum ${this.minTotalSegments}, splitting largest`);
      segments = ensureMinimumSegments(segments, this.minTotalSegments);
    }

    this.logger(`[segment] ${segments.length} segments`);
    return segments;
  }

  identifyBoundaries(sentences: ParsedSentence[]): number[] {
    const boundaries = [0];

    for (let index = 1; index < sentences.length; index += 1) {
      const previous = sentences[index - 1];
      const current = sentences[index];

      if (!previous || !current) {
        continue;
      }

      if (this.isBoundary(this.computeBoundarySignals(previous, current).score, current)) {
        boundaries.push(index);
      }
    }

    return boundaries;
  }

  computeBoundarySignals(previous: ParsedSentence, current: ParsedSentence): BoundarySignals {
    const timestampGap = this.timestampGapScore(previous, current);
    const speakerTransition = speakerTransitionScore(previous, current);
    const transitionPhrase = current.isTransition ? 1 : 0;
    const semantic = this.useSemanticSimilarity ? semanticDistance(previous, current) : 0;

    const score =
      this.weights.timestampGap * timestampGap +
      this.weights.speakerTransition * speakerTransition +
      this.weights.transitionPhrase * transitionPhrase +
      this.weights.semantic * semantic;

    return { timestampGap, speakerTransition, transitionPhrase, semantic, score: Math.min(score, 1) };
  }

  private isBoundary(score: number, current: ParsedSentence): boolean {
    if (score > this.boundaryThreshold) {
      return true;
    }

    if (current.followsLongPause && current.timestamp !== null) {
      return true;
    }

    return current.isTransition && score >= TRANSITION_OVERRIDE_SCORE;
  }

  private timestampGapScore(previous: ParsedSentence, current: ParsedSentence): number {
    if (previous.timestamp === null || current.timestamp === null) {
      return 0;
    }

    if (current.followsLongPause) {
      return 1;
    }

    const gap = Math.max(current.timestamp - previous.timestamp, 0);
    return Math.min(gap / this.gapThresholdSeconds, 1);
  }

  // The first segment is kept even when small, so an introduction survives.
  private mergeSmall(segments: TopicSegment[]): TopicSegment[] {
    const merged: TopicSegment[] = [];

    for (const segment of segments) {
      const previous = merged[merged.length - 1];

      if (!previous || segment.sentences.length >= this.minSegmentSentences) {
        merged.push(segment);
        continue;
      }

      merged[merged.length - 1] = buildTopicSegment(previous.segmentIndex, [...previous.sentences, ...segment.sentences]);
    }

    if (merged.length < segments.length) {
      this.logger(`[segment] merged ${segments.length - merged.length} small segments`);
    }

    return reindexSegments(merged);
  }
}

function speakerTransitionScore(previous: ParsedSentence, current: ParsedSentence): number {
  if (previous.speaker === null || current.speaker === null || !current.speakerChanged) {
    return 0;
  }

  if (previous.speakerRole === "participant" && current.speakerRole === "instructor") {
    return 1;
  }

  return current.isTransition ? 0.8 : 0.3;
}

function semanticDistance(previous: ParsedSentence, current: ParsedSentence): number {
  const previousWords = contentWordSet(previous.text);
  const currentWords = contentWordSet(current.text);

  if (previousWords.size === 0 || currentWords.size === 0) {
    return 0.5;
  }

  return 1 - jaccardSimilarity(previousWords, currentWords);
}
