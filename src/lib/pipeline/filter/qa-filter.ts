import { assertUnitInterval, ConfigurationError } from "@/lib/pipeline/errors";
import type { Logger, QASection, TopicSegment } from "@/lib/pipeline/types";

export type QAFilterOptions = {
  minQaDensity?: number;
  minQuestions?: number;
  filterQaSections?: boolean;
  keepInstructorOnly?: boolean;
  logger?: Logger;
};

export type QAFilterStatistics = {
  totalSegments: number;
  qaSegments: number;
  filteredSegments: number;
  removedSegments: number;
  totalQuestions: number;
  totalSentences: number;
  questionsAfterFiltering: number;
  sentencesAfterFiltering: number;
  overallQaDensity: number;
  filterRate: number;
};

const INSTRUCTOR_QUESTION_RATE = 0.2;

export class QAFilter {
  readonly minQaDensity: number;
  readonly minQuestions: number;
  readonly filterQaSections: boolean;
  readonly keepInstructorOnly: boolean;
  private readonly logger: Logger;

  constructor(options: QAFilterOptions = {}) {
    this.minQaDensity = options.minQaDensity ?? 0.3;
    this.minQuestions = options.minQuestions ?? 2;
    this.filterQaSections = options.filterQaSections ?? true;
    this.keepInstructorOnly = options.keepInstructorOnly ?? false;
    this.logger = options.logger ?? (() => undefined);

    assertUnitInterval("minQaDensity", this.minQaDensity);

    if (this.minQuestions < 0) {
      throw new ConfigurationError(`minQuestions must be >= 0, got ${this.minQuestions}`);
    }
  }

  identifyQaSections(segments: TopicSegment[]): QASection[] {
    const sections: QASection[] = [];

    for (const segment of segments) {
      const section = this.describeSegment(segment);

      if (section?.isQaDense) {
        sections.push(section);
        this.logger(
          `[qa] segment ${segment.segmentIndex} is Q&A dense ` +
            `(${section.questionCount}/${section.totalSentences} questions)`,
        );
      }
    }

    return sections;
  }

  // Kept segments keep their segmentIndex.
  filterSegments(segments: TopicSegment[]): TopicSegment[] {
    if (!this.filterQaSections) {
      return segments;
    }

    const qaIndices = new Set(this.identifyQaSections(segments).map((section) => section.segmentIndex));
    const kept = segments.filter((segment) => {
      if (qaIndices.has(segment.segmentIndex)) {
        return false;
      }

      if (this.keepInstructorOnly && !isInstructorLed(segment)) {
        this.logger(`[qa] dropping segment ${segment.segmentIndex} led by ${segment.primarySpeaker ?? "unknown"}`);
        return false;
      }

      return true;
    });

    this.logger(`[qa] ${segments.length} -> ${kept.length} segments`);
    return kept;
  }

  getStatistics(segments: TopicSegment[]): QAFilterStatistics {
    const qaSegments = this.identifyQaSections(segments).length;
    const filtered = this.filterSegments(segments);
    const totalQuestions = countQuestions(segments);
    const totalSentences = countSentences(segments);
    const removedSegments = segments.length - filtered.length;

    return {
      totalSegments: segments.length,
      qaSegments,
      filteredSegments: filtered.length,
      removedSegments,
      totalQuestions,
      totalSentences,
      questionsAfterFiltering: countQuestions(filtered),
      sentencesAfterFiltering: countSentences(filtered),
      overallQaDensity: totalSentences > 0 ? totalQuestions / totalSentences : 0,
      filterRate: segments.length > 0 ? removedSegments / segments.length : 0,
    };
  }

  private describeSegment(segment: TopicSegment): QASection | null {
    const first = segment.sentences[0];
    const last = segment.sentences[segment.sentences.length - 1];

    if (!first || !last) {
      return null;
    }

    const questionCount = segment.sentences.filter((sentence) => sentence.isQuestion).length;
    const qaDensity = computeQaDensity(segment);
    const speakers = new Set(segment.sentences.flatMap((sentence) => (sentence.speaker === null ? [] : [sentence.speaker])));

    return {
      segmentIndex: segment.segmentIndex,
      startSentenceIndex: first.sentenceIndex,
      endSentenceIndex: last.sentenceIndex,
      questionCount,
      totalSentences: segment.sentences.length,
      qaDensity,
      isQaDense: qaDensity >= this.minQaDensity && questionCount >= this.minQuestions,
      primarySpeaker: segment.primarySpeaker,
      speakers: Array.from(speakers).sort(),
    };
  }
}

export function computeQaDensity(segment: TopicSegment): number {
  if (segment.sentences.length === 0) {
    return 0;
  }

  return segment.sentences.filter((sentence) => sentence.isQuestion).length / segment.sentences.length;
}

/**
 * A segment is instructor-led when its primary speaker carries the instructor
 * role. Without a role, a speaker asking fewer than one question in five
 * sentences is taken to be the instructor.
 */
export function isInstructorLed(segment: TopicSegment): boolean {
  const own = segment.sentences.filter((sentence) => sentence.speaker === segment.primarySpeaker);
  const first = own[0];

  if (!first) {
    return false;
  }

  if (first.speakerRole !== null) {
    return first.speakerRole === "instructor";
  }

  const questionRate = own.filter((sentence) => sentence.isQuestion).length / own.length;
  return questionRate < INSTRUCTOR_QUESTION_RATE;
}

function countQuestions(segments: TopicSegment[]): number {
  return segments.reduce((sum, segment) => sum + segment.sentences.filter((sentence) => sentence.isQuestion).length, 0);
}

function countSentences(segments: TopicSegment[]): number {
  return segments.reduce((sum, segment) => sum + segment.sentences.length, 0);
}
