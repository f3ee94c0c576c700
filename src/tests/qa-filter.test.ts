import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@/lib/pipeline/errors";
import { computeQaDensity, isInstructorLed, QAFilter } from "@/lib/pipeline/filter/qa-filter";
import { buildTopicSegment } from "@/lib/pipeline/segment/topic-segment";
import { parseTranscript } from "@/lib/pipeline/transcript/parse-transcript";

const LESSON = [
  "Alice: Open the billing page.",
  "Alice: Choose the monthly view.",
  "Alice: Export the report as CSV.",
  "Bob: Where does the export go?",
  "Carol: Can we schedule it?",
  "Bob: Is there an API?",
  "Alice: Yes, the API supports schedules.",
  "Alice: Use the reports endpoint.",
].join("\n");

function lessonSegments() {
  const { sentences } = parseTranscript(LESSON);
  return [buildTopicSegment(0, sentences.slice(0, 4)), buildTopicSegment(1, sentences.slice(4))];
}

describe("QAFilter", () => {
  it("identifies Q&A-dense segments", () => {
    const sections = new QAFilter().identifyQaSections(lessonSegments());

    expect(sections).toEqual([
      {
        segmentIndex: 1,
        startSentenceIndex: 4,
        endSentenceIndex: 7,
        questionCount: 2,
        totalSentences: 4,
        qaDensity: 0.5,
        isQaDense: true,
        primarySpeaker: "Alice",
        speakers: ["Alice", "Bob", "Carol"],
      },
    ]);
  });

  it("drops Q&A-dense segments and keeps the original indices", () => {
    const kept = new QAFilter().filterSegments(lessonSegments());

    expect(kept.map((segment) => segment.segmentIndex)).toEqual([0]);
  });

  it("passes segments through when filtering is disabled", () => {
    const segments = lessonSegments();

    expect(new QAFilter({ filterQaSections: false }).filterSegments(segments)).toBe(segments);
  });

  it("reports filtering statistics", () => {
    expect(new QAFilter().getStatistics(lessonSegments())).toEqual({
      totalSegments: 2,
      qaSegments: 1,
      filteredSegments: 1,
      removedSegments: 1,
      totalQuestions: 3,
      totalSentences: 8,
      questionsAfterFiltering: 1,
      sentencesAfterFiltering: 4,
      overallQaDensity: 0.375,
      filterRate: 0.5,
    });
  });

  it("can keep only instructor-led segments", () => {
    const { sentences } = parseTranscript(LESSON);
    const bobOnly = buildTopicSegment(1, [sentences[3], sentences[5]].flatMap((sentence) => (sentence ? [sentence] : [])));
    const segments = [buildTopicSegment(0, sentences.slice(0, 3)), bobOnly];

    const kept = new QAFilter({ keepInstructorOnly: true, minQuestions: 5 }).filterSegments(segments);

    expect(kept.map((segment) => segment.segmentIndex)).toEqual([0]);
  });

  it("rejects invalid configuration", () => {
    expect(() => new QAFilter({ minQaDensity: 1.2 })).toThrow(ConfigurationError);
    expect(() => new QAFilter({ minQuestions: -1 })).toThrow(ConfigurationError);
  });
});

describe("isInstructorLed", () => {
  it("falls back to the question rate when speakers have no role", () => {
    const steady = parseTranscript("Open the page.\nClick save now.").sentences;
    const curious = parseTranscript("Open the page.\nIs it there?").sentences;

    expect(isInstructorLed(buildTopicSegment(0, steady))).toBe(true);
    expect(isInstructorLed(buildTopicSegment(0, curious))).toBe(false);
  });
});

describe("computeQaDensity", () => {
  it("is the share of question sentences", () => {
    const [, second] = lessonSegments();

    expect(second && computeQaDensity(second)).toBe(0.5);
    expect(computeQaDensity(buildTopicSegment(0, []))).toBe(0);
  });
});
