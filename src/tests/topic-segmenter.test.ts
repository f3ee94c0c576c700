import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@/lib/pipeline/errors";
import { ensureMinimumSegments } from "@/lib/pipeline/segment/ensure-minimum";
import { buildTopicSegment, computeCoherence, getSegmentText } from "@/lib/pipeline/segment/topic-segment";
import { TopicSegmenter } from "@/lib/pipeline/segment/topic-segmenter";
import { parseTranscript } from "@/lib/pipeline/transcript/parse-transcript";

const TWO_TOPICS = [
  "[00:00:00] Speaker 1: We start with the storage account setup.",
  "[00:00:10] Speaker 1: Create the container in the portal.",
  "[00:00:20] Speaker 1: Upload the sample files there.",
  "[00:01:55] Speaker 1: Queue messages arrive from producers.",
  "[00:02:05] Speaker 1: Consumers read them in batches.",
  "[00:02:15] Speaker 1: Failed messages go to a dead letter queue.",
].join("\n");

function sentencesOf(lines: string[]) {
  return parseTranscript(lines.join("\n")).sentences;
}

describe("TopicSegmenter", () => {
  it("splits on a long pause into two topics", () => {
    const { sentences } = parseTranscript(TWO_TOPICS);
    const segments = new TopicSegmenter({ minTotalSegments: 2 }).segment(sentences);

    expect(segments).toHaveLength(2);
    expect(segments[0]).toMatchObject({
      segmentIndex: 0,
      startTimestamp: 0,
      endTimestamp: 20,
      durationSeconds: 20,
      primarySpeaker: "Speaker 1",
      speakerCounts: { "Speaker 1": 3 },
      fallbackSplit: false,
    });
    expect(segments[1]).toMatchObject({
      segmentIndex: 1,
      startTimestamp: 115,
      endTimestamp: 135,
      fallbackSplit: false,
    });
    expect(segments[1]?.sentences.map((sentence) => sentence.sentenceIndex)).toEqual([3, 4, 5]);
  });

  it("splits the largest segment when below the minimum segment count", () => {
    const { sentences } = parseTranscript(TWO_TOPICS);
    const segments = new TopicSegmenter().segment(sentences);

    expect(segments.map((segment) => segment.sentences.length)).toEqual([2, 1, 3]);
    expect(segments.map((segment) => segment.fallbackSplit)).toEqual([true, true, false]);
    expect(segments.map((segment) => segment.segmentIndex)).toEqual([0, 1, 2]);
  });

  it("treats a transition phrase as a boundary", () => {
    const sentences = sentencesOf([
      "We open the storage account page.",
      "The account keys live here.",
      "Next, let's configure alerts.",
      "Alerts need an action group.",
    ]);
    const segmenter = new TopicSegmenter({ minTotalSegments: 1 });

    expect(segmenter.identifyBoundaries(sentences)).toEqual([0, 2]);

    const [, second] = segmenter.segment(sentences);

    if (!second) {
      throw new Error("expected two segments");
    }

    expect(second.hasTransitionStart).toBe(true);
    expect(getSegmentText(second)).toBe("Next, let's configure alerts. Alerts need an action group.");
  });

  it("merges segments smaller than the minimum size into the previous one", () => {
    const sentences = sentencesOf([
      "We open the storage account page.",
      "The account keys live here.",
      "Next, let's configure alerts.",
      "Now let's review billing.",
      "Billing shows monthly totals.",
    ]);
    const segments = new TopicSegmenter({ minTotalSegments: 1 }).segment(sentences);

    expect(segments.map((segment) => segment.sentences.length)).toEqual([3, 2]);
    expect(segments.map((segment) => segment.segmentIndex)).toEqual([0, 1]);
  });

  it("scores a participant handing back to the instructor as a full speaker transition", () => {
    const sentences = sentencesOf([
      "Alice: Today we cover deployments.",
      "Alice: Open the release page.",
      "Bob: Where is the release page?",
      "Alice: It sits under the Builds menu.",
    ]);
    const segmenter = new TopicSegmenter();
    const [, second, third, fourth] = sentences;

    if (!second || !third || !fourth) {
      throw new Error("expected four sentences");
    }

    expect(segmenter.computeBoundarySignals(third, fourth)).toEqual({
      timestampGap: 0,
      speakerTransition: 1,
      transitionPhrase: 0,
      semantic: 0,
      score: 0.25,
    });
    expect(segmenter.computeBoundarySignals(second, third).speakerTransition).toBe(0.3);
  });

  it("returns no segments for no sentences", () => {
    expect(new TopicSegmenter().segment([])).toEqual([]);
  });

  it("rejects invalid configuration", () => {
    expect(() => new TopicSegmenter({ weights: { timestampGap: 0.5 } })).toThrow(ConfigurationError);
    expect(() => new TopicSegmenter({ boundaryThreshold: 1.5 })).toThrow(ConfigurationError);
    expect(() => new TopicSegmenter({ minTotalSegments: 0 })).toThrow(ConfigurationError);
  });
});

describe("ensureMinimumSegments", () => {
  it("stops when no segment has more than one sentence", () => {
    const [only] = sentencesOf(["Open the portal now."]);

    if (!only) {
      throw new Error("expected one sentence");
    }

    const segments = ensureMinimumSegments([buildTopicSegment(0, [only])], 3);

    expect(segments).toHaveLength(1);
    expect(segments[0]?.fallbackSplit).toBe(false);
  });

  it("splits into as many parts as the deficit needs", () => {
    const sentences = sentencesOf([
      "Open the portal.",
      "Select the account.",
      "Copy the key.",
      "Paste the key.",
    ]);
    const segments = ensureMinimumSegments([buildTopicSegment(0, sentences)], 3);

    expect(segments.map((segment) => segment.sentences.map((sentence) => sentence.sentenceIndex))).toEqual([
      [0, 1],
      [2],
      [3],
    ]);
  });
});

describe("computeCoherence", () => {
  it("averages pairwise content-word overlap", () => {
    const sentences = sentencesOf(["Deploy the storage account.", "Storage account keys rotate."]);

    expect(computeCoherence(sentences)).toBeCloseTo(0.4);
  });

  it("is 1 for a single sentence and neutral when no words compare", () => {
    expect(computeCoherence(sentencesOf(["Deploy the storage account."]))).toBe(1);
    expect(computeCoherence(sentencesOf(["Yes it is.", "Uh huh ok."]))).toBe(0.5);
  });
});
