import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@/lib/pipeline/errors";
import { TopicRanker } from "@/lib/pipeline/rank/topic-ranker";
import { buildTopicSegment } from "@/lib/pipeline/segment/topic-segment";
import { parseTranscript } from "@/lib/pipeline/transcript/parse-transcript";

function segment(index: number, lines: string[]) {
  return buildTopicSegment(index, parseTranscript(lines.join("\n")).sentences);
}

const settings = segment(0, ["Open the settings page.", "Click save."]);
const smallTalk = segment(1, ["We had a great time.", "The weather was nice."]);
const portal = segment(2, ["First, open the portal.", "Then click create."]);

describe("TopicRanker", () => {
  it("scores procedural content", () => {
    const score = new TopicRanker().scoreSegment(settings);

    expect(score.proceduralScore).toBeCloseTo(0.675);
    expect(score.actionDensity).toBeCloseTo(0.5);
    expect(score.coherenceScore).toBe(0);
    expect(score.importanceScore).toBeCloseTo(0.42);
    expect(score.weightedProcedural).toBeCloseTo(0.27);
  });

  it("gives conversation without actions no importance", () => {
    const score = new TopicRanker().scoreSegment(smallTalk);

    expect(score.importanceScore).toBe(0);
  });

  it("counts sequence cues in the procedural score", () => {
    const ranker = new TopicRanker();

    expect(ranker.computeProceduralScore(portal)).toBeCloseTo(0.875);
    expect(ranker.scoreSegment(portal).importanceScore).toBeCloseTo(0.5);
  });

  it("ranks by importance and filters low-importance segments", () => {
    const ranker = new TopicRanker();

    expect(ranker.rankByImportance([smallTalk, settings, portal]).map((entry) => entry.segmentIndex)).toEqual([2, 0, 1]);
    expect(ranker.filterLowImportance([settings, smallTalk, portal]).map((entry) => entry.segmentIndex)).toEqual([0, 2]);
    expect(ranker.filterLowImportance([settings, smallTalk], 0.45)).toEqual([]);
  });

  it("keeps only the top N segments in transcript order", () => {
    const ranker = new TopicRanker({ keepTopN: 1 });

    expect(ranker.filterLowImportance([settings, smallTalk, portal]).map((entry) => entry.segmentIndex)).toEqual([2]);
  });

  it("builds a ranking report", () => {
    const report = new TopicRanker().getRankingReport([settings, smallTalk]);

    expect(report.totalSegments).toBe(2);
    expect(report.scores[0]).toEqual({
      segmentIndex: 0,
      importance: 0.42,
      procedural: 0.675,
      actionDensity: 0.5,
      coherence: 0,
    });
    expect(report.statistics).toMatchObject({
      minImportance: 0,
      highImportanceCount: 0,
      mediumImportanceCount: 1,
      lowImportanceCount: 1,
    });
    expect(report.statistics?.avgImportance).toBeCloseTo(0.21);
  });

  it("reports nothing for no segments", () => {
    expect(new TopicRanker().getRankingReport([])).toEqual({ totalSegments: 0, scores: [], statistics: null });
  });

  it("rejects invalid configuration", () => {
    expect(() => new TopicRanker({ weights: { procedural: 0.6 } })).toThrow(ConfigurationError);
    expect(() => new TopicRanker({ keepTopN: 0 })).toThrow(ConfigurationError);
  });
});
