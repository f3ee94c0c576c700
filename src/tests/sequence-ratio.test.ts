import { describe, expect, it } from "vitest";
import { matchingBlocks, sequenceRatio } from "@/lib/grounding/sequence-ratio";

describe("sequenceRatio", () => {
  it("measures shared character runs", () => {
    expect(sequenceRatio("abcd", "bcde")).toBe(0.75);
    expect(sequenceRatio("abc", "abc")).toBe(1);
    expect(sequenceRatio("abc", "")).toBe(0);
    expect(sequenceRatio("", "")).toBe(1);
  });

  it("collects matching blocks on both sides of the longest match", () => {
    expect(matchingBlocks("abxcd", "abcd")).toEqual([
      { leftStart: 0, rightStart: 0, size: 2 },
      { leftStart: 3, rightStart: 2, size: 2 },
    ]);
    expect(sequenceRatio("abxcd", "abcd")).toBeCloseTo(8 / 9);
  });
});
