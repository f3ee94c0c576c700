import { describe, expect, it } from "vitest";
import { parseSimilarityMode, resolveSimilarityScorer } from "@/lib/config/similarity";
import { LexicalSimilarityScorer } from "@/lib/grounding/similarity";
import { ConfigurationError } from "@/lib/pipeline/errors";

describe("similarity configuration", () => {
  it("accepts the known modes", () => {
    expect(parseSimilarityMode("lexical")).toBe("lexical");
    expect(parseSimilarityMode("embedding")).toBe("embedding");
    expect(parseSimilarityMode("none")).toBe("none");
  });

  it("rejects unknown modes", () => {
    expect(() => parseSimilarityMode("fuzzy")).toThrow(ConfigurationError);
  });

  it("resolves scorers without touching the network", () => {
    expect(resolveSimilarityScorer("none")).toBeNull();
    expect(resolveSimilarityScorer("lexical")).toBeInstanceOf(LexicalSimilarityScorer);
  });
});
