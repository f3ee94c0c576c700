import { describe, expect, it } from "vitest";
import {
  cosineSimilarity,
  EmbeddingSimilarityScorer,
  LexicalSimilarityScorer,
  termCosine,
  termVector,
  type Embedder,
} from "@/lib/grounding/similarity";

const VECTORS: Record<string, number[]> = {
  north: [1, 0],
  "north east": [1, 1],
  south: [-1, 0],
};

function fakeEmbedder(calls: string[][]): Embedder {
  return async (texts) => {
    calls.push(texts);
    return texts.map((text) => VECTORS[text] ?? [0, 1]);
  };
}

describe("term vectors", () => {
  it("counts lower-cased terms", () => {
    expect(termVector("Open open PORTAL")).toEqual(
      new Map([
        ["open", 2],
        ["portal", 1],
      ]),
    );
  });

  it("compares term vectors by cosine", () => {
    expect(termCosine(termVector("open the portal"), termVector("Open the portal"))).toBeCloseTo(1);
    expect(termCosine(termVector("alpha"), termVector("beta"))).toBe(0);
    expect(termCosine(termVector(""), termVector("beta"))).toBe(0);
  });

  it("returns 0 for vectors of different length", () => {
    expect(cosineSimilarity([1, 0], [1])).toBe(0);
  });
});

describe("LexicalSimilarityScorer", () => {
  it("caches term vectors per context", async () => {
    const context = new LexicalSimilarityScorer().createContext();

    await context.warm(["open the portal", "close the portal"]);

    expect(context.cacheSize).toBe(2);
    expect(context.similarity("open portal", "open portal")).toBeCloseTo(1);
    expect(context.similarity("alpha beta", "gamma")).toBe(0);
  });
});

describe("EmbeddingSimilarityScorer", () => {
  it("embeds unique texts in batches and compares by cosine", async () => {
    const calls: string[][] = [];
    const scorer = new EmbeddingSimilarityScorer({ embed: fakeEmbedder(calls), batchSize: 2 });
    const context = scorer.createContext(() => undefined);

    await context.warm(["north", "north east", "north", "south"]);
    await context.warm(["north"]);

    expect(calls).toEqual([["north", "north east"], ["south"]]);
    expect(context.cacheSize).toBe(3);
    expect(context.similarity("north", "north east")).toBeCloseTo(Math.SQRT1_2);
    expect(context.similarity("north", "south")).toBe(0);
  });

  it("falls back to lexical similarity for texts it never embedded", async () => {
    const context = new EmbeddingSimilarityScorer({ embed: fakeEmbedder([]) }).createContext(() => undefined);

    await context.warm(["north"]);

    expect(context.similarity("north", "north")).toBe(1);
    expect(context.similarity("north pole", "north pole")).toBeCloseTo(1);
  });

  it("degrades to lexical similarity when embedding fails", async () => {
    const messages: string[] = [];
    const failing: Embedder = async () => {
      throw new Error("service unavailable");
    };
    const scorer = new EmbeddingSimilarityScorer({ embed: failing, retry: { maxRetries: 0 } });
    const context = scorer.createContext((message) => messages.push(message));

    await context.warm(["open the portal"]);

    expect(messages).toEqual([
      "[similarity] embedding failed, falling back to lexical similarity: service unavailable",
    ]);
    expect(context.cacheSize).toBe(0);
    expect(context.similarity("open the portal", "open the portal")).toBeCloseTo(1);
  });

  it("retries a failed batch before giving up", async () => {
    const messages: string[] = [];
    let attempts = 0;
    const flaky: Embedder = async (texts) => {
      attempts += 1;

      if (attempts === 1) {
        throw new Error("rate limited");
      }

      return texts.map(() => [1, 0]);
    };
    const context = new EmbeddingSimilarityScorer({
      embed: flaky,
      retry: { maxRetries: 1, baseDelayMs: 0 },
    }).createContext((message) => messages.push(message));

    await context.warm(["alpha", "beta"]);

    expect(attempts).toBe(2);
    expect(messages).toEqual(["[similarity] embedding attempt 1 failed (rate limited), retrying in 0ms"]);
    expect(context.similarity("alpha", "beta")).toBe(1);
  });

  it("treats a short embedding response as a failure", async () => {
    const messages: string[] = [];
    const short: Embedder = async () => [[1, 0]];
    const context = new EmbeddingSimilarityScorer({ embed: short, retry: { maxRetries: 0 } }).createContext((message) =>
      messages.push(message),
    );

    await context.warm(["alpha", "beta"]);

    expect(messages).toEqual([
      "[similarity] embedding failed, falling back to lexical similarity: expected 2 embeddings, got 1",
    ]);
  });
});
