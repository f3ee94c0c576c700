import { describe, expect, it } from "vitest";
import { extractActionTargets, significantWords } from "@/lib/grounding/grounding-session";
import { SourceReferenceManager } from "@/lib/grounding/source-reference-manager";
import type { SimilarityScorer } from "@/lib/grounding/similarity";
import { ConfigurationError } from "@/lib/pipeline/errors";
import { parseTranscript } from "@/lib/pipeline/transcript/parse-transcript";
import type { GeneratedStep } from "@/types/steps";

const TRANSCRIPT = [
  "[00:00:05] Alice: Open the storage account blade in the portal.",
  "[00:00:15] Alice: Select the access keys section and copy the connection string.",
  "[00:00:25] Alice: We had lunch at noon yesterday.",
].join("\n");

const STEP: GeneratedStep = {
  title: "Copy storage account connection string",
  summary: "Get the connection string for the storage account",
  details: "Open the storage account blade and copy the connection string from access keys",
  actions: ["Open the storage account blade", "Select access keys", "Copy the connection string"],
};

function wordOnlyManager() {
  return new SourceReferenceManager({ similarityScorer: null, weights: { word: 1, semantic: 0 } });
}

async function openSession(manager = wordOnlyManager()) {
  return manager.openSession(parseTranscript(TRANSCRIPT).sentences, { documentId: "doc-1" });
}

describe("GroundingSession transcript matching", () => {
  it("cites the sentences that share enough words with the step", async () => {
    const session = await openSession();
    const data = await session.buildStepSources(0, STEP);

    expect(data.sources.map((source) => source.sentenceIndex)).toEqual([1, 0]);
    expect(data.sources.map((source) => source.timestamp)).toEqual(["00:00:15", "00:00:05"]);
    expect(data.sources[0]?.confidence).toBeCloseTo(0.512);
    expect(data.sources[1]?.confidence).toBeCloseTo(0.417714, 5);
    expect(data.overallConfidence).toBeCloseTo(0.563451, 5);
    expect(data.hasTranscriptSupport).toBe(true);
    expect(data.hasVisualSupport).toBe(false);
    expect(data.validationFlags).toEqual(["Medium confidence (0.56) - generally reliable"]);
    expect(data.stepContent).toBe(`${STEP.summary} ${STEP.details}`);
  });

  it("penalises sentences that were already cited", async () => {
    const session = await openSession();

    const first = await session.buildStepSources(0, STEP);
    expect(session.getReuseCount(1)).toBe(1);

    const second = await session.buildStepSources(1, STEP);
    expect(session.getReuseCount(1)).toBe(2);

    expect(second.sources[0]?.confidence).toBeCloseTo(0.437);
    expect(second.sources[0]?.confidence ?? 1).toBeLessThan(first.sources[0]?.confidence ?? 0);
    expect(second.overallConfidence).toBeLessThan(first.overallConfidence);
    expect(session.getAllStepSources().map((entry) => entry.stepIndex)).toEqual([0, 1]);
  });

  it("gives a step without any matching content zero confidence", async () => {
    const session = await openSession();
    const data = await session.buildStepSources(0, {
      title: "Order pizza",
      summary: "",
      details: "",
      actions: [],
    });

    expect(data.sources).toEqual([]);
    expect(data.overallConfidence).toBe(0);
    expect(manager().validateStep(data).isValid).toBe(false);
  });

  it("scores technical sentences once per session", async () => {
    const session = await openSession();

    expect(session.sentenceCount).toBe(3);
    expect(session.getTechnicalScore(0)).toBeCloseTo(0.16);
    expect(session.getTechnicalScore(2)).toBe(0);
    expect(session.similarityCacheSize).toBe(0);
  });

  it("keeps reuse counts separate between sessions", async () => {
    const sharedManager = wordOnlyManager();
    const first = await openSession(sharedManager);
    const second = await openSession(sharedManager);

    await first.buildStepSources(0, STEP);

    expect(first.getReuseCount(1)).toBe(1);
    expect(second.getReuseCount(1)).toBe(0);
  });

  it("warms the lexical scorer cache with every sentence", async () => {
    const session = await openSession(new SourceReferenceManager());
    await session.buildStepSources(0, STEP);

    expect(session.similarityCacheSize).toBe(4);
  });
});

describe("GroundingSession knowledge and visual matching", () => {
  it("adds knowledge excerpts that resemble the step", async () => {
    const session = await openSession();
    const searchText = `${STEP.title} ${STEP.summary} ${STEP.details} ${STEP.actions.join(" ")}`;
    const data = await session.buildStepSources(0, STEP, {
      knowledgeSources: [
        { url: "https://docs.example.com/keys", title: "Access keys", content: searchText, type: "web" },
        { url: "https://docs.example.com/broken", title: "Broken", content: searchText, type: "web", error: "timeout" },
        { url: "https://docs.example.com/other", title: "Other", content: "zzzz", type: "web" },
      ],
    });

    const knowledge = data.sources.filter((source) => source.type === "knowledge");

    expect(knowledge).toHaveLength(1);
    expect(knowledge[0]).toMatchObject({
      url: "https://docs.example.com/keys",
      title: "Access keys",
      excerpt: searchText,
    });
    expect(knowledge[0]?.confidence).toBeCloseTo(0.88);
    expect(data.sources.map((source) => source.type)).toEqual(["transcript", "transcript", "knowledge"]);
  });

  it("matches UI elements named by the step actions", async () => {
    const session = await openSession();
    const data = await session.buildStepSources(0, STEP, {
      screenshots: [{ filename: "keys.png", content: "zzz", uiElements: [{ text: "Access keys", type: "menu" }] }],
    });

    const visual = data.sources.filter((source) => source.type === "visual");

    expect(visual).toEqual([
      {
        type: "visual",
        excerpt: "Screenshot showing menu: 'Access keys'",
        confidence: 0.8,
        screenshotRef: "keys.png",
        uiElements: ["Access keys"],
      },
    ]);
    expect(data.hasVisualSupport).toBe(true);
    expect(data.overallConfidence).toBeCloseTo(0.563451, 5);
  });

  it("extracts action targets after the first visual verb", () => {
    expect(extractActionTargets(["Click the Create button", "Wait a moment", "Open an editor"])).toEqual([
      "create button",
      "editor",
    ]);
  });

  it("compares sentences on their de-duplicated keywords", () => {
    expect(Array.from(significantWords("Open the Portal, then open it."))).toEqual(["open", "the", "portal", "then"]);
  });
});

describe("GroundingSession with a custom scorer", () => {
  function constantScorer(value: number): SimilarityScorer {
    return {
      name: `constant-${value}`,
      createContext: () => ({
        warm: async () => undefined,
        similarity: () => value,
        cacheSize: 0,
      }),
    };
  }

  it("scores a non-finite similarity as zero", async () => {
    const broken = await openSession(new SourceReferenceManager({ similarityScorer: constantScorer(Number.NaN) }));
    const silent = await openSession(new SourceReferenceManager({ similarityScorer: constantScorer(0) }));

    const data = await broken.buildStepSources(0, STEP);

    expect(data).toEqual(await silent.buildStepSources(0, STEP));
    expect(Number.isFinite(data.overallConfidence)).toBe(true);
  });

  it("caps similarity above one", async () => {
    const loud = await openSession(new SourceReferenceManager({ similarityScorer: constantScorer(7) }));
    const full = await openSession(new SourceReferenceManager({ similarityScorer: constantScorer(1) }));

    expect(await loud.buildStepSources(0, STEP)).toEqual(await full.buildStepSources(0, STEP));
  });
});

describe("SourceReferenceManager", () => {
  it("rejects weights that do not sum to 1", () => {
    expect(() => new SourceReferenceManager({ weights: { word: 0.6 } })).toThrow(ConfigurationError);
  });

  it("rejects impossible limits", () => {
    expect(() => new SourceReferenceManager({ maxTranscriptSources: 0 })).toThrow(ConfigurationError);
    expect(() => new SourceReferenceManager({ minSimilarity: 2 })).toThrow(ConfigurationError);
  });

  it("exposes confidence helpers", () => {
    const subject = manager();

    expect(subject.calculateConfidence([{ type: "transcript", excerpt: "x", confidence: 0.4 }])).toBe(0.4);
    expect(subject.enhanceConfidenceWithValidation(0.5, 0.5)).toBeCloseTo(0.5);
    expect(subject.getConfidenceLevelLabel(0.6)).toBe("High");
    expect(subject.getConfidenceQualityIndicator(0.2)).toBe("low");
  });
});

function manager() {
  return new SourceReferenceManager();
}
