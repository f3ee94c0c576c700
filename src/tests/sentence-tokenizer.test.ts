import { describe, expect, it } from "vitest";
import { tokenizeSentences } from "@/lib/pipeline/transcript/sentence-tokenizer";

describe("tokenizeSentences", () => {
  it("splits on terminal punctuation followed by a capitalised word", () => {
    expect(tokenizeSentences("Open the dashboard. Then click Save! Does it work? yes it does.")).toEqual([
      "Open the dashboard.",
      "Then click Save!",
      "Does it work? yes it does.",
    ]);
  });

  it("does not split after abbreviations", () => {
    expect(tokenizeSentences("Ask Dr. Smith about it. He knows.")).toEqual(["Ask Dr. Smith about it.", "He knows."]);
  });

  it("drops fragments shorter than four characters", () => {
    expect(tokenizeSentences("Ok. This stays.")).toEqual(["This stays."]);
  });

  it("returns nothing for blank input", () => {
    expect(tokenizeSentences("   ")).toEqual([]);
  });
});
