import { escapeRegExp } from "@/lib/pipeline/keywords";
import lexicon from "@/lib/pipeline/lexicon.json";

const ABBREVIATION_PATTERN = new RegExp(
  `\\b(${lexicon.abbreviations.map((abbreviation) => escapeRegExp(abbreviation)).join("|")})\\.`,
  "gi",
);
const PERIOD_PLACEHOLDER = "\u0000";
const PLACEHOLDER_PATTERN = /\u0000/g;
const SENTENCE_END = /([.!?]+)\s+(?=["'“‘]?[A-Z])/;

export const MIN_SENTENCE_LENGTH = 4;

/**
 * Splits a line of speech into sentences on terminal punctuation followed by
 * whitespace and a capitalised word. Abbreviation periods ("Dr.", "e.g.") are
 * protected, and fragments shorter than MIN_SENTENCE_LENGTH are dropped.
 */
export function tokenizeSentences(text: string): string[] {
  const protectedText = text.replace(ABBREVIATION_PATTERN, `$1${PERIOD_PLACEHOLDER}`);
  const parts = protectedText.split(SENTENCE_END);
  const sentences: string[] = [];

  for (let index = 0; index < parts.length; index += 2) {
    const body = parts[index] ?? "";
    const punctuation = parts[index + 1] ?? "";
    const sentence = `${body}${punctuation}`.replace(PLACEHOLDER_PATTERN, ".").trim();

    if (sentence.length >= MIN_SENTENCE_LENGTH) {
      sentences.push(sentence);
    }
  }

  return sentences;
}
