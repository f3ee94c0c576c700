import lexicon from "@/lib/pipeline/lexicon.json";

const CODE_KEYWORDS: readonly string[] = lexicon.codeKeywords;
const TECHNICAL_TERMS: readonly string[] = lexicon.technicalTerms;
const ACTION_VERBS: readonly string[] = lexicon.technicalActionVerbs;

const NUMBER_PATTERN = /\d+/;
const URL_PATTERN = /https?:\/\/|www\./;
const PERCENTAGE_PATTERN = /\d+%/;
const MEASUREMENT_PATTERN = /\d+\s*(?:ms|kb|mb|gb|tb|rpm|dpi|px)/;
const STRUCTURAL_MARKER_PATTERN = /\[screen\s+shows|\[diagram|\[code|\[architecture/;
// Apostrophes inside words ("it's") are not quotes.
const QUOTE_PATTERN = /["`]|(?<!\p{L})'|'(?!\p{L})/gu;

/**
 * How specific a sentence is, in [0, 1]. Code keywords, domain terms,
 * numbers, URLs, measurements, quoted names and action verbs all add to it;
 * sentences under five words are halved.
 */
export function calculateTechnicalScore(sentence: string): number {
  const lower = sentence.toLowerCase();
  const words = lower.split(/\s+/).filter(Boolean);
  const tokens = new Set(words);
  let score = 0;

  for (const keyword of CODE_KEYWORDS) {
    if (tokens.has(keyword)) {
      score += 0.15;
    }
  }

  for (const term of TECHNICAL_TERMS) {
    if (lower.includes(term)) {
      score += 0.1;
    }
  }

  if (NUMBER_PATTERN.test(sentence)) {
    score += 0.05;
  }

  if (URL_PATTERN.test(lower)) {
    score += 0.1;
  }

  if (PERCENTAGE_PATTERN.test(sentence)) {
    score += 0.08;
  }

  if (MEASUREMENT_PATTERN.test(lower)) {
    score += 0.12;
  }

  const quoteCount = sentence.match(QUOTE_PATTERN)?.length ?? 0;
  score += Math.min(0.15, quoteCount * 0.05);

  if (ACTION_VERBS.some((verb) => lower.includes(verb))) {
    score += 0.06;
  }

  if (STRUCTURAL_MARKER_PATTERN.test(lower)) {
    score += 0.1;
  }

  if (words.length < 5) {
    score *= 0.5;
  } else if (words.length > 15) {
    score += 0.05;
  }

  return Math.min(1, Math.max(0, score));
}
