import lexicon from "@/lib/pipeline/lexicon.json";

export const COHERENCE_STOPWORDS: readonly string[] = lexicon.coherenceStopwords;
export const MATCH_STOPWORDS: readonly string[] = lexicon.matchStopwords;

const COHERENCE_STOPWORD_SET = new Set(COHERENCE_STOPWORDS);
const MATCH_STOPWORD_SET = new Set(MATCH_STOPWORDS);
const EDGE_PUNCTUATION = /^[.,!?;:()[\]{}"']+|[.,!?;:()[\]{}"']+$/g;

type ExtractKeywordOptions = {
  stopwords?: readonly string[];
  minLength?: number;
};

// Ordered, de-duplicated keywords. Words shorter than minLength + 1 are dropped.
export function extractKeywords(text: string, options: ExtractKeywordOptions = {}): string[] {
  const stopwordSet = new Set((options.stopwords ?? MATCH_STOPWORDS).map((word) => normalizeToken(word)));
  const minLength = options.minLength ?? 2;

  const tokens = text
    .split(/\s+/)
    .map((token) => normalizeToken(token))
    .filter((token) => token.length > minLength)
    .filter((token) => !stopwordSet.has(token));

  const unique: string[] = [];
  const seen = new Set<string>();

  for (const token of tokens) {
    if (seen.has(token)) {
      continue;
    }

    seen.add(token);
    unique.push(token);
  }

  return unique;
}

export function normalizeToken(token: string): string {
  return token.trim().toLowerCase().replace(EDGE_PUNCTUATION, "");
}

/**
 * Content words used for coherence and the semantic boundary signal:
 * punctuation removed, longer than three characters, and not a filler word.
 */
export function contentWordSet(text: string): Set<string> {
  const words = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .split(/\s+/)
    .filter((word) => word.length > 3 && !COHERENCE_STOPWORD_SET.has(word));

  return new Set(words);
}

export function isMatchStopword(word: string): boolean {
  return MATCH_STOPWORD_SET.has(word);
}

export function jaccardSimilarity(left: ReadonlySet<string>, right: ReadonlySet<string>): number {
  if (left.size === 0 && right.size === 0) {
    return 0;
  }

  let intersection = 0;

  for (const word of left) {
    if (right.has(word)) {
      intersection += 1;
    }
  }

  const union = left.size + right.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

export function countShared(left: ReadonlySet<string>, right: ReadonlySet<string>): number {
  let shared = 0;

  for (const word of left) {
    if (right.has(word)) {
      shared += 1;
    }
  }

  return shared;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Whole-word (or whole-phrase) occurrences of term in already lower-cased text.
export function countTermHits(lowerText: string, term: string): number {
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}'])${escapeRegExp(term.toLowerCase())}(?![\\p{L}\\p{N}'])`, "gu");
  return lowerText.match(pattern)?.length ?? 0;
}
