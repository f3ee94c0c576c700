import lexicon from "@/lib/pipeline/lexicon.json";
import type { TranscriptCleaner } from "@/lib/pipeline/transcript/clean-transcript";
import { MIN_SENTENCE_LENGTH, tokenizeSentences } from "@/lib/pipeline/transcript/sentence-tokenizer";
import type { Logger, ParsedSentence, SpeakerRole, TranscriptMetadata } from "@/lib/pipeline/types";

export const DEFAULT_PAUSE_THRESHOLD_SECONDS = 90;

const TIMESTAMP_PATTERNS: RegExp[] = [
  /^\[(\d{1,2}):(\d{2}):(\d{2})(?:\.\d{3})?\]\s*/,
  /^\((\d{1,2}):(\d{2}):(\d{2})(?:\.\d{3})?\)\s*/,
  /^<(\d{1,2}):(\d{2}):(\d{2})(?:\.\d{3})?>?\s*/,
  /^(\d{1,2}):(\d{2}):(\d{2})(?:\.\d{3})?\s*-\s*/,
  /^(\d{1,2}):(\d{2}):(\d{2})(?:\.\d{3})?\s+/,
];

// A colon followed by "//" is a URL scheme, not a speaker label. Names must
// start with a capital letter.
const SPEAKER_PATTERNS: RegExp[] = [
  /^([Ss]peaker\s*\d*)\s*:(?!\/\/)\s*/,
  /^([A-Z][A-Za-z]+)\s*:(?!\/\/)\s*/,
  /^\[([Ss]peaker\s*\d*|[A-Z][A-Za-z]+)\]\s*:\s*/,
  /^>>\s*([Ss]peaker\s*\d*|[A-Z][A-Za-z]+)\s*:\s*/,
  /^\*\*([Ss]peaker\s*\d*|[A-Z][A-Za-z]+)\*\*\s*:\s*/,
];
const NON_SPEAKER_LABELS = new Set<string>(lexicon.nonSpeakerLabels);

const TRANSITION_PATTERNS: RegExp[] = [
  /\b(?:now|next|okay|alright|so),?\s+let['’]?s\s+/i,
  /\bmoving on\b/i,
  /\bnow (?:let['’]s|we['’]ll|we will)\b/i,
  /\bnext,?\s+(?:we['’]ll|we['’]re|we will|up|step|part|section)\b/i,
  /\b(?:first|second|third|finally|lastly)\b/i,
  /\bstep \d+\b/i,
  /\bpart \d+\b/i,
  /\blet['’]s talk about\b/i,
  /\blet['’]s discuss\b/i,
  /\blet['’]s move (?:on )?to\b/i,
  /\bthe next (?:thing|topic|item)\b/i,
];

const ALL_CAPS_PATTERN = /\b[A-Z]{3,}\b/;
const MARKDOWN_EMPHASIS_PATTERN = /\*\*[^*]+\*\*|__[^_]+__|[*_][^*_]+[*_]/;
const QUESTION_WORDS: readonly string[] = lexicon.questionWords;

export type ParseTranscriptOptions = {
  pauseThresholdSeconds?: number;
  // Without a cleaner, sentences keep the text exactly as spoken.
  cleaner?: TranscriptCleaner | null;
  logger?: Logger;
};

export type ParsedTranscript = {
  sentences: ParsedSentence[];
  metadata: TranscriptMetadata;
};

type SentenceDraft = {
  text: string;
  spokenText: string;
  rawText: string;
  timestamp: number | null;
  speaker: string | null;
};

export function parseTranscript(rawTranscript: string, options: ParseTranscriptOptions = {}): ParsedTranscript {
  const pauseThreshold = options.pauseThresholdSeconds ?? DEFAULT_PAUSE_THRESHOLD_SECONDS;
  const cleaner = options.cleaner ?? null;
  const drafts: SentenceDraft[] = [];
  const source = cleaner ? cleaner.cleanDocument(rawTranscript) : rawTranscript;

  for (const rawLine of source.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (!line) {
      continue;
    }

    const { timestamp, rest } = extractTimestamp(line);
    const { speaker, text } = extractSpeaker(rest);

    for (const spoken of tokenizeSentences(text.trim())) {
      const cleaned = cleaner ? cleaner.cleanSentence(spoken) : spoken;

      if (cleaned.length >= MIN_SENTENCE_LENGTH) {
        drafts.push({ text: cleaned, spokenText: spoken, rawText: line, timestamp, speaker });
      } else if (isTransition(spoken)) {
        // A bare "okay, let's move on" still marks a topic boundary.
        drafts.push({ text: spoken, spokenText: spoken, rawText: line, timestamp, speaker });
      }
    }
  }

  const primarySpeaker = findPrimarySpeaker(drafts);
  let lastTimestamp: number | null = null;

  const sentences = drafts.map((draft, index): ParsedSentence => {
    const previous = index > 0 ? drafts[index - 1] : undefined;
    const followsLongPause =
      draft.timestamp !== null && lastTimestamp !== null && draft.timestamp - lastTimestamp > pauseThreshold;
    const speakerChanged =
      previous !== undefined &&
      draft.speaker !== null &&
      previous.speaker !== null &&
      draft.speaker !== previous.speaker;

    if (draft.timestamp !== null) {
      lastTimestamp = draft.timestamp;
    }

    return {
      text: draft.text,
      rawText: draft.rawText,
      sentenceIndex: index,
      timestamp: draft.timestamp,
      speaker: draft.speaker,
      speakerRole: resolveRole(draft.speaker, primarySpeaker),
      isQuestion: isQuestion(draft.text),
      isTransition: isTransition(draft.spokenText),
      hasEmphasis: hasEmphasis(draft.spokenText),
      followsLongPause,
      speakerChanged,
    };
  });

  const metadata = buildMetadata(sentences, primarySpeaker);
  options.logger?.(
    `[parse] ${metadata.totalSentences} sentences, ${metadata.totalSpeakers} speakers` +
      (metadata.primarySpeaker ? `, primary ${metadata.primarySpeaker}` : ""),
  );

  return { sentences, metadata };
}

export function extractTimestamp(line: string): { timestamp: number | null; rest: string } {
  for (const pattern of TIMESTAMP_PATTERNS) {
    const match = pattern.exec(line);

    if (!match) {
      continue;
    }

    const hours = Number(match[1]);
    const minutes = Number(match[2]);
    const seconds = Number(match[3]);

    if (minutes >= 60 || seconds >= 60) {
      return { timestamp: null, rest: line };
    }

    return { timestamp: hours * 3600 + minutes * 60 + seconds, rest: line.slice(match[0].length) };
  }

  return { timestamp: null, rest: line };
}

export function extractSpeaker(line: string): { speaker: string | null; text: string } {
  for (const pattern of SPEAKER_PATTERNS) {
    const match = pattern.exec(line);

    if (match?.[1] && !NON_SPEAKER_LABELS.has(match[1].toLowerCase())) {
      return { speaker: match[1], text: line.slice(match[0].length) };
    }
  }

  return { speaker: null, text: line };
}

export function isQuestion(text: string): boolean {
  const trimmed = text.trim();

  if (trimmed.endsWith("?")) {
    return true;
  }

  const lower = trimmed.toLowerCase();
  return QUESTION_WORDS.some((word) => lower === word || lower.startsWith(`${word} `));
}

export function isTransition(text: string): boolean {
  return TRANSITION_PATTERNS.some((pattern) => pattern.test(text));
}

export function hasEmphasis(text: string): boolean {
  return ALL_CAPS_PATTERN.test(text) || MARKDOWN_EMPHASIS_PATTERN.test(text);
}

export function formatTimestamp(totalSeconds: number): string {
  const safe = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(safe / 3600);
  const minutes = Math.floor((safe % 3600) / 60);
  const seconds = safe % 60;

  return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
}

function countSpeakers(speakers: Array<string | null>): Map<string, number> {
  const counts = new Map<string, number>();

  for (const speaker of speakers) {
    if (speaker !== null) {
      counts.set(speaker, (counts.get(speaker) ?? 0) + 1);
    }
  }

  return counts;
}

// Ties go to whichever speaker appeared first.
function findPrimarySpeaker(drafts: SentenceDraft[]): string | null {
  let primary: string | null = null;
  let best = 0;

  for (const [speaker, count] of countSpeakers(drafts.map((draft) => draft.speaker))) {
    if (count > best) {
      primary = speaker;
      best = count;
    }
  }

  return primary;
}

function resolveRole(speaker: string | null, primarySpeaker: string | null): SpeakerRole | null {
  if (speaker === null) {
    return null;
  }

  return speaker === primarySpeaker ? "instructor" : "participant";
}

function buildMetadata(sentences: ParsedSentence[], primarySpeaker: string | null): TranscriptMetadata {
  const speakerCounts = countSpeakers(sentences.map((sentence) => sentence.speaker));
  const timestamps = sentences.flatMap((sentence) => (sentence.timestamp === null ? [] : [sentence.timestamp]));
  const primaryCount = primarySpeaker === null ? 0 : (speakerCounts.get(primarySpeaker) ?? 0);

  return {
    totalSentences: sentences.length,
    totalSpeakers: speakerCounts.size,
    speakerNames: Array.from(speakerCounts.keys()),
    durationSeconds: timestamps.length > 0 ? Math.max(...timestamps) : null,
    hasTimestamps: timestamps.length > 0,
    primarySpeaker,
    primarySpeakerRatio: sentences.length > 0 ? primaryCount / sentences.length : 0,
    hasQaSections: sentences.some((sentence) => sentence.isQuestion && sentence.speakerRole === "participant"),
    questionCount: sentences.filter((sentence) => sentence.isQuestion).length,
    transitionCount: sentences.filter((sentence) => sentence.isTransition).length,
  };
}
