import { sequenceRatio } from "@/lib/grounding/sequence-ratio";
import { assertUnitInterval } from "@/lib/pipeline/errors";
import { escapeRegExp } from "@/lib/pipeline/keywords";
import cleaning from "@/lib/pipeline/transcript/cleaning.json";
import {
  extractSpeaker,
  extractTimestamp,
  formatTimestamp,
} from "@/lib/pipeline/transcript/parse-transcript";
import type { Logger } from "@/lib/pipeline/types";

export type TranscriptCleanerOptions = {
  extraFillerWords?: readonly string[];
  removeRepeatedLines?: boolean;
  repeatSimilarity?: number;
  logger?: Logger;
};

export const DEFAULT_FILLER_WORDS: readonly string[] = cleaning.fillerWords;

const TRANSCRIBER_TAGS = new Set<string>(cleaning.transcriberTags);
const TEMPLATE_PATTERNS = cleaning.templatePatterns.map((source) => new RegExp(`\\b(?:${source})\\b,?`, "gi"));
const VISUAL_MARKER_PATTERNS = cleaning.visualMarkerPatterns.map((source) => new RegExp(source, "i"));
const BRACKETED = /\[[^\]]*\]|\([^)]*\)/g;
const PLAIN_BRACKET_TAG = /^\[[\w\s]+\]$/;

const BLOCK_HEADER = /^(?:WEBVTT|NOTE|STYLE|REGION)(?:\s|$)/;
const CUE_TIMING = /^(?:(\d{1,2}):)?(\d{2}):(\d{2})(?:[.,]\d{1,3})?\s*-->/;
const VOICE_TAG = /^<v(?:\.[\w.-]+)?\s+([^>]+)>\s*/;
const MARKUP_TAG = /<\/?(?:v|c|i|b|u|lang|ruby|rt)(?:[.\s][^>]*)?>/g;
const INLINE_CUE_TIMESTAMP = /<(?:\d{1,2}:)?\d{2}:\d{2}\.\d{3}>/g;

/**
 * Two passes over a transcript. `cleanDocument` works line by line before
 * parsing: caption files (WebVTT/SRT cues, voice tags, NOTE blocks) become
 * `[HH:MM:SS] Name: text` lines and consecutive repeats are dropped.
 * `cleanSentence` strips speech noise from one parsed sentence.
 */
export class TranscriptCleaner {
  readonly fillerWords: readonly string[];
  private readonly fillerPatterns: RegExp[];
  private readonly removeRepeatedLines: boolean;
  private readonly repeatSimilarity: number;
  private readonly logger: Logger;

  constructor(options: TranscriptCleanerOptions = {}) {
    const extra = (options.extraFillerWords ?? []).map((word) => word.trim().toLowerCase()).filter(Boolean);

    // Longest first so "you know" goes before any shorter filler inside it.
    this.fillerWords = Array.from(new Set([...DEFAULT_FILLER_WORDS, ...extra])).sort(
      (left, right) => right.length - left.length,
    );
    this.fillerPatterns = this.fillerWords.map(
      (word) => new RegExp(`(?<![\\p{L}\\p{N}'])${escapeRegExp(word)}(?![\\p{L}\\p{N}']),?`, "giu"),
    );
    this.removeRepeatedLines = options.removeRepeatedLines ?? true;
    this.repeatSimilarity = options.repeatSimilarity ?? 0.9;
    this.logger = options.logger ?? (() => undefined);

    assertUnitInterval("repeatSimilarity", this.repeatSimilarity);
  }

  cleanDocument(rawTranscript: string): string {
    const lines = rawTranscript.split(/\r?\n/);
    const kept: string[] = [];
    let previous: { speaker: string | null; content: string } | null = null;
    let cueTimestamp: string | null = null;
    let skippingBlock = false;
    let captionLines = 0;
    let repeatedLines = 0;

    for (let index = 0; index < lines.length; index += 1) {
      const line = (lines[index] ?? "").trim();

      if (!line) {
        skippingBlock = false;
        cueTimestamp = null;
        continue;
      }

      if (skippingBlock || BLOCK_HEADER.test(line)) {
        skippingBlock = true;
        captionLines += 1;
        continue;
      }

      const timing = CUE_TIMING.exec(line);

      if (timing) {
        cueTimestamp = formatTimestamp(
          Number(timing[1] ?? 0) * 3600 + Number(timing[2]) * 60 + Number(timing[3]),
        );
        captionLines += 1;
        continue;
      }

      // Cue identifier: whatever sits directly above a timing line.
      if (CUE_TIMING.test((lines[index + 1] ?? "").trim())) {
        captionLines += 1;
        continue;
      }

      const voice = VOICE_TAG.exec(line);
      const body = (voice ? line.slice(voice[0].length) : line)
        .replace(MARKUP_TAG, "")
        .replace(INLINE_CUE_TIMESTAMP, "")
        .trim();

      if (!body) {
        continue;
      }

      const labelled = voice?.[1] ? `${voice[1].trim()}: ${body}` : body;
      const output = cueTimestamp ? `[${cueTimestamp}] ${labelled}` : labelled;
      const { speaker, text } = extractSpeaker(extractTimestamp(output).rest);
      const content = text.trim().toLowerCase();

      if (
        this.removeRepeatedLines &&
        previous !== null &&
        previous.speaker === speaker &&
        sequenceRatio(previous.content, content) >= this.repeatSimilarity
      ) {
        repeatedLines += 1;
        continue;
      }

      previous = { speaker, content };
      kept.push(output);
    }

    this.logger(`[clean] removed ${captionLines} caption lines, ${repeatedLines} repeated lines`);

    return kept.join("\n");
  }

  cleanSentence(sentence: string): string {
    let text = sentence.replace(BRACKETED, (group) => (this.isTranscriberTag(group) ? " " : group));

    for (const pattern of this.fillerPatterns) {
      text = text.replace(pattern, " ");
    }

    for (const pattern of TEMPLATE_PATTERNS) {
      text = text.replace(pattern, " ");
    }

    text = text
      .replace(/\s+([.!?,;:])/g, "$1")
      .replace(/([.!?])[.!?]+/g, "$1")
      .replace(/,(?:\s*,)+/g, ",")
      .replace(/,([.!?])/g, "$1")
      .replace(/\s{2,}/g, " ")
      .replace(/^[\s,;:]+/, "")
      .trim();

    return restoreCapital(sentence.trim(), text);
  }

  // Visual markers such as "[Slide 3]" describe the screen and stay.
  private isTranscriberTag(group: string): boolean {
    if (TRANSCRIBER_TAGS.has(group.toLowerCase())) {
      return true;
    }

    return PLAIN_BRACKET_TAG.test(group) && !VISUAL_MARKER_PATTERNS.some((pattern) => pattern.test(group));
  }
}

function restoreCapital(original: string, cleaned: string): string {
  if (/^\p{Lu}/u.test(original) && /^\p{Ll}/u.test(cleaned)) {
    return `${cleaned.charAt(0).toUpperCase()}${cleaned.slice(1)}`;
  }

  return cleaned;
}
