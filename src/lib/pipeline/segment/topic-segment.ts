import { contentWordSet, jaccardSimilarity } from "@/lib/pipeline/keywords";
import type { ParsedSentence, TopicSegment } from "@/lib/pipeline/types";

type BuildSegmentOptions = {
  fallbackSplit?: boolean;
};

export function buildTopicSegment(
  segmentIndex: number,
  sentences: ParsedSentence[],
  options: BuildSegmentOptions = {},
): TopicSegment {
  const timestamps = sentences.flatMap((sentence) => (sentence.timestamp === null ? [] : [sentence.timestamp]));
  const startTimestamp = timestamps.length > 0 ? Math.min(...timestamps) : null;
  const endTimestamp = timestamps.length > 0 ? Math.max(...timestamps) : null;
  const speakerCounts: Record<string, number> = {};
  let primarySpeaker: string | null = null;

  for (const sentence of sentences) {
    if (sentence.speaker === null) {
      continue;
    }

    const count = (speakerCounts[sentence.speaker] ?? 0) + 1;
    speakerCounts[sentence.speaker] = count;

    if (primarySpeaker === null || count > (speakerCounts[primarySpeaker] ?? 0)) {
      primarySpeaker = sentence.speaker;
    }
  }

  return {
    segmentIndex,
    sentences,
    startTimestamp,
    endTimestamp,
    durationSeconds: startTimestamp !== null && endTimestamp !== null ? endTimestamp - startTimestamp : null,
    primarySpeaker,
    speakerCounts,
    hasTransitionStart: sentences[0]?.isTransition ?? false,
    hasQaSection: sentences.some((sentence) => sentence.isQuestion && sentence.speakerRole === "participant"),
    questionCount: sentences.filter((sentence) => sentence.isQuestion).length,
    coherenceScore: computeCoherence(sentences),
    fallbackSplit: options.fallbackSplit ?? false,
  };
}

export function getSegmentText(segment: TopicSegment): string {
  return segment.sentences.map((sentence) => sentence.text).join(" ");
}

export function reindexSegments(segments: TopicSegment[]): TopicSegment[] {
  return segments.map((segment, index) => (segment.segmentIndex === index ? segment : { ...segment, segmentIndex: index }));
}

/**
 * Mean pairwise Jaccard similarity of sentence content words.
 * Pairs where either side has no content words are skipped; with no pair left
 * the segment is scored neutral (0.5).
 */
export function computeCoherence(sentences: ParsedSentence[]): number {
  if (sentences.length < 2) {
    return 1;
  }

  const wordSets = sentences.map((sentence) => contentWordSet(sentence.text));
  let total = 0;
  let pairs = 0;

  for (let left = 0; left < wordSets.length; left += 1) {
    for (let right = left + 1; right < wordSets.length; right += 1) {
      const leftWords = wordSets[left];
      const rightWords = wordSets[right];

      if (!leftWords || !rightWords || leftWords.size === 0 || rightWords.size === 0) {
        continue;
      }

      total += jaccardSimilarity(leftWords, rightWords);
      pairs += 1;
    }
  }

  return pairs === 0 ? 0.5 : total / pairs;
}
