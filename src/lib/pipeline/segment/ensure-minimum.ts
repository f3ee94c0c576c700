import { buildTopicSegment, reindexSegments } from "@/lib/pipeline/segment/topic-segment";
import type { TopicSegment } from "@/lib/pipeline/types";

/**
 * Splits the largest segment evenly until at least `minTotal` segments exist
 * or nothing is left to split. Returns a new, re-indexed list.
 */
export function ensureMinimumSegments(segments: TopicSegment[], minTotal: number): TopicSegment[] {
  let result = reindexSegments(segments);

  while (result.length < minTotal) {
    const largestIndex = findLargestSplittable(result);

    if (largestIndex === -1) {
      break;
    }

    const largest = result[largestIndex];

    if (!largest) {
      break;
    }

    const deficit = minTotal - result.length;
    const parts = splitEvenly(largest, deficit + 1);

    result = reindexSegments([...result.slice(0, largestIndex), ...parts, ...result.slice(largestIndex + 1)]);
  }

  return result;
}

// First of equally large segments wins; -1 when every segment has a single sentence.
function findLargestSplittable(segments: TopicSegment[]): number {
  let bestIndex = -1;
  let bestSize = 1;

  segments.forEach((segment, index) => {
    if (segment.sentences.length > bestSize) {
      bestIndex = index;
      bestSize = segment.sentences.length;
    }
  });

  return bestIndex;
}

function splitEvenly(segment: TopicSegment, requestedParts: number): TopicSegment[] {
  const total = segment.sentences.length;
  const parts = Math.min(requestedParts, total);
  const result: TopicSegment[] = [];

  for (let part = 0; part < parts; part += 1) {
    const start = Math.ceil((part * total) / parts);
    const end = Math.ceil(((part + 1) * total) / parts);

    result.push(buildTopicSegment(segment.segmentIndex, segment.sentences.slice(start, end), { fallbackSplit: true }));
  }

  return result;
}
