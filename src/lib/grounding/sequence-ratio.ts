type MatchingBlock = {
  leftStart: number;
  rightStart: number;
  size: number;
};

/**
 * Ratcliff/Obershelp similarity: twice the number of characters in matching
 * blocks divided by the combined length. 1 for two empty strings.
 */
export function sequenceRatio(left: string, right: string): number {
  const total = left.length + right.length;

  if (total === 0) {
    return 1;
  }

  const matched = matchingBlocks(left, right).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
}

export function matchingBlocks(left: string, right: string): MatchingBlock[] {
  const positions = indexPositions(right);
  const blocks: MatchingBlock[] = [];
  const queue: Array<[number, number, number, number]> = [[0, left.length, 0, right.length]];

  while (queue.length > 0) {
    const range = queue.pop();

    if (!range) {
      break;
    }

    const [leftLow, leftHigh, rightLow, rightHigh] = range;
    const block = longestMatch(left, positions, leftLow, leftHigh, rightLow, rightHigh);

    if (block.size === 0) {
      continue;
    }

    blocks.push(block);

    if (leftLow < block.leftStart && rightLow < block.rightStart) {
      queue.push([leftLow, block.leftStart, rightLow, block.rightStart]);
    }

    if (block.leftStart + block.size < leftHigh && block.rightStart + block.size < rightHigh) {
      queue.push([block.leftStart + block.size, leftHigh, block.rightStart + block.size, rightHigh]);
    }
  }

  return blocks.sort((first, second) => first.leftStart - second.leftStart);
}

function indexPositions(text: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();

  for (let index = 0; index < text.length; index += 1) {
    const char = text.charAt(index);
    const list = positions.get(char);

    if (list) {
      list.push(index);
    } else {
      positions.set(char, [index]);
    }
  }

  return positions;
}

// Earliest longest common run inside the given window.
function longestMatch(
  left: string,
  positions: Map<string, number[]>,
  leftLow: number,
  leftHigh: number,
  rightLow: number,
  rightHigh: number,
): MatchingBlock {
  let best: MatchingBlock = { leftStart: leftLow, rightStart: rightLow, size: 0 };
  let runLengths = new Map<number, number>();

  for (let leftIndex = leftLow; leftIndex < leftHigh; leftIndex += 1) {
    const nextRunLengths = new Map<number, number>();

    for (const rightIndex of positions.get(left.charAt(leftIndex)) ?? []) {
      if (rightIndex < rightLow) {
        continue;
      }

      if (rightIndex >= rightHigh) {
        break;
      }

      const length = (runLengths.get(rightIndex - 1) ?? 0) + 1;
      nextRunLengths.set(rightIndex, length);

      if (length > best.size) {
        best = { leftStart: leftIndex - length + 1, rightStart: rightIndex - length + 1, size: length };
      }
    }

    runLengths = nextRunLengths;
  }

  return best;
}
