export interface MatchingBlock {
  aStart: number;
  bStart: number;
  size: number;
}

/**
 * Ratcliff/Obershelp similarity: 2 * M / T where M is the number of characters
 * in the matching blocks and T the combined length. Two empty strings score 1.
 */
export function similarityRatio(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const total = left.length + right.length;
  if (total === 0) {
    return 1;
  }

  const matched = matchingBlocks(left, right).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
}

/**
 * Takes the longest common run, then recurses on the pieces to its left and
 * right. Blocks come back sorted by position.
 */
export function matchingBlocks(a: readonly string[], b: readonly string[]): MatchingBlock[] {
  const positions = indexPositions(b);
  const blocks: MatchingBlock[] = [];
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (pending.length) {
    const range = pending.pop();
    if (!range) {
      break;
    }

    const [aLo, aHi, bLo, bHi] = range;
    const block = findLongestMatch(a, positions, aLo, aHi, bLo, bHi);
    if (!block.size) {
      continue;
    }

    blocks.push(block);
    if (aLo < block.aStart && bLo < block.bStart) {
      pending.push([aLo, block.aStart, bLo, block.bStart]);
    }
    if (block.aStart + block.size < aHi && block.bStart + block.size < bHi) {
      pending.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
    }
  }

  return blocks.sort((x, y) => x.aStart - y.aStart || x.bStart - y.bStart);
}

function findLongestMatch(
  a: readonly string[],
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): MatchingBlock {
  let best: MatchingBlock = { aStart: aLo, bStart: bLo, size: 0 };
  // run lengths of matches ending at b[j] for the previous row of a
  let runs = new Map<number, number>();

  for (let i = aLo; i < aHi; i += 1) {
    const nextRuns = new Map<number, number>();
    for (const j of positions.get(a[i] ?? "") ?? []) {
      if (j < bLo) {
        continue;
      }
      if (j >= bHi) {
        break;
      }

      const size = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, size);
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    runs = nextRuns;
  }

  return best;
}

function indexPositions(b: readonly string[]): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  b.forEach((char, index) => {
    const list = positions.get(char);
    if (list) {
      list.push(index);
    } else {
      positions.set(char, [index]);
    }
  });
  return positions;
}
