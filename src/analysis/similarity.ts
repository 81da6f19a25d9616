/**
 * Ratcliff/Obershelp string similarity.
 */

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

/**
 * Longest common substring of a[aLo..aHi) and b[bLo..bHi).
 * Ties go to the earliest start in `a`, then in `b`.
 */
function longestMatch(a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  // lengths[j] = length of the common suffix ending at a[i-1], b[j-1]
  let previous = new Array<number>(bHi - bLo + 1).fill(0);
  for (let i = aLo; i < aHi; i++) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const length = previous[j - bLo] + 1;
      current[j - bLo + 1] = length;
      const aStart = i - length + 1;
      const bStart = j - length + 1;
      if (
        length > best.size ||
        (length === best.size && (aStart < best.aStart || (aStart === best.aStart && bStart < best.bStart)))
      ) {
        best = { aStart, bStart, size: length };
      }
    }
    previous = current;
  }
  return best;
}

/**
 * Total characters in matching blocks, found by recursing on either side
 * of the longest common substring.
 */
function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const queue: [number, number, number, number][] = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const block = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;
    total += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      queue.push([aLo, block.aStart, bLo, block.bStart]);
    }
    if (block.aStart + block.size < aHi && block.bStart + block.size < bHi) {
      queue.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
    }
  }
  return total;
}

/**
 * Similarity in [0, 1]: 2·M / (|a| + |b|), where M is the number of
 * matching characters. Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1.0;
  }
  if (a === b) {
    return 1.0;
  }
  return (2 * matchingCharacters(a, b)) / total;
}
