/**
 * similarity.ts: Ratcliff/Obershelp similarity between two strings.
 *
 * ratio = 2·M / T, where T is the combined length and M the number of
 * characters in the matching blocks found by repeatedly taking the longest
 * common contiguous block and recursing on both sides of it. For a second
 * string of 200+ characters, characters occurring in more than 1% of it
 * (plus one) are not used to seed matches, mirroring the usual
 * "popular element" heuristic; blocks still extend across them.
 *
 * Strings are compared per code point.
 */

interface Match {
  a: number;
  b: number;
  size: number;
}

const POPULAR_MIN_LENGTH = 200;

function buildIndex(b: string[]): Map<string, number[]> {
  const index = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const positions = index.get(ch);
    if (positions) positions.push(j);
    else index.set(ch, [j]);
  });

  if (b.length >= POPULAR_MIN_LENGTH) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [ch, positions] of index) {
      if (positions.length > limit) index.delete(ch);
    }
  }
  return index;
}

function findLongestMatch(
  a: string[],
  b: string[],
  index: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): Match {
  let bestA = alo;
  let bestB = blo;
  let bestSize = 0;
  // lengths[j] = length of the match ending at a[i-1], b[j]
  let lengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of index.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (lengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestA = i - k + 1;
        bestB = j - k + 1;
        bestSize = k;
      }
    }
    lengths = next;
  }

  // Popular characters never seed a match; extend across them here.
  while (bestA > alo && bestB > blo && a[bestA - 1] === b[bestB - 1]) {
    bestA--;
    bestB--;
    bestSize++;
  }
  while (bestA + bestSize < ahi && bestB + bestSize < bhi && a[bestA + bestSize] === b[bestB + bestSize]) {
    bestSize++;
  }

  return { a: bestA, b: bestB, size: bestSize };
}

/** Total size of all matching blocks between `a` and `b`. */
export function countMatchingCharacters(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const index = buildIndex(right);

  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, left.length, 0, right.length]];
  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const match = findLongestMatch(left, right, index, alo, ahi, blo, bhi);
    if (match.size === 0) continue;

    matched += match.size;
    if (alo < match.a && blo < match.b) pending.push([alo, match.a, blo, match.b]);
    if (match.a + match.size < ahi && match.b + match.size < bhi) {
      pending.push([match.a + match.size, ahi, match.b + match.size, bhi]);
    }
  }
  return matched;
}

/** Similarity in [0, 1]; two empty strings are identical. */
export function similarityRatio(a: string, b: string): number {
  const total = Array.from(a).length + Array.from(b).length;
  if (total === 0) return 1;
  return (2 * countMatchingCharacters(a, b)) / total;
}
