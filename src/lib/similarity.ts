export type SimilarityOptions = {
  /**
   * When `b` has 200 or more characters, characters filling more than 1% of
   * it (plus one) cannot start a match; they only extend one. Default true.
   */
  autojunk?: boolean;
};

/**
 * Ratcliff/Obershelp "gestalt" similarity: twice the number of matched
 * characters over the combined length, where matches are found by taking the
 * longest common block and recursing on both sides of it.
 */
export function matchedCharacters(
  a: readonly string[],
  b: readonly string[],
  options: SimilarityOptions = {},
): number {
  const b2j = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const list = b2j.get(ch);
    if (list) list.push(j);
    else b2j.set(ch, [j]);
  });
  if ((options.autojunk ?? true) && b.length >= 200) {
    const ceiling = Math.floor(b.length / 100) + 1;
    for (const [ch, positions] of b2j) {
      if (positions.length > ceiling) b2j.delete(ch);
    }
  }

  const longest = (alo: number, ahi: number, blo: number, bhi: number) => {
    let bestI = alo;
    let bestJ = blo;
    let bestSize = 0;
    let j2len = new Map<number, number>();
    for (let i = alo; i < ahi; i++) {
      const next = new Map<number, number>();
      for (const j of b2j.get(a[i]) ?? []) {
        if (j < blo) continue;
        if (j >= bhi) break;
        const k = (j2len.get(j - 1) ?? 0) + 1;
        next.set(j, k);
        if (k > bestSize) {
          bestI = i - k + 1;
          bestJ = j - k + 1;
          bestSize = k;
        }
      }
      j2len = next;
    }
    // popular characters are matched only around a seeded block
    while (bestI > alo && bestJ > blo && a[bestI - 1] === b[bestJ - 1]) {
      bestI--;
      bestJ--;
      bestSize++;
    }
    while (bestI + bestSize < ahi && bestJ + bestSize < bhi && a[bestI + bestSize] === b[bestJ + bestSize]) {
      bestSize++;
    }
    return { i: bestI, j: bestJ, size: bestSize };
  };

  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const m = longest(alo, ahi, blo, bhi);
    if (m.size === 0) continue;
    total += m.size;
    if (alo < m.i && blo < m.j) queue.push([alo, m.i, blo, m.j]);
    if (m.i + m.size < ahi && m.j + m.size < bhi) queue.push([m.i + m.size, ahi, m.j + m.size, bhi]);
  }
  return total;
}

/** Similarity in [0, 1] of two descriptions, compared trimmed and lowercased. */
export function similarity(
  a: string | null | undefined,
  b: string | null | undefined,
  options: SimilarityOptions = {},
): number {
  const left = Array.from((a ?? "").trim().toLowerCase());
  const right = Array.from((b ?? "").trim().toLowerCase());
  if (left.length === 0 || right.length === 0) return 0;
  return (2 * matchedCharacters(left, right, options)) / (left.length + right.length);
}
