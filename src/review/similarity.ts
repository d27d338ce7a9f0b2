/** Lower-cases, strips punctuation and collapses whitespace. */
export function normalizeForComparison(message: string): string {
  return message
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = curr;
  }
  return prev[b.length];
}

/** 1 - distance / longer length, on already-normalized strings. */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(a, b) / longest;
}

/**
 * Two messages say the same thing when, after normalization, one contains
 * the other or their edit-distance similarity reaches `threshold`.
 */
export function messagesMatch(a: string, b: string, threshold: number): boolean {
  const na = normalizeForComparison(a);
  const nb = normalizeForComparison(b);
  if (na === "" || nb === "") return na === nb;
  if (na.includes(nb) || nb.includes(na)) return true;
  return similarity(na, nb) >= threshold;
}
