/**
 * String Similarity Utilities
 *
 * Levenshtein distance and "did you mean" suggestions for misspelled node
 * kinds and field names in JSON input.
 */

/**
 * Minimum number of single-character edits turning `a` into `b`.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev: number[] = Array.from({ length: b.length + 1 }, (_, j) => j);
  let curr: number[] = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[b.length];
}

/**
 * 1 for identical strings, 0 for strings sharing nothing.
 */
export function similarityScore(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 1;
  return 1 - levenshteinDistance(a, b) / maxLen;
}

export interface SimilarName {
  name: string;
  distance: number;
  score: number;
}

/**
 * Candidates within `maxDistance` edits of `target`, closest first.
 * Matching is case-insensitive so that "FlatMap" still finds "flatMap".
 */
export function findSimilarNames(
  target: string,
  candidates: readonly string[],
  maxDistance: number = 2,
  maxResults: number = 3
): SimilarName[] {
  const needle = target.toLowerCase();
  const results: SimilarName[] = [];

  for (const name of candidates) {
    if (name === target) continue;
    if (Math.abs(name.length - target.length) > maxDistance) continue;

    const distance = levenshteinDistance(needle, name.toLowerCase());
    if (distance <= maxDistance) {
      results.push({ name, distance, score: similarityScore(needle, name.toLowerCase()) });
    }
  }

  results.sort((a, b) => a.distance - b.distance || b.score - a.score);
  return results.slice(0, maxResults);
}

/**
 * "did you mean 'x'?" for the closest candidate, or undefined.
 */
export function suggestName(target: string, candidates: readonly string[]): string | undefined {
  const [best] = findSimilarNames(target, candidates, 2, 1);
  return best ? `did you mean '${best.name}'?` : undefined;
}
