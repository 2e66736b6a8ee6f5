/**
 * "Did you mean?" support for unknown key and section references.
 */

/**
 * Edit distance between two strings (insertions, deletions, substitutions).
 *
 * Uses two rolling rows, so memory is proportional to the shorter input.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  if (a.length > b.length) [a, b] = [b, a];

  let prev = Array.from({ length: a.length + 1 }, (_, i) => i);
  let curr = new Array<number>(a.length + 1).fill(0);

  for (let j = 1; j <= b.length; j++) {
    curr[0] = j;
    for (let i = 1; i <= a.length; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[i] = Math.min(
        (prev[i] ?? 0) + 1,
        (curr[i - 1] ?? 0) + 1,
        (prev[i - 1] ?? 0) + cost,
      );
    }
    [prev, curr] = [curr, prev];
  }

  return prev[a.length] ?? 0;
}

export interface FindSimilarOptions {
  /** Default: 2. */
  maxDistance?: number;
  /** Default: false. */
  caseSensitive?: boolean;
  /** Default: 3. */
  limit?: number;
}

/**
 * Candidates within `maxDistance` edits of `needle`, closest first and
 * alphabetical among ties.
 *
 * @example
 * findSimilar("prot", ["port", "host", "user"]) // ["port"]
 */
export function findSimilar(
  needle: string,
  haystack: Iterable<string>,
  options: FindSimilarOptions = {},
): string[] {
  const { maxDistance = 2, caseSensitive = false, limit = 3 } = options;
  const normalizedNeedle = caseSensitive ? needle : needle.toLowerCase();
  const matches: Array<{ value: string; distance: number }> = [];
  const seen = new Set<string>();

  for (const candidate of haystack) {
    if (seen.has(candidate)) continue;
    seen.add(candidate);
    const normalized = caseSensitive ? candidate : candidate.toLowerCase();
    const distance = levenshteinDistance(normalizedNeedle, normalized);
    if (distance <= maxDistance) matches.push({ value: candidate, distance });
  }

  matches.sort((a, b) => (a.distance !== b.distance ? a.distance - b.distance : a.value.localeCompare(b.value)));
  return matches.slice(0, limit).map((m) => m.value);
}

/** Suffix for an error message, or "" when nothing is close. */
export function formatSuggestion(suggestions: readonly string[]): string {
  if (suggestions.length === 0) return "";
  if (suggestions.length === 1) return ` Did you mean '${suggestions[0]}'?`;
  return ` Did you mean one of: ${suggestions.map((s) => `'${s}'`).join(", ")}?`;
}
