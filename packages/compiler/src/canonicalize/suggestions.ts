/**
 * Name-similarity ranking for "did you mean" hints on failed lookups.
 * Suggestions are advisory and never change how a name resolves.
 */

export interface SuggestionOptions {
  /**
   * Largest edit distance still offered. Defaults to 1 for requested names
   * shorter than three characters and 2 otherwise.
   */
  maxDistance?: number;
  /** Defaults to 4. */
  limit?: number;
}

const DEFAULT_LIMIT = 4;

/** Levenshtein distance using two rolling rows. */
export const levenshteinDistance = (left: string, right: string): number => {
  const [a, b] = left.length > right.length ? [right, left] : [left, right];

  if (a.length === 0) return b.length;

  let previous = Array.from({ length: a.length + 1 }, (_, index) => index);
  let current = new Array<number>(a.length + 1).fill(0);

  for (let i = 1; i <= b.length; i += 1) {
    current[0] = i;
    for (let j = 1; j <= a.length; j += 1) {
      const cost = a[j - 1] === b[i - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[a.length] ?? 0;
};

/**
 * Candidates close to `requested`, closest first, ties broken by name.
 * Comparison ignores case.
 */
export const nearbyNames = (
  requested: string,
  candidates: Iterable<string>,
  options: SuggestionOptions = {}
): string[] => {
  const maxDistance = options.maxDistance ?? (requested.length < 3 ? 1 : 2);
  const limit = options.limit ?? DEFAULT_LIMIT;
  const needle = requested.toLowerCase();

  const matches: { name: string; distance: number }[] = [];
  for (const name of new Set(candidates)) {
    const distance = levenshteinDistance(needle, name.toLowerCase());
    if (distance <= maxDistance) {
      matches.push({ name, distance });
    }
  }

  matches.sort((left, right) =>
    left.distance !== right.distance
      ? left.distance - right.distance
      : left.name.localeCompare(right.name)
  );

  return matches.slice(0, limit).map((match) => match.name);
};
