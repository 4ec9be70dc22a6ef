/**
 * Typo detection for "Did you mean" hints.
 */

interface SimilarityOptions {
  maxDistance?: number;
  maxSuggestions?: number;
  caseInsensitive?: boolean;
}

interface SuggestionMatch {
  value: string;
  distance: number;
}

/**
 * Levenshtein edit distance between two strings.
 *
 * Keeps a single rolling row instead of the full matrix.
 *
 * @example
 * ```typescript
 * editDistance('kitten', 'sitting'); // 3
 * ```
 */
export function editDistance(from: string, to: string): number {
  let previous = Array.from({ length: to.length + 1 }, (_, j) => j);

  for (let i = 1; i <= from.length; i++) {
    const current = [i];
    for (let j = 1; j <= to.length; j++) {
      const cost = from[i - 1] === to[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }

  return previous[to.length] ?? 0;
}

function findMatches(
  input: string,
  candidates: readonly string[],
  maxDistance: number,
  caseInsensitive: boolean
): SuggestionMatch[] {
  const normalize = (value: string): string => (caseInsensitive ? value.toLowerCase() : value);
  const normalizedInput = normalize(input);

  return candidates
    .map((value) => ({ value, distance: editDistance(normalizedInput, normalize(value)) }))
    .filter((match) => match.value !== input && match.distance <= maxDistance)
    .sort((a, b) => a.distance - b.distance);
}

/**
 * Candidates within edit distance of the input, closest first.
 *
 * A candidate identical to the input is left out; one that differs only in
 * case is kept when comparing case-insensitively.
 */
export function findSimilar(
  input: string,
  candidates: readonly string[],
  options: SimilarityOptions = {}
): string[] {
  const { maxDistance = 3, maxSuggestions = 3, caseInsensitive = true } = options;
  return findMatches(input, candidates, maxDistance, caseInsensitive)
    .slice(0, maxSuggestions)
    .map((match) => match.value);
}

/**
 * Build a "Did you mean" line, or an empty string when nothing is close.
 *
 * @example
 * ```typescript
 * getSuggestion('imageresizecalc', ['ImageResizeCalculator'], { maxDistance: 6 });
 * // Returns: 'Did you mean: ImageResizeCalculator?'
 * ```
 */
export function getSuggestion(
  input: string,
  candidates: readonly string[],
  options: SimilarityOptions & { prefix?: string; suffix?: string } = {}
): string {
  const suggestions = findSimilar(input, candidates, options);
  if (suggestions.length === 0) return '';
  const { prefix = 'Did you mean: ', suffix = '?' } = options;
  return `${prefix}${suggestions.join(', ')}${suffix}`;
}
