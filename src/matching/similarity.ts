import * as fuzz from 'fuzzball';

/**
 * Lowercases and drops every character that is not ASCII alphanumeric
 */
export function normalize(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Fuzzy similarity between two show names, using the token sort ratio of
 * their normalized forms
 * @returns Ratio in [0, 1]; 0 when either side normalizes to nothing
 */
export function similarity(a: string, b: string): number {
  const normA = normalize(a);
  const normB = normalize(b);

  if (!normA || !normB) {
    return 0;
  }

  return fuzz.token_sort_ratio(normA, normB) / 100;
}
