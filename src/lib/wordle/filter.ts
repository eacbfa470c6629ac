import { DEFAULT_CONFIG, frequencyWeight, type HelperConfig } from './config';
import type { ConstraintModel } from './constraints';
import type { Dictionary } from './dictionary';

export type FilterStats = {
  original: number;
  afterPattern: number;
  /** Present only when `required` was non-empty. */
  afterInclusion?: number;
  /** Present only when `forbidden` was non-empty. */
  afterExclusion?: number;
};

export type FilterOptions = {
  /** Rank by summed letter frequency weights. Default true. */
  sortByFrequency?: boolean;
  /** Keep only the first N results after ranking. */
  limit?: number;
};

export type FilterResult = {
  words: string[];
  stats: FilterStats;
};

export function matchesFixed(word: string, fixed: readonly (string | null)[]): boolean {
  if (word.length !== fixed.length) return false;
  for (let i = 0; i < fixed.length; i++) {
    const slot = fixed[i];
    if (slot !== null && word[i] !== slot) return false;
  }
  return true;
}

export function letterCounts(letters: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const l of letters) counts.set(l, (counts.get(l) ?? 0) + 1);
  return counts;
}

/** Every required letter occurs in `word` at least as often as it is listed. */
export function satisfiesRequired(word: string, required: ReadonlyMap<string, number>): boolean {
  const have = letterCounts(word);
  for (const [letter, n] of required) {
    if ((have.get(letter) ?? 0) < n) return false;
  }
  return true;
}

export function containsAny(word: string, letters: ReadonlySet<string>): boolean {
  for (const ch of word) if (letters.has(ch)) return true;
  return false;
}

/** Sum of letter weights, added up in hundredths so that anagrams score exactly alike. */
export function frequencyScore(word: string, config: HelperConfig = DEFAULT_CONFIG): number {
  let hundredths = 0;
  for (const ch of word) hundredths += Math.round(frequencyWeight(ch, config) * 100);
  return hundredths / 100;
}

/** Descending by frequency score; equal scores keep their input order. */
export function rankByFrequency(words: readonly string[], config: HelperConfig = DEFAULT_CONFIG): string[] {
  return words
    .map((word) => ({ word, score: frequencyScore(word, config) }))
    .sort((a, b) => b.score - a.score)
    .map((x) => x.word);
}

/**
 * Select the dictionary words consistent with `constraints`.
 * Stages run in order: positional pattern, inclusion, exclusion, ranking, limit.
 * The dictionary is never touched; the returned list is always fresh.
 */
export function findWords(
  dictionary: Dictionary,
  constraints: ConstraintModel,
  opts: FilterOptions = {},
  config: HelperConfig = DEFAULT_CONFIG,
): FilterResult {
  const { sortByFrequency = true, limit } = opts;
  const stats: FilterStats = { original: dictionary.size, afterPattern: 0 };

  let words = dictionary.words.filter((w) => matchesFixed(w, constraints.fixed));
  stats.afterPattern = words.length;

  if (constraints.required.length > 0) {
    const required = letterCounts(constraints.required);
    words = words.filter((w) => satisfiesRequired(w, required));
    stats.afterInclusion = words.length;
  }

  if (constraints.forbidden.length > 0) {
    const forbidden = new Set(constraints.forbidden);
    words = words.filter((w) => !containsAny(w, forbidden));
    stats.afterExclusion = words.length;
  }

  if (sortByFrequency && words.length > 0) words = rankByFrequency(words, config);

  if (limit !== undefined && limit > 0 && words.length > limit) words = words.slice(0, limit);

  return { words, stats };
}
