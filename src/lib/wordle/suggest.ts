import { DEFAULT_CONFIG, type HelperConfig } from './config';
import type { ConstraintModel } from './constraints';
import type { Dictionary } from './dictionary';
import { evaluatorFor, verdictsToKey, type Evaluator } from './feedback';
import { containsAny, matchesFixed } from './filter';

/** Source of the one nondeterministic choice the helper makes. Inject a stub in tests. */
export type RandomSource = {
  pick<T>(items: readonly T[]): T;
};

export const mathRandom: RandomSource = {
  pick<T>(items: readonly T[]): T {
    if (items.length === 0) throw new Error('cannot pick from an empty list');
    return items[Math.floor(Math.random() * items.length)];
  },
};

export type SuggestionReason = 'starter' | 'random' | 'first' | 'middle' | 'search' | 'fallback';

export type Suggestion = {
  word: string;
  reason: SuggestionReason;
  /** Partition score of the winner; only set for `search`. */
  score?: number;
};

export type SuggestOptions = {
  /** Current candidates, frequency-ranked upstream. */
  candidates: readonly string[];
  constraints: ConstraintModel;
  /** Letters known to be absent; starters and pool words must avoid them. */
  forbiddenSoFar: ReadonlySet<string>;
  dictionary: Dictionary;
  random?: RandomSource;
  config?: HelperConfig;
};

export type GuessScore = {
  groups: number;
  largestGroup: number;
  score: number;
};

/**
 * Partition `candidates` by the verdicts `guess` would produce against each of them.
 * More groups and a smaller largest group both mean a sharper split.
 */
export function scoreGuessPartition(
  guess: string,
  candidates: readonly string[],
  evaluate: Evaluator,
): GuessScore {
  const buckets = new Map<string, number>();
  for (const c of candidates) {
    const key = verdictsToKey(evaluate(guess, c));
    buckets.set(key, (buckets.get(key) ?? 0) + 1);
  }
  let largestGroup = 0;
  for (const n of buckets.values()) if (n > largestGroup) largestGroup = n;
  const score = candidates.length === 0 ? 0 : buckets.size - largestGroup / candidates.length;
  return { groups: buckets.size, largestGroup, score };
}

/** Top ranked candidates followed by a bounded sample of dictionary words that fit the pinned slots. */
export function buildGuessPool(opts: SuggestOptions): string[] {
  const { candidates, constraints, forbiddenSoFar, dictionary, config = DEFAULT_CONFIG } = opts;
  const pool = candidates.slice(0, config.suggestion.topCandidates);

  let extra = 0;
  for (const w of dictionary.words) {
    if (extra >= config.suggestion.extraPoolSize) break;
    if (containsAny(w, forbiddenSoFar)) continue;
    if (!matchesFixed(w, constraints.fixed)) continue;
    pool.push(w);
    extra++;
  }
  return pool;
}

function starterOrRandom(opts: SuggestOptions, config: HelperConfig): Suggestion {
  const { dictionary, forbiddenSoFar, random = mathRandom } = opts;
  const starter = config.starterWords.find((w) => dictionary.has(w) && !containsAny(w, forbiddenSoFar));
  if (starter !== undefined) return { word: starter, reason: 'starter' };
  return { word: random.pick(dictionary.words), reason: 'random' };
}

/**
 * Pick the next word to try.
 * - no candidates: first usable starter word, else a random dictionary word
 * - 1..2 candidates: the best ranked one
 * - 3..5 candidates: the middle one
 * - otherwise: the pool word with the best partition score, plus a bonus if it could be the answer
 */
export function suggestNextWord(opts: SuggestOptions): Suggestion {
  const config = opts.config ?? DEFAULT_CONFIG;
  const { candidates } = opts;

  if (candidates.length === 0) return starterOrRandom(opts, config);
  if (candidates.length <= 2) return { word: candidates[0], reason: 'first' };
  if (candidates.length <= 5) return { word: candidates[Math.floor(candidates.length / 2)], reason: 'middle' };

  const evaluate = evaluatorFor(config.feedbackMode);
  const members = new Set(candidates);
  const pool = buildGuessPool({ ...opts, config });

  let bestGuess: string | null = null;
  let bestScore = -Infinity;
  for (const g of pool) {
    const { score } = scoreGuessPartition(g, candidates, evaluate);
    const total = score + (members.has(g) ? config.suggestion.memberBonus : 0);
    if (total > bestScore) {
      bestScore = total;
      bestGuess = g;
    }
  }

  if (bestGuess === null) return { word: candidates[0], reason: 'fallback' };
  return { word: bestGuess, reason: 'search', score: bestScore };
}
