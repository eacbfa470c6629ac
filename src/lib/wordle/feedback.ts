import type { FeedbackMode } from './config';

export type Verdict = 'correct' | 'present' | 'absent';

/** Notation symbols: `+` correct, `?` present elsewhere, `-` absent. */
export type VerdictSymbol = '+' | '?' | '-';

export const VERDICT_SYMBOLS: Readonly<Record<Verdict, VerdictSymbol>> = {
  correct: '+',
  present: '?',
  absent: '-',
};

const SYMBOL_VERDICTS: Readonly<Record<VerdictSymbol, Verdict>> = {
  '+': 'correct',
  '?': 'present',
  '-': 'absent',
};

export function isVerdictSymbol(ch: string): ch is VerdictSymbol {
  return ch === '+' || ch === '?' || ch === '-';
}

export function symbolToVerdict(ch: VerdictSymbol): Verdict {
  return SYMBOL_VERDICTS[ch];
}

function assertSameLength(guess: string, target: string): void {
  if (guess.length !== target.length) throw new Error('guess/target must have the same length');
}

/**
 * Per-position verdicts for (guess, target), without letter consumption:
 * a guess letter that occurs anywhere in the target is `present` at every non-matching position,
 * even if the target holds fewer copies. Suggestion partitioning and the interactive notation expect this.
 */
export function compareWords(guess: string, target: string): Verdict[] {
  assertSameLength(guess, target);
  const res: Verdict[] = [];
  for (let i = 0; i < guess.length; i++) {
    if (guess[i] === target[i]) res.push('correct');
    else if (target.includes(guess[i])) res.push('present');
    else res.push('absent');
  }
  return res;
}

/**
 * Verdicts as the game itself reports them: a guess letter is `present` only while the target still has a
 * copy of it that no exact match or earlier `present` has used up. Selected by `feedbackMode: 'strict'`.
 */
export function compareWordsStrict(guess: string, target: string): Verdict[] {
  assertSameLength(guess, target);
  const res: Verdict[] = Array.from({ length: guess.length }, () => 'absent');
  const remaining: Record<string, number> = {};

  // Exact matches; count the target letters they leave unmatched.
  for (let i = 0; i < guess.length; i++) {
    if (guess[i] === target[i]) {
      res[i] = 'correct';
    } else {
      const ch = target[i];
      remaining[ch] = (remaining[ch] ?? 0) + 1;
    }
  }

  for (let i = 0; i < guess.length; i++) {
    if (res[i] === 'correct') continue;
    const ch = guess[i];
    const n = remaining[ch] ?? 0;
    if (n > 0) {
      res[i] = 'present';
      remaining[ch] = n - 1;
    }
  }

  return res;
}

export type Evaluator = (guess: string, target: string) => Verdict[];

export function evaluatorFor(mode: FeedbackMode): Evaluator {
  return mode === 'strict' ? compareWordsStrict : compareWords;
}

/** Compact key such as `+?--+`, used for grouping and display. */
export function verdictsToKey(verdicts: readonly Verdict[]): string {
  return verdicts.map((v) => VERDICT_SYMBOLS[v]).join('');
}

export function isVerdictKey(s: string, length = 5): boolean {
  return s.length === length && Array.from(s).every(isVerdictSymbol);
}

export function keyToVerdicts(key: string): Verdict[] {
  return Array.from(key).map((ch) => {
    if (!isVerdictSymbol(ch)) throw new Error(`invalid verdict symbol '${ch}'`);
    return symbolToVerdict(ch);
  });
}

export function isAllCorrect(verdicts: readonly Verdict[]): boolean {
  return verdicts.length > 0 && verdicts.every((v) => v === 'correct');
}
