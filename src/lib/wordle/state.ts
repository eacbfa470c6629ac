import { countOf, type ConstraintModel } from './constraints';
import type { Verdict } from './feedback';

/**
 * Derive the next constraint model from one round of feedback on `guess`.
 *
 * Two passes, in this order:
 * 1. Pin every `correct` letter into `fixed`.
 * 2. Reconcile against the pinned slots:
 *    - `correct`: drop one copy of the letter from `required`, the slot now accounts for it.
 *    - `present`: add the letter to `required` when it is not yet known at all, or when it is pinned
 *      elsewhere (a second copy); leave `required` alone when it is only known through `required`.
 *    - `absent`: forbid the letter unless it is already pinned or required, in which case it only means
 *      "no copies beyond those".
 *
 * The prior model is not modified.
 */
export function applyFeedback(
  prior: ConstraintModel,
  guess: string,
  verdicts: readonly Verdict[],
): ConstraintModel {
  if (guess.length !== prior.fixed.length || verdicts.length !== prior.fixed.length) {
    throw new Error(`guess and verdicts must both have length ${prior.fixed.length}`);
  }

  const fixed = [...prior.fixed];
  const required = [...prior.required];
  const forbidden = [...prior.forbidden];

  for (let i = 0; i < verdicts.length; i++) {
    if (verdicts[i] === 'correct') fixed[i] = guess[i];
  }

  for (let i = 0; i < verdicts.length; i++) {
    const letter = guess[i];
    const pinned = countOf(fixed, letter);
    const listed = countOf(required, letter);

    switch (verdicts[i]) {
      case 'correct': {
        const at = required.indexOf(letter);
        if (at >= 0) required.splice(at, 1);
        break;
      }
      case 'present':
        if (pinned + listed === 0 || pinned > 0) required.push(letter);
        break;
      case 'absent':
        if (pinned === 0 && listed === 0 && !forbidden.includes(letter)) forbidden.push(letter);
        break;
    }
  }

  return { fixed, required, forbidden };
}
