import { DEFAULT_CONFIG, isAlphabetLetter, type ConflictPolicy, type HelperConfig } from './config';
import { ValidationError } from './errors';

/**
 * What is known about the hidden word.
 * - `fixed`: one slot per position, `null` when the letter there is unknown.
 * - `required`: multiset of letters present somewhere, each repeat raising the minimum count.
 * - `forbidden`: letters absent from the word, no repeats.
 *
 * Replaced wholesale each round; never mutated.
 */
export type ConstraintModel = {
  readonly fixed: readonly (string | null)[];
  readonly required: readonly string[];
  readonly forbidden: readonly string[];
};

/** Unvalidated user input, e.g. `м_тр_`, `о`, `узк`. */
export type RawConstraints = {
  fixed?: string;
  required?: string;
  forbidden?: string;
};

export function emptyConstraints(config: HelperConfig = DEFAULT_CONFIG): ConstraintModel {
  return {
    fixed: Array.from({ length: config.wordLength }, () => null),
    required: [],
    forbidden: [],
  };
}

export function isEmptyConstraints(c: ConstraintModel): boolean {
  return c.required.length === 0 && c.forbidden.length === 0 && c.fixed.every((s) => s === null);
}

export function countOf(letters: Iterable<string | null>, letter: string): number {
  let n = 0;
  for (const l of letters) if (l === letter) n++;
  return n;
}

export function fixedLetters(c: ConstraintModel): string[] {
  return c.fixed.filter((s): s is string => s !== null);
}

function uniqueSorted(letters: Iterable<string>): string[] {
  return Array.from(new Set(letters)).sort();
}

function intersect(a: Iterable<string>, b: Iterable<string>): string[] {
  const right = new Set(b);
  return uniqueSorted(Array.from(a).filter((l) => right.has(l)));
}

function checkLetters(value: string, name: string, config: HelperConfig): string[] {
  const letters = Array.from(value);
  const bad = letters.filter((l) => !isAlphabetLetter(l, config));
  if (bad.length > 0) {
    throw new ValidationError(
      `Parameter ${name} must contain only alphabet letters, got: ${uniqueSorted(bad).join(', ')}`,
      uniqueSorted(bad),
    );
  }
  return letters;
}

/**
 * Rejects a model that contradicts itself. `forbidden` may never share a letter with `fixed` or `required`;
 * whether `fixed` and `required` may overlap depends on `policy`.
 */
export function checkConflicts(c: ConstraintModel, policy: ConflictPolicy = DEFAULT_CONFIG.conflictPolicy): void {
  const pinned = fixedLetters(c);

  if (policy === 'strict') {
    const both = intersect(pinned, c.required);
    if (both.length > 0) {
      throw new ValidationError(
        `Letters ${both.join(', ')} are both fixed and required: a letter with a known position cannot also be unplaced`,
        both,
      );
    }
  }

  const fixedVsForbidden = intersect(pinned, c.forbidden);
  if (fixedVsForbidden.length > 0) {
    throw new ValidationError(
      `Letters ${fixedVsForbidden.join(', ')} are both fixed and forbidden: a letter known to be in the word cannot be excluded`,
      fixedVsForbidden,
    );
  }

  const requiredVsForbidden = intersect(c.required, c.forbidden);
  if (requiredVsForbidden.length > 0) {
    throw new ValidationError(
      `Letters ${requiredVsForbidden.join(', ')} are both required and forbidden: a letter cannot be present and absent at once`,
      requiredVsForbidden,
    );
  }
}

/**
 * Validate and normalize raw input into a `ConstraintModel`.
 * Runs before any filtering so a bad query never produces partial stats.
 */
export function validateConstraints(raw: RawConstraints, config: HelperConfig = DEFAULT_CONFIG): ConstraintModel {
  const fixedRaw = (raw.fixed ?? config.wildcard.repeat(config.wordLength)).toLowerCase();
  const requiredRaw = (raw.required ?? '').toLowerCase();
  const forbiddenRaw = (raw.forbidden ?? '').toLowerCase();

  const slots = Array.from(fixedRaw);
  if (slots.length !== config.wordLength) {
    throw new ValidationError(
      `Parameter fixed must be exactly ${config.wordLength} symbols, got: ${slots.length}`,
    );
  }
  const badSlots = slots.filter((s) => s !== config.wildcard && !isAlphabetLetter(s, config));
  if (badSlots.length > 0) {
    throw new ValidationError(
      `Parameter fixed must contain only alphabet letters and '${config.wildcard}', got: ${uniqueSorted(badSlots).join(', ')}`,
      uniqueSorted(badSlots),
    );
  }

  const model: ConstraintModel = {
    fixed: slots.map((s) => (s === config.wildcard ? null : s)),
    required: checkLetters(requiredRaw, 'required', config),
    forbidden: Array.from(new Set(checkLetters(forbiddenRaw, 'forbidden', config))),
  };
  checkConflicts(model, config.conflictPolicy);
  return model;
}

export function formatFixed(c: ConstraintModel, config: HelperConfig = DEFAULT_CONFIG): string {
  return c.fixed.map((s) => s ?? config.wildcard).join('');
}

/** Inverse of `validateConstraints` for display and round-tripping. */
export function toRawConstraints(c: ConstraintModel, config: HelperConfig = DEFAULT_CONFIG): Required<RawConstraints> {
  return {
    fixed: formatFixed(c, config),
    required: c.required.join(''),
    forbidden: c.forbidden.join(''),
  };
}
