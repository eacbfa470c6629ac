export type HelperErrorKind = 'dictionary' | 'validation' | 'feedback';

/**
 * Base class for every failure the helper raises on purpose.
 * `kind` is the discriminant callers switch on.
 */
export abstract class HelperError extends Error {
  abstract readonly kind: HelperErrorKind;
}

/** Dictionary source is missing, undecodable or holds no words of the target length. Fatal. */
export class DictionaryError extends HelperError {
  readonly kind = 'dictionary' as const;

  constructor(
    message: string,
    readonly source: string,
  ) {
    super(message);
    this.name = 'DictionaryError';
  }
}

/** Malformed or contradictory constraint input. `letters` names the offending letters, if any. */
export class ValidationError extends HelperError {
  readonly kind = 'validation' as const;

  constructor(
    message: string,
    readonly letters: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Interactive feedback line could not be understood. Recoverable: re-prompt. */
export class FeedbackParseError extends HelperError {
  readonly kind = 'feedback' as const;

  constructor(message: string) {
    super(message);
    this.name = 'FeedbackParseError';
  }
}

export type AnyHelperError = DictionaryError | ValidationError | FeedbackParseError;

export function isHelperError(value: unknown): value is AnyHelperError {
  return value instanceof HelperError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
