import { readFileSync } from 'node:fs';
import { TextDecoder } from 'node:util';
import { DEFAULT_CONFIG, type HelperConfig } from './config';
import { DictionaryError, errorMessage } from './errors';

/** Loaded once, read-only for the life of the process. Duplicates are kept as given. */
export type Dictionary = {
  readonly words: readonly string[];
  readonly size: number;
  has(word: string): boolean;
};

export function createDictionary(words: readonly string[]): Dictionary {
  const frozen = Object.freeze([...words]);
  const index = new Set(frozen);
  return Object.freeze({
    words: frozen,
    size: frozen.length,
    has: (word: string) => index.has(word),
  });
}

/** One word per line; keeps trimmed, lower-cased lines of exactly `wordLength` letters (code points). */
export function parseDictionary(text: string, config: HelperConfig = DEFAULT_CONFIG): string[] {
  const out: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const w = raw.trim().toLowerCase();
    if (Array.from(w).length === config.wordLength) out.push(w);
  }
  return out;
}

function hasErrorCode(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function loadDictionary(path: string, config: HelperConfig = DEFAULT_CONFIG): Dictionary {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    if (hasErrorCode(err) && err.code === 'ENOENT') {
      throw new DictionaryError(`Dictionary file '${path}' not found`, path);
    }
    throw new DictionaryError(`Failed to read dictionary file '${path}': ${errorMessage(err)}`, path);
  }

  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    throw new DictionaryError(`Dictionary file '${path}' is not valid UTF-8`, path);
  }

  const words = parseDictionary(text, config);
  if (words.length === 0) {
    throw new DictionaryError(
      `Dictionary '${path}' is empty or has no words of length ${config.wordLength}`,
      path,
    );
  }
  return createDictionary(words);
}
