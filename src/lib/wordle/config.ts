import letterFrequencies from './data/letterFrequencies.json';

/**
 * How `validateConstraints` treats a letter that is both pinned in `fixed` and listed in `required`.
 * - `allow-duplicates`: permitted (one copy pinned, another somewhere else).
 * - `strict`: rejected, as the first releases of the helper did.
 */
export type ConflictPolicy = 'allow-duplicates' | 'strict';

/**
 * Which evaluator the suggestion engine partitions with.
 * - `simple`: a letter present anywhere in the target is marked present at every non-matching position.
 * - `strict`: each target letter satisfies at most one guess position (the official game rule).
 */
export type FeedbackMode = 'simple' | 'strict';

export type SuggestionTuning = {
  /** How many top-ranked candidates enter the guess pool. */
  topCandidates: number;
  /** Upper bound on extra dictionary words sampled into the pool. */
  extraPoolSize: number;
  /** Score bonus for a pool word that could itself be the answer. */
  memberBonus: number;
};

export type HelperConfig = {
  wordLength: number;
  alphabet: string;
  wildcard: string;
  conflictPolicy: ConflictPolicy;
  feedbackMode: FeedbackMode;
  letterFrequencies: Readonly<Record<string, number>>;
  starterWords: readonly string[];
  suggestion: SuggestionTuning;
};

export const RUSSIAN_ALPHABET = 'абвгдеёжзийклмнопрстуфхцчшщъыьэюя';

// Cover the most frequent letters with few repeats.
export const STARTER_WORDS = ['адрес', 'стена', 'рейка', 'тоска', 'ление', 'окрас'] as const;

export const DEFAULT_DICTIONARY_PATH = 'data/dictionary.txt';

export const DEFAULT_CONFIG: Readonly<HelperConfig> = Object.freeze<HelperConfig>({
  wordLength: 5,
  alphabet: RUSSIAN_ALPHABET,
  wildcard: '_',
  conflictPolicy: 'allow-duplicates',
  feedbackMode: 'simple',
  letterFrequencies: Object.freeze({ ...letterFrequencies }),
  starterWords: STARTER_WORDS,
  suggestion: Object.freeze({ topCandidates: 10, extraPoolSize: 20, memberBonus: 0.5 }),
});

export type ConfigOverrides = Partial<Omit<HelperConfig, 'suggestion'>> & {
  suggestion?: Partial<SuggestionTuning>;
};

/** Fresh config per call; nothing returned here is shared with `DEFAULT_CONFIG`. */
export function resolveConfig(overrides: ConfigOverrides = {}): HelperConfig {
  const { suggestion, ...rest } = overrides;
  return {
    ...DEFAULT_CONFIG,
    letterFrequencies: { ...DEFAULT_CONFIG.letterFrequencies },
    starterWords: [...DEFAULT_CONFIG.starterWords],
    ...rest,
    suggestion: { ...DEFAULT_CONFIG.suggestion, ...suggestion },
  };
}

export function isConflictPolicy(v: string): v is ConflictPolicy {
  return v === 'allow-duplicates' || v === 'strict';
}

export function isFeedbackMode(v: string): v is FeedbackMode {
  return v === 'simple' || v === 'strict';
}

export type EnvSettings = {
  dictionaryPath: string;
  conflictPolicy?: ConflictPolicy;
  feedbackMode?: FeedbackMode;
};

export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const dictionaryPath = env.FIVE_LETTERS_DICTIONARY?.trim() || DEFAULT_DICTIONARY_PATH;
  const settings: EnvSettings = { dictionaryPath };
  const policy = env.FIVE_LETTERS_POLICY?.trim().toLowerCase();
  if (policy && isConflictPolicy(policy)) settings.conflictPolicy = policy;
  const mode = env.FIVE_LETTERS_FEEDBACK?.trim().toLowerCase();
  if (mode && isFeedbackMode(mode)) settings.feedbackMode = mode;
  return settings;
}

export function isAlphabetLetter(ch: string, config: HelperConfig): boolean {
  return ch.length === 1 && config.alphabet.includes(ch);
}

export function frequencyWeight(letter: string, config: HelperConfig): number {
  return config.letterFrequencies[letter] ?? 0;
}
