import { DEFAULT_CONFIG, type HelperConfig } from './config';
import { checkConflicts, emptyConstraints, type ConstraintModel } from './constraints';
import type { Dictionary } from './dictionary';
import { isHelperError } from './errors';
import { findWords, type FilterStats } from './filter';
import { parseFeedbackLine, type ParsedFeedback } from './notation';
import { applyFeedback } from './state';
import { mathRandom, suggestNextWord, type RandomSource, type Suggestion } from './suggest';

export const QUIT_WORDS: readonly string[] = ['quit', 'q', 'exit', 'выход'];
export const RESET_WORDS: readonly string[] = ['reset', 'сброс'];

/** Candidates shown and searched per round. */
export const ROUND_LIMIT = 20;

export type SessionContext = {
  dictionary: Dictionary;
  config?: HelperConfig;
  random?: RandomSource;
};

export type SessionState = {
  readonly constraints: ConstraintModel;
  readonly attempt: number;
  readonly lastSuggested: string | null;
};

export type RoundOutcome = 'open' | 'solved' | 'exhausted';

export type RoundView = {
  attempt: number;
  constraints: ConstraintModel;
  candidates: string[];
  stats: FilterStats;
  outcome: RoundOutcome;
  suggestion: Suggestion | null;
};

export type SessionAction =
  | { type: 'quit' }
  | { type: 'empty' }
  | { type: 'reset'; state: SessionState }
  | { type: 'applied'; state: SessionState; feedback: ParsedFeedback }
  | { type: 'rejected'; message: string };

export function initialSession(config: HelperConfig = DEFAULT_CONFIG): SessionState {
  return { constraints: emptyConstraints(config), attempt: 1, lastSuggested: null };
}

/** Query the current candidates and, while more than one remains, the next suggestion. */
export function startRound(state: SessionState, ctx: SessionContext): { state: SessionState; view: RoundView } {
  const config = ctx.config ?? DEFAULT_CONFIG;
  const { words, stats } = findWords(ctx.dictionary, state.constraints, { limit: ROUND_LIMIT }, config);

  const view: RoundView = {
    attempt: state.attempt,
    constraints: state.constraints,
    candidates: words,
    stats,
    outcome: words.length === 0 ? 'exhausted' : words.length === 1 ? 'solved' : 'open',
    suggestion: null,
  };
  if (view.outcome !== 'open') return { state, view };

  view.suggestion = suggestNextWord({
    candidates: words,
    constraints: state.constraints,
    forbiddenSoFar: new Set(state.constraints.forbidden),
    dictionary: ctx.dictionary,
    random: ctx.random ?? mathRandom,
    config,
  });
  return { state: { ...state, lastSuggested: view.suggestion.word }, view };
}

/**
 * Interpret one line of user input. Bad feedback or feedback that would contradict what is already known
 * comes back as `rejected` with the state untouched.
 */
export function handleInput(state: SessionState, line: string, ctx: SessionContext): SessionAction {
  const config = ctx.config ?? DEFAULT_CONFIG;
  const text = line.trim();
  const command = text.toLowerCase();

  if (!text) return { type: 'empty' };
  if (QUIT_WORDS.includes(command)) return { type: 'quit' };
  if (RESET_WORDS.includes(command)) return { type: 'reset', state: initialSession(config) };

  try {
    const feedback = parseFeedbackLine(text, state.lastSuggested, config);
    const constraints = applyFeedback(state.constraints, feedback.guess, feedback.verdicts);
    checkConflicts(constraints, config.conflictPolicy);
    return {
      type: 'applied',
      feedback,
      state: { constraints, attempt: state.attempt + 1, lastSuggested: null },
    };
  } catch (err) {
    if (isHelperError(err)) return { type: 'rejected', message: err.message };
    throw err;
  }
}
