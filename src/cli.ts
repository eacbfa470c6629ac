#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { createInterface } from 'node:readline';
import { DEFAULT_CONFIG, resolveConfig, settingsFromEnv, type HelperConfig } from './lib/wordle/config';
import { validateConstraints } from './lib/wordle/constraints';
import { loadDictionary, type Dictionary } from './lib/wordle/dictionary';
import { errorMessage, isHelperError } from './lib/wordle/errors';
import { findWords } from './lib/wordle/filter';
import {
  consoleOutput,
  formatFilterStats,
  formatLetterStats,
  formatRound,
  formatSearchResult,
  formatSuggestion,
  INTERACTIVE_BANNER,
  promptFor,
  shownWords,
  type Output,
} from './lib/wordle/report';
import { handleInput, initialSession, startRound, type SessionAction, type SessionContext } from './lib/wordle/session';
import { letterStats } from './lib/wordle/stats';
import { mathRandom, suggestNextWord, type RandomSource } from './lib/wordle/suggest';

export type CliOptions = {
  known: string;
  unknown: string;
  excluded: string;
  limit?: number;
  sort: boolean;
  stats?: boolean;
  suggest?: boolean;
  interactive?: boolean;
  dictionary?: string;
  strictConflicts?: boolean;
  strictFeedback?: boolean;
  verbose?: boolean;
};

export type CliDeps = {
  output?: Output;
  input?: NodeJS.ReadableStream;
  env?: NodeJS.ProcessEnv;
  /** Skip loading from disk. */
  dictionary?: Dictionary;
  random?: RandomSource;
  /** Where SIGINT comes from; the process by default. */
  signals?: NodeJS.EventEmitter;
};

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Limit must be a positive integer.');
  return n;
}

export function buildProgram(out: Output): Command {
  return new Command()
    .name('five-letters')
    .description('Filter a five-letter dictionary by known letters and suggest the next guess.')
    .option('--known <pattern>', 'letters at known positions, e.g. м_тр_', DEFAULT_CONFIG.wildcard.repeat(DEFAULT_CONFIG.wordLength))
    .option('--unknown <letters>', 'letters present in the word at unknown positions', '')
    .option('--excluded <letters>', 'letters absent from the word', '')
    .option('--limit <n>', 'maximum number of results', parseLimit)
    .option('--no-sort', 'do not rank by letter frequency')
    .option('--stats', 'show letter statistics for the results')
    .option('--suggest', 'suggest the next word to try')
    .option('--interactive', 'step-by-step guided mode')
    .option('--dictionary <path>', 'dictionary file, one word per line')
    .option('--strict-conflicts', 'reject letters that are both known and unknown')
    .option('--strict-feedback', 'score suggestions with official repeated-letter rules')
    .option('--verbose', 'print scoring details')
    .addHelpText(
      'after',
      [
        '',
        'Examples:',
        '  five-letters --known "м_тр_" --unknown "о" --excluded "узк"',
        '  five-letters --interactive',
        '  five-letters --known "_а___" --stats',
        '  five-letters --suggest --excluded "абвг"',
      ].join('\n'),
    )
    .exitOverride()
    .configureOutput({
      writeOut: (s) => out.log(s.trimEnd()),
      writeErr: (s) => out.error(s.trimEnd()),
    });
}

function runBatch(dictionary: Dictionary, opts: CliOptions, config: HelperConfig, deps: CliDeps, out: Output): void {
  const constraints = validateConstraints(
    { fixed: opts.known, required: opts.unknown, forbidden: opts.excluded },
    config,
  );
  const result = findWords(dictionary, constraints, { sortByFrequency: opts.sort, limit: opts.limit }, config);
  const limited = opts.limit !== undefined;
  const shown = shownWords(result.words, limited);

  formatSearchResult(result, limited).forEach((l) => out.log(l));

  if (opts.stats && shown.length > 0) {
    out.log('');
    formatLetterStats(letterStats(shown)).forEach((l) => out.log(l));
  }

  if (opts.suggest) {
    const suggestion = suggestNextWord({
      candidates: shown,
      constraints,
      forbiddenSoFar: new Set(constraints.forbidden),
      dictionary,
      random: deps.random ?? mathRandom,
      config,
    });
    out.log('');
    formatSuggestion(suggestion, opts.verbose).forEach((l) => out.log(l));
  }
}

async function runInteractive(ctx: SessionContext & { config: HelperConfig }, verbose: boolean, deps: CliDeps, out: Output): Promise<void> {
  INTERACTIVE_BANNER.forEach((l) => out.log(l));
  out.log('');

  const rl = createInterface({ input: deps.input ?? process.stdin, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();
  let state = initialSession(ctx.config);

  // Ctrl-C ends the line stream, so the loop says goodbye like it does on EOF.
  const signals: NodeJS.EventEmitter = deps.signals ?? process;
  const onInterrupt = () => rl.close();
  signals.once('SIGINT', onInterrupt);

  // Reads until the user says something that changes the state or ends the session.
  const nextAction = async (): Promise<SessionAction | null> => {
    for (;;) {
      const next = await lines.next();
      if (next.done) return null;
      const action = handleInput(state, next.value, ctx);
      if (action.type === 'empty') continue;
      if (action.type === 'rejected') {
        out.error(`Error: ${action.message}`);
        out.log(promptFor(state.lastSuggested));
        continue;
      }
      return action;
    }
  };

  try {
    for (;;) {
      const round = startRound(state, ctx);
      state = round.state;
      formatRound(round.view, ctx.config).forEach((l) => out.log(l));
      if (verbose) {
        formatFilterStats(round.view.stats).forEach((l) => out.log(l));
        if (round.view.suggestion) formatSuggestion(round.view.suggestion, true).slice(1).forEach((l) => out.log(l));
      }
      if (round.view.outcome === 'solved') return;

      out.log('');
      out.log(promptFor(state.lastSuggested));
      const action = await nextAction();
      if (action === null || action.type === 'quit') {
        out.log('Bye!');
        return;
      }
      if (action.type === 'reset') {
        out.log('State reset.');
      } else if (action.type === 'applied' && action.feedback.impliedGuess) {
        out.log(`Applying feedback to the suggested word '${action.feedback.guess.toUpperCase()}'`);
      }
      if (action.type === 'reset' || action.type === 'applied') state = action.state;
      out.log('');
    }
  } finally {
    signals.removeListener('SIGINT', onInterrupt);
    rl.close();
  }
}

/** Entry point; resolves to the process exit code. */
export async function run(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.output ?? consoleOutput;
  const program = buildProgram(out);
  try {
    program.parse([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const opts = program.opts<CliOptions>();
  const env = settingsFromEnv(deps.env ?? process.env);
  const config = resolveConfig({
    conflictPolicy: opts.strictConflicts ? 'strict' : (env.conflictPolicy ?? DEFAULT_CONFIG.conflictPolicy),
    feedbackMode: opts.strictFeedback ? 'strict' : (env.feedbackMode ?? DEFAULT_CONFIG.feedbackMode),
  });

  try {
    const dictionary = deps.dictionary ?? loadDictionary(opts.dictionary ?? env.dictionaryPath, config);
    if (opts.interactive) {
      await runInteractive({ dictionary, config, random: deps.random ?? mathRandom }, opts.verbose ?? false, deps, out);
    } else {
      runBatch(dictionary, opts, config, deps, out);
    }
    return 0;
  } catch (err) {
    if (isHelperError(err)) {
      out.error(`Error: ${err.message}`);
      return 1;
    }
    out.error(`Unexpected error: ${errorMessage(err)}`);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
