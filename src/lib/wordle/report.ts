import { DEFAULT_CONFIG, type HelperConfig } from './config';
import { toRawConstraints } from './constraints';
import type { FilterResult, FilterStats } from './filter';
import type { RoundView } from './session';
import type { LetterStats } from './stats';
import type { Suggestion } from './suggest';

/** Where human-readable output goes. The CLI uses the console; tests collect lines. */
export type Output = {
  log(line: string): void;
  error(line: string): void;
};

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

/** Beyond this many unlimited results only `TRUNCATED_SHOWN` are listed. */
export const TRUNCATE_ABOVE = 50;
export const TRUNCATED_SHOWN = 20;
const ROUND_SHOWN = 10;
const TOP_LETTERS = 10;

export function formatFilterStats(stats: FilterStats): string[] {
  const lines = ['Filter stats:', `  Original words: ${stats.original}`, `  After pattern: ${stats.afterPattern}`];
  if (stats.afterInclusion !== undefined) lines.push(`  After inclusion: ${stats.afterInclusion}`);
  if (stats.afterExclusion !== undefined) lines.push(`  After exclusion: ${stats.afterExclusion}`);
  return lines;
}

/** Words actually listed for a batch query; long unlimited result sets are cut short. */
export function shownWords(words: readonly string[], limited: boolean): string[] {
  if (!limited && words.length > TRUNCATE_ABOVE) return words.slice(0, TRUNCATED_SHOWN);
  return [...words];
}

export function formatSearchResult(result: FilterResult, limited: boolean): string[] {
  const { words, stats } = result;
  if (words.length === 0) return ['No matching words found.'];

  const lines = [`Found ${words.length} matching words:`];
  if (!limited && words.length > TRUNCATE_ABOVE) {
    lines.push(`Many results; showing the first ${TRUNCATED_SHOWN}. Use --limit to change.`);
  }
  for (const w of shownWords(words, limited)) lines.push(`  ${w}`);
  lines.push('', ...formatFilterStats(stats));
  return lines;
}

export function formatLetterStats(stats: LetterStats): string[] {
  if (stats.letterFrequency.length === 0) return [];
  return [
    'Most frequent letters in the results:',
    ...stats.letterFrequency.slice(0, TOP_LETTERS).map((s) => `  ${s.letter}: ${s.percent.toFixed(1)}%`),
  ];
}

export function formatSuggestion(s: Suggestion, verbose = false): string[] {
  const lines = [`Suggested word to try: '${s.word.toUpperCase()}'`];
  if (verbose) {
    const score = s.score === undefined ? '' : `, score ${s.score.toFixed(3)}`;
    lines.push(`  (picked by: ${s.reason}${score})`);
  }
  return lines;
}

export function formatRound(view: RoundView, config: HelperConfig = DEFAULT_CONFIG): string[] {
  const raw = toRawConstraints(view.constraints, config);
  const lines = [
    `Attempt ${view.attempt}`,
    `State: fixed='${raw.fixed}', required='${raw.required}', forbidden='${raw.forbidden}'`,
  ];

  if (view.outcome === 'exhausted') {
    lines.push("No matching words left. The feedback may contain a mistake; type 'reset' to start over.");
    return lines;
  }
  if (view.outcome === 'solved') {
    lines.push(`Answer found: '${view.candidates[0].toUpperCase()}'!`);
    return lines;
  }

  lines.push(`Found ${view.candidates.length} words (showing up to ${ROUND_SHOWN}):`);
  view.candidates.slice(0, ROUND_SHOWN).forEach((w, i) => lines.push(`  ${String(i + 1).padStart(2)}. ${w}`));
  if (view.candidates.length > ROUND_SHOWN) {
    lines.push(`     ... and ${view.candidates.length - ROUND_SHOWN} more`);
  }
  if (view.suggestion) {
    lines.push(`Try next: '${view.suggestion.word.toUpperCase()}'`);
  }
  return lines;
}

export function promptFor(lastSuggested: string | null): string {
  let prompt = "Enter a word and its feedback (e.g. 'адрес ?а+д-р-е?с')";
  if (lastSuggested) prompt += ` or just the feedback for '${lastSuggested.toUpperCase()}'`;
  return `${prompt}, 'reset' or 'quit': `;
}

export const INTERACTIVE_BANNER: readonly string[] = [
  'Five letters - interactive mode',
  'Feedback: +letter (correct), ?letter (elsewhere in the word), -letter (not in the word)',
  'Example: +м?о-т+р-а means м in place, о elsewhere, т absent, р in place, а absent',
];
