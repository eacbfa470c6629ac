import { DEFAULT_CONFIG, isAlphabetLetter, type HelperConfig } from './config';
import { FeedbackParseError } from './errors';
import { isVerdictSymbol, symbolToVerdict, type Verdict } from './feedback';

export type ParsedFeedback = {
  guess: string;
  verdicts: Verdict[];
  /** True when the line held only verdicts and the last suggestion was used as the guess. */
  impliedGuess: boolean;
};

type Pair = { verdict: Verdict; letter: string | null };

/**
 * Read `+а?д-р-е?с` style tokens. Each status symbol may be followed by the letter it refers to;
 * bare symbols (`+?--+`) are accepted as well.
 */
export function parseVerdictTokens(tokens: string, config: HelperConfig = DEFAULT_CONFIG): Pair[] {
  const chars = Array.from(tokens.replace(/\s+/g, ''));
  const pairs: Pair[] = [];
  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    if (!isVerdictSymbol(ch)) {
      throw new FeedbackParseError(`Unexpected '${ch}' in feedback: use + (correct), ? (elsewhere), - (absent)`);
    }
    const next = chars[i + 1];
    if (next !== undefined && isAlphabetLetter(next, config)) {
      pairs.push({ verdict: symbolToVerdict(ch), letter: next });
      i++;
    } else {
      pairs.push({ verdict: symbolToVerdict(ch), letter: null });
    }
  }
  if (pairs.length !== config.wordLength) {
    throw new FeedbackParseError(
      `Feedback must hold exactly ${config.wordLength} status symbols (+, ?, -), got: ${pairs.length}`,
    );
  }
  return pairs;
}

function checkGuessWord(word: string, config: HelperConfig): void {
  const letters = Array.from(word);
  if (letters.length !== config.wordLength) {
    throw new FeedbackParseError(`Word must have exactly ${config.wordLength} letters, got: ${letters.length}`);
  }
  if (!letters.every((l) => isAlphabetLetter(l, config))) {
    throw new FeedbackParseError(`Word '${word}' contains characters outside the alphabet`);
  }
}

/**
 * Parse one interactive line: `<word> <tokens>` or `<tokens>` alone, which applies to `lastSuggested`.
 */
export function parseFeedbackLine(
  line: string,
  lastSuggested: string | null,
  config: HelperConfig = DEFAULT_CONFIG,
): ParsedFeedback {
  const text = line.trim().toLowerCase();
  if (!text) throw new FeedbackParseError('Empty input');

  const [head, ...rest] = text.split(/\s+/);
  const tokensOnly = isVerdictSymbol(head[0]);

  let guess: string;
  let tokens: string;
  if (tokensOnly) {
    if (lastSuggested === null) {
      throw new FeedbackParseError('No suggested word yet: enter the word and its feedback, e.g. адрес ?а+д-р-е?с');
    }
    guess = lastSuggested.toLowerCase();
    tokens = text;
  } else {
    if (rest.length === 0) {
      throw new FeedbackParseError('Expected a word followed by its feedback, e.g. адрес ?а+д-р-е?с');
    }
    guess = head;
    tokens = rest.join('');
  }

  checkGuessWord(guess, config);
  const pairs = parseVerdictTokens(tokens, config);
  pairs.forEach((p, i) => {
    if (p.letter !== null && p.letter !== guess[i]) {
      throw new FeedbackParseError(
        `Feedback letter '${p.letter}' at position ${i + 1} does not match '${guess[i]}' in '${guess}'`,
      );
    }
  });

  return { guess, verdicts: pairs.map((p) => p.verdict), impliedGuess: tokensOnly };
}
