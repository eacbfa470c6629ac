export type LetterShare = { letter: string; percent: number };

export type LetterStats = {
  /** Occurrences per 100 words, most common first. Repeats inside a word count each time. */
  letterFrequency: LetterShare[];
  /** One list per position, same ordering rule. */
  positionFrequency: LetterShare[][];
};

function mostCommon(counts: Map<string, number>, total: number): LetterShare[] {
  // Map keeps insertion order and sort is stable, so ties stay first-seen.
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .map(([letter, n]) => ({ letter, percent: (n / total) * 100 }));
}

export function letterStats(words: readonly string[]): LetterStats {
  if (words.length === 0) return { letterFrequency: [], positionFrequency: [] };

  const letters = new Map<string, number>();
  const positions: Map<string, number>[] = [];

  for (const w of words) {
    for (let i = 0; i < w.length; i++) {
      const ch = w[i];
      letters.set(ch, (letters.get(ch) ?? 0) + 1);
      positions[i] ??= new Map();
      positions[i].set(ch, (positions[i].get(ch) ?? 0) + 1);
    }
  }

  return {
    letterFrequency: mostCommon(letters, words.length),
    positionFrequency: positions.map((p) => mostCommon(p, words.length)),
  };
}
