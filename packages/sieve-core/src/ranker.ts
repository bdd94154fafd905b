// packages/sieve-core/src/ranker.ts
//
// Orders candidates by the summed frequency of their distinct letters.
// A cheap "covers common letters" heuristic, not an information measure.

import { LETTER_FREQUENCIES, type FrequencyTable } from './frequency.js';

/**
 * scoreWord sums the frequency weight of each distinct letter in `word`.
 * Letters outside the table score 0.
 *
 * Letters are summed in alphabetical order so anagrams score identically.
 */
export function scoreWord(word: string, frequencies: FrequencyTable = LETTER_FREQUENCIES): number {
  const distinct = [...new Set(word)].sort();
  let s = 0;
  for (const ch of distinct) s += frequencies[ch] ?? 0;
  return s;
}

/**
 * rankCandidates returns the words ordered by descending score.
 * Ties keep their first-seen order (Array#sort is stable).
 */
export function rankCandidates(
  words: Iterable<string>,
  frequencies: FrequencyTable = LETTER_FREQUENCIES,
): string[] {
  return [...words]
    .map((word) => ({ word, score: scoreWord(word, frequencies) }))
    .sort((a, b) => b.score - a.score)
    .map(({ word }) => word);
}
