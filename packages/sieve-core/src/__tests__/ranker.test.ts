// packages/sieve-core/src/__tests__/ranker.test.ts
//
// Letter-frequency ranking: distinct-letter scores, descending order,
// first-seen tie-breaks.

import { LETTER_FREQUENCIES, rankCandidates, scoreWord } from '../index.js';

describe('scoreWord', () => {
  it('sums the weights of distinct letters', () => {
    // e + i + n + r + s
    expect(scoreWord('rinse')).toBeCloseTo(38.731, 6);
  });

  it('counts a repeated letter once', () => {
    // e + i + r
    expect(scoreWord('eerie')).toBeCloseTo(25.655, 6);
  });

  it('scores anagrams identically', () => {
    expect(scoreWord('stare')).toBe(scoreWord('tears'));
  });

  it('gives unknown characters no weight', () => {
    expect(scoreWord('e-e')).toBe(LETTER_FREQUENCIES.e);
  });
});

describe('rankCandidates', () => {
  it('orders by descending score', () => {
    // spire 33.911, rinse 38.731, shire 38.076
    expect(rankCandidates(['spire', 'rinse', 'shire'])).toEqual(['rinse', 'shire', 'spire']);
  });

  it('keeps first-seen order for ties', () => {
    expect(rankCandidates(['tears', 'spire', 'stare', 'rates'])).toEqual([
      'tears',
      'stare',
      'rates',
      'spire',
    ]);
  });

  it('is deterministic', () => {
    const words = ['crane', 'slate', 'nacre', 'caner', 'plant', 'eerie'];
    expect(rankCandidates(words)).toEqual(rankCandidates(words));
  });

  it('accepts any iterable and leaves the input untouched', () => {
    const words = ['spire', 'rinse'];
    expect(rankCandidates(new Set(words))).toEqual(['rinse', 'spire']);
    expect(words).toEqual(['spire', 'rinse']);
  });
});
