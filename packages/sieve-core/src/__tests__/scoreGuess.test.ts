// packages/sieve-core/src/__tests__/scoreGuess.test.ts
//
// Unit tests for scoreGuess(), which produces the marker string a game shows
// for a guess against a known answer.
//
// Covered cases:
//   • All letters correct → all "o"
//   • All letters absent → all "."
//   • Mixed hits/presents
//   • Duplicate letters → "x" never over-credits repeats
//   • Scored feedback replayed through narrow() keeps the answer

import { narrow, parseAttempts, scoreGuess, ValidationError } from '../index.js';

describe('scoreGuess', () => {
  it('marks exact matches as correct-position', () => {
    expect(scoreGuess('crane', 'crane')).toBe('ooooo');
  });

  it('marks absent letters as eliminated', () => {
    expect(scoreGuess('crane', 'bolts')).toBe('.....');
  });

  it('marks present letters in wrong positions as wrong-position', () => {
    // c hit; a present; second c consumed by the hit; o, a (used up) absent
    expect(scoreGuess('crane', 'cacao')).toBe('ox...');
  });

  it('handles duplicate letters in guess when answer has duplicates', () => {
    // "apple" has two p's, "paper" uses both
    expect(scoreGuess('apple', 'paper')).toBe('xxox.');
  });

  it('handles duplicate letters when answer has a single occurrence', () => {
    // only one of the two l's in "alley" can be credited
    expect(scoreGuess('apple', 'alley')).toBe('ox.x.');
  });

  it('is case-insensitive', () => {
    expect(scoreGuess('CRANE', 'Cared')).toBe('oxxx.');
  });

  it('rejects words of different lengths', () => {
    expect(() => scoreGuess('crane', 'cranes')).toThrow(ValidationError);
  });

  it('rejects characters outside a-z', () => {
    expect(() => scoreGuess('crane', 'cr-ne')).toThrow(/not a letter/);
  });

  it('replayed feedback keeps the answer among the candidates', () => {
    const answer = 'crane';
    const args = ['slate', 'prime'].flatMap((g) => [g, scoreGuess(answer, g)]);
    expect(args).toEqual(['slate', '..o.o', 'prime', '.o..o']);

    const { candidates } = narrow(['crane', 'grace', 'brace', 'crate'], {
      records: parseAttempts(args),
    });
    expect(candidates).toEqual(['crane', 'grace', 'brace']);
  });
});
