// packages/sieve-core/src/scoring.ts
//
// Produces the feedback a game would show for a guess against a known answer.
// Used to replay a finished game (CLI --answer) and to generate feedback in
// tests.
//
// Rules:
//   • Both words must have the same length, lowercase a–z.
//   • Input is normalized to lowercase before comparison.
//   • Repeated letters are handled by counting non-hit answer letters and
//     decrementing counts as "x" marks use them up.

import { ValidationError } from './errors.js';
import { isLetter } from './frequency.js';

/**
 * scoreGuess compares a guess against the answer and returns the marker
 * string ("o" correct-position, "x" wrong-position, "." eliminated).
 *
 * Example:
 *   answer = "crane", guess = "cared"
 *   → "oxxx."
 */
export function scoreGuess(answer: string, guess: string): string {
  const A = answer.toLowerCase();
  const G = guess.toLowerCase();

  if (A.length !== G.length) {
    throw new ValidationError(
      'LENGTH_MISMATCH',
      `cannot score "${guess}" against "${answer}": lengths differ`,
    );
  }
  for (const ch of A + G) {
    if (!isLetter(ch)) {
      throw new ValidationError('UNKNOWN_LETTER', `"${ch}" is not a letter a-z`);
    }
  }

  const marks: string[] = Array<string>(G.length).fill('.');
  const counts = new Map<string, number>();

  // Pass 1: exact hits, and count the answer letters they did not use
  for (let i = 0; i < G.length; i++) {
    if (G[i] === A[i]) {
      marks[i] = 'o';
    } else {
      counts.set(A[i], (counts.get(A[i]) ?? 0) + 1);
    }
  }

  // Pass 2: wrong-position while unused copies remain
  for (let i = 0; i < G.length; i++) {
    if (marks[i] === 'o') continue;
    const left = counts.get(G[i]) ?? 0;
    if (left > 0) {
      marks[i] = 'x';
      counts.set(G[i], left - 1);
    }
  }

  return marks.join('');
}
