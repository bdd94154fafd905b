// packages/sieve-core/src/feedback.ts
//
// Feedback records: one guess plus the per-character result the game showed.
//
// Marker legend (wire symbol → meaning):
//   - "." eliminated        → letter does not occur in the solution
//   - "x" wrong-position    → letter occurs, but not at this index
//   - "o" correct-position  → letter occurs at exactly this index
//
// A record is validated and split into three (index, letter) lists when it is
// parsed; the constraint engine only ever reads those lists.

import { ValidationError, UsageError } from './errors.js';
import { isLetter } from './frequency.js';

export type Marker = 'eliminated' | 'wrong-position' | 'correct-position';

export const MARKER_SYMBOLS = {
  '.': 'eliminated',
  x: 'wrong-position',
  o: 'correct-position',
} as const satisfies Record<string, Marker>;

export type MarkerSymbol = keyof typeof MARKER_SYMBOLS;

export interface LetterAt {
  readonly index: number;
  readonly letter: string;
}

export interface FeedbackRecord {
  readonly guess: string;
  readonly markers: readonly Marker[];
  readonly excluded: readonly LetterAt[];
  readonly misplaced: readonly LetterAt[];
  readonly confirmed: readonly LetterAt[];
}

export function isMarkerSymbol(ch: string): ch is MarkerSymbol {
  return Object.hasOwn(MARKER_SYMBOLS, ch);
}

/**
 * parseFeedbackRecord validates a (guess, feedback) pair and derives its
 * excluded / misplaced / confirmed letter lists.
 *
 * Both strings are lowercased first, so "IRATE" / "XX..O" is accepted.
 *
 * @param index - position of the pair in the attempt list; only used to make
 *                error messages point at the offending pair
 * @throws ValidationError on length mismatch, unknown marker or a guess
 *         character outside a–z
 *
 * Example:
 *   parseFeedbackRecord('irate', 'xx..o')
 *   → excluded  [{2,'a'},{3,'t'}]
 *     misplaced [{0,'i'},{1,'r'}]
 *     confirmed [{4,'e'}]
 */
export function parseFeedbackRecord(
  guess: string,
  feedback: string,
  index = 0,
): FeedbackRecord {
  const G = guess.toLowerCase();
  const F = feedback.toLowerCase();
  const label = `attempt #${index + 1} (${guess} ${feedback})`;

  if (G.length === 0) {
    throw new ValidationError('EMPTY_GUESS', `${label}: guess is empty`, index);
  }
  if (G.length !== F.length) {
    throw new ValidationError(
      'LENGTH_MISMATCH',
      `${label}: guess has ${G.length} letters but feedback has ${F.length} markers`,
      index,
    );
  }

  const markers: Marker[] = [];
  const excluded: LetterAt[] = [];
  const misplaced: LetterAt[] = [];
  const confirmed: LetterAt[] = [];

  for (let i = 0; i < G.length; i++) {
    const letter = G.charAt(i);
    const symbol = F.charAt(i);
    if (!isLetter(letter)) {
      throw new ValidationError(
        'UNKNOWN_LETTER',
        `${label}: "${letter}" at position ${i} is not a letter a-z`,
        index,
      );
    }
    if (!isMarkerSymbol(symbol)) {
      throw new ValidationError(
        'UNKNOWN_MARKER',
        `${label}: marker "${symbol}" at position ${i} is not one of ". x o"`,
        index,
      );
    }

    const marker = MARKER_SYMBOLS[symbol];
    markers.push(marker);
    const pair = { index: i, letter };
    if (marker === 'eliminated') excluded.push(pair);
    else if (marker === 'wrong-position') misplaced.push(pair);
    else confirmed.push(pair);
  }

  return { guess: G, markers, excluded, misplaced, confirmed };
}

/**
 * parseAttempts turns a flat argument list (guess1 fb1 guess2 fb2 …) into
 * records. Every pair is validated before anything is returned.
 */
export function parseAttempts(args: readonly string[]): FeedbackRecord[] {
  if (args.length % 2 !== 0) {
    throw new UsageError(
      `attempts come in (guess, feedback) pairs; got ${args.length} arguments`,
    );
  }
  const records: FeedbackRecord[] = [];
  for (let i = 0; i < args.length; i += 2) {
    records.push(parseFeedbackRecord(args[i], args[i + 1], i / 2));
  }
  return records;
}

/** Render a record's markers back to their wire symbols ("xx..o"). */
export function markersToString(markers: readonly Marker[]): string {
  return markers
    .map((m) => (m === 'correct-position' ? 'o' : m === 'wrong-position' ? 'x' : '.'))
    .join('');
}
