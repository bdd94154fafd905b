// packages/sieve-core/src/engine.ts
//
// Constraint engine: folds feedback records into a LetterConstraintTable and
// tests candidate words against what has been accumulated.
//
// Folding, per record and in input order:
//   1. eliminated letters are marked excluded
//   2. confirmed letters are checked against exclusions, then locked in place
//   3. misplaced letters are checked against exclusions, then their index is
//      added to the letter's rejected positions
//
// A record is checked as a whole before any of it is applied, so a record
// that contradicts the table leaves the table exactly as it was.
//
// Known limitation: mandatory letters are a presence check. A solution that
// needs two "e"s is satisfied by a word with one.

import { ContradictionError, ValidationError } from './errors.js';
import type { FeedbackRecord } from './feedback.js';
import { LetterConstraintTable, type ConstraintView, type LetterConstraint } from './table.js';

export interface LengthWindow {
  readonly min: number;
  readonly max: number;
}

export const DEFAULT_WINDOW: LengthWindow = Object.freeze({ min: 5, max: 5 });

export type FoldResult = { ok: true } | { ok: false; error: ContradictionError };

/** Why test() turned a word down. */
export type Rejection =
  | 'length'
  | 'unknown-letter'
  | 'excluded'
  | 'rejected-position'
  | 'locked-position'
  | 'missing-letter';

export class ConstraintEngine {
  readonly window: LengthWindow;
  private readonly table = new LetterConstraintTable();
  private folded = 0;
  private mandatory: ReadonlySet<string> | undefined;

  constructor(window: LengthWindow = DEFAULT_WINDOW) {
    const { min, max } = window;
    if (!Number.isInteger(min) || !Number.isInteger(max) || min < 1 || max < min) {
      throw new ValidationError(
        'INVALID_WINDOW',
        `length window must satisfy 1 <= min <= max; got min=${min} max=${max}`,
      );
    }
    this.window = { min, max };
  }

  /** Read-only view of the accumulated table. */
  get constraints(): ConstraintView {
    return this.table;
  }

  /** Number of records folded so far. */
  get attempts(): number {
    return this.folded;
  }

  /**
   * fold applies records in order and stops at the first contradiction.
   * Records before the contradicting one stay applied.
   */
  fold(records: readonly FeedbackRecord[]): FoldResult {
    for (const record of records) {
      const error = this.check(record, this.folded);
      if (error) return { ok: false, error };
      this.apply(record);
      this.folded++;
      this.mandatory = undefined;
    }
    return { ok: true };
  }

  foldOrThrow(records: readonly FeedbackRecord[]): this {
    const result = this.fold(records);
    if (!result.ok) throw result.error;
    return this;
  }

  mandatoryLetters(): Set<string> {
    this.mandatory ??= this.table.mandatoryLetters();
    return new Set(this.mandatory);
  }

  test(word: string): boolean {
    return this.explain(word) === null;
  }

  /**
   * explain returns the first reason `word` is rejected, or null when it
   * satisfies every accumulated constraint.
   */
  explain(word: string): Rejection | null {
    if (word.length < this.window.min || word.length > this.window.max) {
      return 'length';
    }

    const pending = this.mandatoryLetters();
    for (let i = 0; i < word.length; i++) {
      const c = word.charAt(i);
      const entry = this.table.get(c);
      if (!entry) return 'unknown-letter';
      if (entry.excluded) return 'excluded';
      if (entry.rejected.has(i)) return 'rejected-position';
      const locked = this.table.lockedAt(i);
      if (locked !== undefined && locked !== c) return 'locked-position';
      pending.delete(c);
    }

    return pending.size > 0 ? 'missing-letter' : null;
  }

  /* -------------------------------------------------------------------------- */

  private check(record: FeedbackRecord, index: number): ContradictionError | undefined {
    const excludedHere = new Set<string>();

    for (const { index: pos, letter } of record.excluded) {
      const entry = this.lookup(letter, index);
      if (entry.confirmed.size > 0 || entry.rejected.size > 0) {
        return new ContradictionError(
          'placed-then-excluded',
          letter,
          pos,
          index,
          `"${letter}" is eliminated at position ${pos} but an earlier attempt showed it in the word`,
        );
      }
      excludedHere.add(letter);
    }

    const isExcluded = (letter: string) =>
      excludedHere.has(letter) || this.lookup(letter, index).excluded;

    for (const { index: pos, letter } of record.confirmed) {
      if (isExcluded(letter)) {
        return new ContradictionError(
          'excluded-then-placed',
          letter,
          pos,
          index,
          `"${letter}" is confirmed at position ${pos} but is also eliminated`,
        );
      }
      const locked = this.table.lockedAt(pos);
      if (locked !== undefined && locked !== letter) {
        return new ContradictionError(
          'position-locked',
          letter,
          pos,
          index,
          `position ${pos} is already confirmed as "${locked}", not "${letter}"`,
        );
      }
    }

    for (const { index: pos, letter } of record.misplaced) {
      if (isExcluded(letter)) {
        return new ContradictionError(
          'excluded-then-placed',
          letter,
          pos,
          index,
          `"${letter}" is marked present at position ${pos} but is also eliminated`,
        );
      }
    }

    return undefined;
  }

  private apply(record: FeedbackRecord): void {
    for (const { letter } of record.excluded) this.table.exclude(letter);
    for (const { index, letter } of record.confirmed) this.table.confirm(letter, index);
    for (const { index, letter } of record.misplaced) this.table.reject(letter, index);
  }

  private lookup(letter: string, record: number): LetterConstraint {
    const entry = this.table.get(letter);
    if (!entry) {
      throw new ValidationError(
        'UNKNOWN_LETTER',
        `attempt #${record + 1}: "${letter}" is not a letter a-z`,
        record,
      );
    }
    return entry;
  }
}
