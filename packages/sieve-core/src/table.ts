// packages/sieve-core/src/table.ts
//
// Letter constraint table: one entry per letter a–z, accumulating what the
// folded feedback says about that letter.
//
//   excluded   → letter provably absent from the solution
//   confirmed  → indices where the letter is known to sit
//   rejected   → indices where the letter is known NOT to sit (it occurs
//                elsewhere)
//
// Only ConstraintEngine mutates a table; everyone else sees it through the
// read-only ConstraintView.

import { ALPHABET, LETTER_FREQUENCIES, type FrequencyTable } from './frequency.js';

export interface LetterConstraint {
  readonly letter: string;
  readonly frequency: number;
  readonly excluded: boolean;
  readonly confirmed: ReadonlySet<number>;
  readonly rejected: ReadonlySet<number>;
}

/** Plain, JSON-friendly view of one entry (positions ascending). */
export interface LetterConstraintSnapshot {
  letter: string;
  frequency: number;
  excluded: boolean;
  confirmed: number[];
  rejected: number[];
}

export interface ConstraintView {
  get(letter: string): LetterConstraint | undefined;
  /** Letter confirmed at `position`, if any. */
  lockedAt(position: number): string | undefined;
  /** Letters known to occur somewhere (confirmed or rejected somewhere). */
  mandatoryLetters(): Set<string>;
  snapshot(): LetterConstraintSnapshot[];
}

type Entry = {
  letter: string;
  frequency: number;
  excluded: boolean;
  confirmed: Set<number>;
  rejected: Set<number>;
};

export class LetterConstraintTable implements ConstraintView {
  private readonly entries = new Map<string, Entry>();
  private readonly locks = new Map<number, string>();

  constructor(frequencies: FrequencyTable = LETTER_FREQUENCIES) {
    for (const letter of ALPHABET) {
      this.entries.set(letter, {
        letter,
        frequency: frequencies[letter] ?? 0,
        excluded: false,
        confirmed: new Set(),
        rejected: new Set(),
      });
    }
  }

  get(letter: string): LetterConstraint | undefined {
    return this.entries.get(letter);
  }

  lockedAt(position: number): string | undefined {
    return this.locks.get(position);
  }

  mandatoryLetters(): Set<string> {
    const out = new Set<string>();
    for (const e of this.entries.values()) {
      if (e.confirmed.size > 0 || e.rejected.size > 0) out.add(e.letter);
    }
    return out;
  }

  snapshot(): LetterConstraintSnapshot[] {
    return [...this.entries.values()].map((e) => ({
      letter: e.letter,
      frequency: e.frequency,
      excluded: e.excluded,
      confirmed: [...e.confirmed].sort((a, b) => a - b),
      rejected: [...e.rejected].sort((a, b) => a - b),
    }));
  }

  /* ------------------------------- mutation ------------------------------- */

  exclude(letter: string): void {
    this.entry(letter).excluded = true;
  }

  confirm(letter: string, position: number): void {
    this.entry(letter).confirmed.add(position);
    this.locks.set(position, letter);
  }

  reject(letter: string, position: number): void {
    this.entry(letter).rejected.add(position);
  }

  private entry(letter: string): Entry {
    const e = this.entries.get(letter);
    if (!e) throw new RangeError(`no constraint entry for "${letter}"`);
    return e;
  }
}
