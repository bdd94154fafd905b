// packages/sieve-core/src/__tests__/engine.test.ts
//
// Unit tests for ConstraintEngine: folding records into the letter table,
// contradiction detection, and the per-word predicate.
//
// Covered cases:
//   • A single mixed record → table contents and accepted words
//   • Contradictions within one record and across records
//   • Idempotent folding
//   • All-correct feedback pins the guess
//   • Length window and unknown letters
//   • Presence-only handling of repeated letters

import {
  ConstraintEngine,
  ContradictionError,
  parseAttempts,
  parseFeedbackRecord,
  ValidationError,
  type LetterConstraintSnapshot,
} from '../index.js';

function entry(engine: ConstraintEngine, letter: string): LetterConstraintSnapshot | undefined {
  return engine.constraints.snapshot().find((e) => e.letter === letter);
}

describe('ConstraintEngine.fold', () => {
  it('accumulates exclusions, confirmations and rejected positions', () => {
    const engine = new ConstraintEngine();
    expect(engine.fold(parseAttempts(['irate', 'xx..o']))).toEqual({ ok: true });

    expect(entry(engine, 'i')).toMatchObject({ excluded: false, confirmed: [], rejected: [0] });
    expect(entry(engine, 'r')).toMatchObject({ excluded: false, confirmed: [], rejected: [1] });
    expect(entry(engine, 'a')).toMatchObject({ excluded: true, confirmed: [], rejected: [] });
    expect(entry(engine, 't')).toMatchObject({ excluded: true, confirmed: [], rejected: [] });
    expect(entry(engine, 'e')).toMatchObject({ excluded: false, confirmed: [4], rejected: [] });
    expect(engine.constraints.lockedAt(4)).toBe('e');
    expect([...engine.mandatoryLetters()].sort()).toEqual(['e', 'i', 'r']);
    expect(engine.attempts).toBe(1);
  });

  it('reports a letter confirmed and eliminated in the same record', () => {
    const engine = new ConstraintEngine({ min: 4, max: 4 });
    const result = engine.fold([parseFeedbackRecord('aabb', 'o.x.')]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ContradictionError);
      expect(result.error.kind).toBe('excluded-then-placed');
      expect(result.error.letter).toBe('a');
      expect(result.error.position).toBe(0);
      expect(result.error.record).toBe(0);
    }
    // nothing from the contradicting record was applied
    expect(entry(engine, 'a')?.excluded).toBe(false);
    expect(entry(engine, 'b')?.excluded).toBe(false);
    expect(engine.attempts).toBe(0);
  });

  it('reports a letter eliminated after an earlier record placed it', () => {
    const engine = new ConstraintEngine();
    const result = engine.fold(parseAttempts(['crane', '..o..', 'adobe', '.....']));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('placed-then-excluded');
      expect(result.error.letter).toBe('a');
      expect(result.error.position).toBe(0);
      expect(result.error.record).toBe(1);
      expect(result.error.message).toBe(
        'attempt #2: "a" is eliminated at position 0 but an earlier attempt showed it in the word',
      );
    }
    // the first record stays folded
    expect(engine.attempts).toBe(1);
    expect(entry(engine, 'c')?.excluded).toBe(true);
  });

  it('reports a letter placed after an earlier record eliminated it', () => {
    const engine = new ConstraintEngine();
    const result = engine.fold(parseAttempts(['crane', '.....', 'slate', '..x..']));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('excluded-then-placed');
      expect(result.error.letter).toBe('a');
      expect(result.error.position).toBe(2);
      expect(result.error.record).toBe(1);
    }
  });

  it('reports two letters confirmed at the same position', () => {
    const engine = new ConstraintEngine();
    const result = engine.fold(parseAttempts(['crane', 'o....', 'sloth', 'o....']));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('position-locked');
      expect(result.error.letter).toBe('s');
      expect(result.error.position).toBe(0);
      expect(result.error.message).toBe(
        'attempt #2: position 0 is already confirmed as "c", not "s"',
      );
    }
  });

  it('foldOrThrow raises the contradiction', () => {
    const engine = new ConstraintEngine({ min: 4, max: 4 });
    expect(() => engine.foldOrThrow([parseFeedbackRecord('aabb', 'o.x.')])).toThrow(
      ContradictionError,
    );
  });

  it('is idempotent for a repeated record', () => {
    const once = new ConstraintEngine().foldOrThrow(parseAttempts(['irate', 'xx..o']));
    const twice = new ConstraintEngine().foldOrThrow(
      parseAttempts(['irate', 'xx..o', 'irate', 'xx..o']),
    );
    expect(twice.constraints.snapshot()).toEqual(once.constraints.snapshot());
  });

  it('rejects an invalid length window', () => {
    expect(() => new ConstraintEngine({ min: 6, max: 5 })).toThrow(ValidationError);
    expect(() => new ConstraintEngine({ min: 0, max: 5 })).toThrow(/1 <= min <= max/);
  });
});

describe('ConstraintEngine.test', () => {
  const engine = new ConstraintEngine().foldOrThrow(parseAttempts(['irate', 'xx..o']));

  it('accepts words consistent with every signal', () => {
    expect(engine.test('spire')).toBe(true);
    expect(engine.test('rinse')).toBe(true);
    expect(engine.test('shire')).toBe(true);
  });

  it('explains each rejection', () => {
    expect(engine.explain('crate')).toBe('rejected-position'); // r at 1
    expect(engine.explain('plate')).toBe('excluded'); // a
    expect(engine.explain('wiser')).toBe('locked-position'); // r where e is confirmed
    expect(engine.explain('since')).toBe('missing-letter'); // no r
    expect(engine.explain('spires')).toBe('length');
    expect(engine.explain('Spire')).toBe('unknown-letter');
  });

  it('pins the guess when every marker is correct-position', () => {
    const pinned = new ConstraintEngine().foldOrThrow(parseAttempts(['crane', 'ooooo']));
    const words = ['crane', 'crate', 'caner', 'nacre'];
    expect(words.filter((w) => pinned.test(w))).toEqual(['crane']);
  });

  it('passes every in-window word when nothing has been folded', () => {
    const open = new ConstraintEngine({ min: 3, max: 5 });
    const words = ['cat', 'crane', 'apple', 'craned', 'at'];
    expect(words.filter((w) => open.test(w))).toEqual(['cat', 'crane', 'apple']);
  });

  it('rejects characters that have no table entry', () => {
    const open = new ConstraintEngine({ min: 4, max: 5 });
    expect(open.explain('café')).toBe('unknown-letter');
    expect(open.explain("can't")).toBe('unknown-letter');
  });

  it('checks presence, not multiplicity, of mandatory letters', () => {
    // two misplaced e's imply the solution holds two, but one satisfies the check
    const e = new ConstraintEngine().foldOrThrow(parseAttempts(['every', 'x.x..']));
    expect(entry(e, 'e')?.rejected).toEqual([0, 2]);
    expect(e.test('hotel')).toBe(true);
    expect(e.explain('tweak')).toBe('rejected-position');
  });

  it('treats a partly eliminated repeated letter as a contradiction', () => {
    const e = new ConstraintEngine();
    const result = e.fold(parseAttempts(['speed', '..o..']));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.letter).toBe('e');
  });
});
