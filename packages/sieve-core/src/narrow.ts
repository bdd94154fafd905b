// packages/sieve-core/src/narrow.ts
//
// Orchestrates one narrowing run:
//
//   records ──fold──▶ ConstraintEngine
//   words   ──test──▶ accepted (source order)
//                     └─ sort? ──▶ rankCandidates
//                     └─ limit? ─▶ first `limit` words
//
// Without sorting the scan stops as soon as `limit` words are accepted, so a
// streamed dictionary is never read further than it has to be.

import { ConstraintEngine, DEFAULT_WINDOW, type LengthWindow } from './engine.js';
import { ValidationError } from './errors.js';
import type { FeedbackRecord } from './feedback.js';
import { rankCandidates } from './ranker.js';

interface OutputOptions {
  /** Order survivors by letter-frequency score. */
  sort?: boolean;
  /** Emit at most this many candidates. */
  limit?: number;
}

/**
 * Either the records to fold into a fresh engine, or an engine that has
 * already been folded (the CLI prints its table before scanning).
 */
export type NarrowOptions = OutputOptions &
  (
    | { records: readonly FeedbackRecord[]; window?: LengthWindow }
    | { engine: ConstraintEngine }
  );

export interface NarrowResult {
  engine: ConstraintEngine;
  candidates: string[];
  /** Non-blank source lines looked at. */
  scanned: number;
  /** Words that passed the engine, before the limit was applied. */
  accepted: number;
}

class Collector {
  private readonly words: string[] = [];
  scanned = 0;

  constructor(
    private readonly engine: ConstraintEngine,
    private readonly sort: boolean,
    private readonly limit: number | undefined,
  ) {}

  /** Returns false once nothing more needs to be read. */
  offer(line: string): boolean {
    const word = line.trimEnd();
    if (word.length === 0) return true;
    this.scanned++;
    if (this.engine.test(word)) this.words.push(word);
    return this.sort || this.limit === undefined || this.words.length < this.limit;
  }

  result(): NarrowResult {
    const ordered = this.sort ? rankCandidates(this.words) : this.words;
    const candidates = this.limit === undefined ? ordered : ordered.slice(0, this.limit);
    return {
      engine: this.engine,
      candidates,
      scanned: this.scanned,
      accepted: this.words.length,
    };
  }
}

/**
 * createEngine folds `records` into a fresh engine for `window`.
 * @throws ContradictionError when the records cannot all be true at once
 */
export function createEngine(
  records: readonly FeedbackRecord[],
  window: LengthWindow = DEFAULT_WINDOW,
): ConstraintEngine {
  return new ConstraintEngine(window).foldOrThrow(records);
}

function collector(options: NarrowOptions): Collector {
  const { limit } = options;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new ValidationError('INVALID_LIMIT', `limit must be a positive integer; got ${limit}`);
  }
  const engine =
    'engine' in options ? options.engine : createEngine(options.records, options.window);
  return new Collector(engine, options.sort ?? false, limit);
}

/** Narrow an in-memory word source. */
export function narrow(words: Iterable<string>, options: NarrowOptions): NarrowResult {
  const c = collector(options);
  for (const line of words) {
    if (!c.offer(line)) break;
  }
  return c.result();
}

/**
 * Narrow a streamed word source (e.g. readDictionary). Records are folded
 * before the first word is read, so a contradiction never touches the source.
 */
export async function narrowAsync(
  words: AsyncIterable<string> | Iterable<string>,
  options: NarrowOptions,
): Promise<NarrowResult> {
  const c = collector(options);
  for await (const line of words) {
    if (!c.offer(line)) break;
  }
  return c.result();
}
