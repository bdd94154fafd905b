// apps/server/src/sessions.ts
//
// In-memory narrowing sessions. A session keeps its settings, the attempts
// accepted so far and a folded ConstraintEngine; each new attempt is folded
// into that engine. Restarting the server loses every session.

import { nanoid } from 'nanoid';

import {
  ConstraintEngine,
  parseFeedbackRecord,
  type ContradictionError,
} from '@sieve/core';
import type { Attempt, NarrowSettings } from '@sieve/protocol';

export interface Session {
  readonly id: string;
  readonly settings: NarrowSettings;
  readonly attempts: Attempt[];
  readonly engine: ConstraintEngine;
}

export type AddAttemptResult =
  | { ok: true; session: Session }
  | { ok: false; error: ContradictionError };

export class SessionStore {
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly newId: () => string = () => nanoid()) {}

  get size(): number {
    return this.sessions.size;
  }

  create(settings: NarrowSettings): Session {
    const session: Session = {
      id: this.newId(),
      settings,
      attempts: [],
      engine: new ConstraintEngine({ min: settings.min, max: settings.max }),
    };
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  /**
   * addAttempt folds one more attempt into the session.
   *
   * @returns undefined for an unknown session id; otherwise the fold result.
   *          A contradicting attempt leaves the session unchanged.
   * @throws ValidationError if the attempt itself is malformed
   */
  addAttempt(id: string, attempt: Attempt): AddAttemptResult | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;

    const record = parseFeedbackRecord(attempt.guess, attempt.feedback, session.attempts.length);
    const folded = session.engine.fold([record]);
    if (!folded.ok) return folded;

    session.attempts.push({ guess: record.guess, feedback: attempt.feedback.toLowerCase() });
    return { ok: true, session };
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }
}
