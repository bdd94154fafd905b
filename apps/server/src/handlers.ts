// apps/server/src/handlers.ts
//
// Request handling, kept free of Express so it can be exercised directly.
// Each handler validates its body with the shared protocol schemas and
// returns the status and JSON body to send.
//
// Status codes:
//   200 ok · 201 created · 204 deleted
//   400 malformed body / attempt · 404 unknown session · 422 contradiction

import {
  ConstraintEngine,
  ContradictionError,
  narrow,
  parseFeedbackRecord,
  ValidationError,
} from '@sieve/core';
import {
  addAttemptReq,
  addAttemptRes,
  contradictionRes,
  narrowReq,
  narrowRes,
  newSessionReq,
  newSessionRes,
  sessionRes,
  type NarrowRes,
  type NarrowSettings,
} from '@sieve/protocol';

import type { AddAttemptResult, SessionStore } from './sessions.js';

export interface Reply {
  status: number;
  body?: unknown;
}

const notFound: Reply = { status: 404, body: { error: 'Session not found' } };

export function contradictionReply(error: ContradictionError): Reply {
  return {
    status: 422,
    body: contradictionRes.parse({
      error: error.message,
      code: error.code,
      kind: error.kind,
      letter: error.letter,
      position: error.position,
      record: error.record,
    }),
  };
}

function validationReply(error: ValidationError): Reply {
  return { status: 400, body: { error: error.message, code: error.code } };
}

function results(
  words: readonly string[],
  engine: ConstraintEngine,
  settings: Pick<NarrowSettings, 'sort' | 'limit'>,
): NarrowRes {
  const { candidates } = narrow(words, { engine, sort: settings.sort, limit: settings.limit });
  return {
    table: engine.constraints.snapshot(),
    candidates,
    count: candidates.length,
  };
}

/* -------------------------------------------------------------------------- */
/*                                 /api/narrow                                */
/* -------------------------------------------------------------------------- */

export function handleNarrow(words: readonly string[], body: unknown): Reply {
  const parsed = narrowReq.safeParse(body);
  if (!parsed.success) return { status: 400, body: parsed.error.format() };
  const { attempts, min, max, sort, limit } = parsed.data;

  try {
    const records = attempts.map((a, i) => parseFeedbackRecord(a.guess, a.feedback, i));
    const engine = new ConstraintEngine({ min, max });
    const folded = engine.fold(records);
    if (!folded.ok) return contradictionReply(folded.error);
    return { status: 200, body: narrowRes.parse(results(words, engine, { sort, limit })) };
  } catch (err) {
    if (err instanceof ValidationError) return validationReply(err);
    throw err;
  }
}

/* -------------------------------------------------------------------------- */
/*                                /api/sessions                               */
/* -------------------------------------------------------------------------- */

export function createSession(store: SessionStore, body: unknown): Reply {
  const parsed = newSessionReq.safeParse(body ?? {});
  if (!parsed.success) return { status: 400, body: parsed.error.format() };
  const session = store.create(parsed.data);
  return { status: 201, body: newSessionRes.parse({ sessionId: session.id }) };
}

export function addAttempt(
  store: SessionStore,
  words: readonly string[],
  id: string,
  body: unknown,
): Reply {
  const parsed = addAttemptReq.safeParse(body);
  if (!parsed.success) return { status: 400, body: parsed.error.format() };

  let added: AddAttemptResult | undefined;
  try {
    added = store.addAttempt(id, parsed.data);
  } catch (err) {
    if (err instanceof ValidationError) return validationReply(err);
    throw err;
  }
  if (!added) return notFound;
  if (!added.ok) return contradictionReply(added.error);

  const { session } = added;
  const { count } = results(words, session.engine, session.settings);
  return { status: 200, body: addAttemptRes.parse({ attempts: session.attempts, count }) };
}

export function getSession(store: SessionStore, words: readonly string[], id: string): Reply {
  const session = store.get(id);
  if (!session) return notFound;
  return {
    status: 200,
    body: sessionRes.parse({
      ...results(words, session.engine, session.settings),
      attempts: session.attempts,
    }),
  };
}

export function deleteSession(store: SessionStore, id: string): Reply {
  return store.delete(id) ? { status: 204 } : notFound;
}
