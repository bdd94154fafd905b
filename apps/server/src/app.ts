// apps/server/src/app.ts
//
// Express wiring for the sieve HTTP API. Routes delegate to handlers.ts;
// client errors (bad JSON, SieveErrors) answer 4xx, anything else is logged
// and answered 500.
//
//   POST   /api/narrow                  one-shot narrowing
//   POST   /api/sessions                start a session
//   POST   /api/sessions/:id/attempts   add one attempt
//   GET    /api/sessions/:id            table + candidates so far
//   DELETE /api/sessions/:id            drop a session

import express, { type ErrorRequestHandler, type Express, type Request, type Response } from 'express';
import cors from 'cors';
import type { Logger } from 'pino';

import { SieveError } from '@sieve/core';

import {
  addAttempt,
  createSession,
  deleteSession,
  getSession,
  handleNarrow,
  type Reply,
} from './handlers.js';
import type { SessionStore } from './sessions.js';

export interface AppDeps {
  words: readonly string[];
  sessions: SessionStore;
  log: Logger;
  corsOrigin: string;
}

/** 4xx status carried by body-parser / http-errors failures. */
function clientStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function isParseFailure(err: unknown): boolean {
  return (
    typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed'
  );
}

/** Reply for an error that reached the Express error handler. */
export function errorReply(err: unknown): Reply {
  if (err instanceof SieveError) {
    return { status: 400, body: { error: err.message, code: err.code } };
  }
  const status = clientStatus(err);
  if (status !== undefined) {
    return { status, body: { error: isParseFailure(err) ? 'Malformed JSON body' : 'Bad request' } };
  }
  return { status: 500, body: { error: 'Internal error' } };
}

/**
 * logReply records rejected requests at error level: 400 (malformed body or
 * attempt) and 422 (contradiction), with the answer sent.
 */
export function logReply(log: Logger, route: string, reply: Reply): void {
  if (reply.status === 400 || reply.status === 422) {
    log.error({ route, status: reply.status, reply: reply.body }, 'request rejected');
  }
}

export function createApp({ words, sessions, log, corsOrigin }: AppDeps): Express {
  const app = express();
  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());

  const send = (req: Request, res: Response, reply: Reply): void => {
    logReply(log, `${req.method} ${req.path}`, reply);
    if (reply.body === undefined) res.status(reply.status).end();
    else res.status(reply.status).json(reply.body);
  };

  app.post('/api/narrow', (req, res) => {
    send(req, res, handleNarrow(words, req.body));
  });

  app.post('/api/sessions', (req, res) => {
    const reply = createSession(sessions, req.body);
    if (reply.status === 201) log.info({ sessions: sessions.size }, 'session created');
    send(req, res, reply);
  });

  app.post('/api/sessions/:id/attempts', (req, res) => {
    send(req, res, addAttempt(sessions, words, req.params.id, req.body));
  });

  app.get('/api/sessions/:id', (req, res) => {
    send(req, res, getSession(sessions, words, req.params.id));
  });

  app.delete('/api/sessions/:id', (req, res) => {
    send(req, res, deleteSession(sessions, req.params.id));
  });

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    const reply = errorReply(err);
    if (reply.status === 500) log.error({ err, path: req.path }, 'request failed');
    send(req, res, reply);
  };
  app.use(onError);

  return app;
}
