// packages/protocol/src/index.ts
//
// Shared protocol definitions for the sieve CLI and HTTP server.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Attempt:  one (guess, feedback) pair as typed by a user.
//   - Options:  length window, output cap, ranking switch (+ dictionary for the CLI).
//   - Request/response shapes for one-shot narrowing and narrowing sessions.
//
// Attempt schemas only check shape (letters, marker symbols, equal length);
// the engine still owns contradiction checks.

import { z } from 'zod';

/**
 * Marker symbol schema:
 *  - "."  → eliminated
 *  - "x"  → wrong position
 *  - "o"  → correct position
 */
export const markerSymbolSchema = z.enum(['.', 'x', 'o']);
export type MarkerSymbol = z.infer<typeof markerSymbolSchema>;

/** Feedback string: one marker symbol per letter, either case. */
const feedbackSchema = z
  .string()
  .min(1, 'feedback must not be empty')
  .refine(
    (s) => Array.from(s.toLowerCase()).every((c) => markerSymbolSchema.safeParse(c).success),
    `feedback must use only "${markerSymbolSchema.options.join(' ')}"`,
  );

export const attemptSchema = z
  .object({
    guess: z.string().regex(/^[A-Za-z]+$/, 'guess must be letters a-z'),
    feedback: feedbackSchema,
  })
  .refine((a) => a.guess.length === a.feedback.length, {
    message: 'feedback must have one marker per guess letter',
    path: ['feedback'],
  });
export type Attempt = z.infer<typeof attemptSchema>;

/* -------------------------------------------------------------------------- */
/*                                  Options                                   */
/* -------------------------------------------------------------------------- */

/**
 * Narrowing settings:
 *  - min / max: candidate length window (defaults 5 / 5)
 *  - limit:     emit at most this many candidates (default: all)
 *  - sort:      rank by letter frequency before emitting (default false)
 */
const settingsShape = z.object({
  min: z.number().int().min(1).default(5),
  max: z.number().int().min(1).default(5),
  limit: z.number().int().positive().optional(),
  sort: z.boolean().default(false),
});

const windowOrdered = (o: { min: number; max: number }) => o.max >= o.min;
const windowIssue = { message: 'max must be greater than or equal to min', path: ['max'] };

export const narrowSettings = settingsShape.refine(windowOrdered, windowIssue);
export type NarrowSettings = z.infer<typeof narrowSettings>;

/** CLI options: the settings plus the dictionary path. */
export const cliOptions = settingsShape
  .extend({ dictionary: z.string().min(1) })
  .refine(windowOrdered, windowIssue);
export type CliOptions = z.infer<typeof cliOptions>;

/* -------------------------------------------------------------------------- */
/*                          Responses: table + words                          */
/* -------------------------------------------------------------------------- */

export const constraintEntrySchema = z.object({
  letter: z.string().length(1),
  frequency: z.number(),
  excluded: z.boolean(),
  confirmed: z.array(z.number().int().nonnegative()),
  rejected: z.array(z.number().int().nonnegative()),
});
export type ConstraintEntry = z.infer<typeof constraintEntrySchema>;

/* -------------------------------------------------------------------------- */
/*                             /api/narrow endpoint                           */
/* -------------------------------------------------------------------------- */

/**
 * One-shot narrowing against the server's dictionary.
 *  - attempts: ordered (guess, feedback) pairs, may be empty
 */
export const narrowReq = settingsShape
  .extend({ attempts: z.array(attemptSchema).default([]) })
  .refine(windowOrdered, windowIssue);

export const narrowRes = z.object({
  table: z.array(constraintEntrySchema),
  candidates: z.array(z.string()),
  count: z.number().int().nonnegative(),
});
export type NarrowRes = z.infer<typeof narrowRes>;

/* -------------------------------------------------------------------------- */
/*                           /api/sessions endpoints                          */
/* -------------------------------------------------------------------------- */

/** POST /api/sessions — body is the narrowing settings. */
export const newSessionReq = narrowSettings;

export const newSessionRes = z.object({
  sessionId: z.string(),
});

/** POST /api/sessions/:id/attempts — one more attempt. */
export const addAttemptReq = attemptSchema;

export const addAttemptRes = z.object({
  attempts: z.array(attemptSchema),
  count: z.number().int().nonnegative(),
});

/** GET /api/sessions/:id */
export const sessionRes = narrowRes.extend({
  attempts: z.array(attemptSchema),
});
export type SessionRes = z.infer<typeof sessionRes>;

/** Body of a 422 answer when feedback contradicts itself. */
export const contradictionRes = z.object({
  error: z.string(),
  code: z.literal('CONTRADICTION'),
  kind: z.enum(['excluded-then-placed', 'placed-then-excluded', 'position-locked']),
  letter: z.string(),
  position: z.number().int(),
  record: z.number().int(),
});
export type ContradictionRes = z.infer<typeof contradictionRes>;
