// packages/sieve-core/src/index.ts
//
// Entry point for the sieve-core package.
// Re-exports the engine so consumers can import from one place.
//
// Includes:
//   • feedback.ts   → attempt parsing (parseFeedbackRecord, parseAttempts)
//   • engine.ts     → ConstraintEngine (fold, test, explain)
//   • table.ts      → LetterConstraintTable and its read-only view
//   • ranker.ts     → letter-frequency ranking
//   • narrow.ts     → end-to-end narrowing over a word source
//   • dictionary.ts → streamed word-list reading
//   • scoring.ts    → feedback for a guess against a known answer
//
// Example usage:
//   import { parseAttempts, narrow } from '@sieve/core';
//   narrow(words, { records: parseAttempts(['irate', 'xx..o']) });

export * from './errors.js';
export * from './frequency.js';
export * from './feedback.js';
export * from './table.js';
export * from './engine.js';
export * from './ranker.js';
export * from './narrow.js';
export * from './dictionary.js';
export * from './format.js';
export * from './scoring.js';
