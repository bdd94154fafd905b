// apps/cli/src/logger.ts
//
// stdout carries the table and the words, so logs go to stderr.

import { pino, destination, type Logger } from 'pino';

export function createLogger(level: string): Logger {
  return pino({ name: 'letter-sieve', level }, destination(2));
}
