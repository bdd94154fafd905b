// apps/server/src/index.ts
//
// HTTP front end for the sieve engine.
//
// Boot:
//   • read settings from the environment (.env via dotenv)
//   • load the dictionary once into memory; it is shared read-only by every
//     request and session
//   • listen
//
// Sessions live only in memory; restarting loses them.

import 'dotenv/config';
import { pino } from 'pino';

import { loadDictionary } from '@sieve/core';

import { createApp } from './app.js';
import { readConfig } from './config.js';
import { SessionStore } from './sessions.js';

const config = readConfig();
const log = pino({ level: config.logLevel });

let words: string[];
try {
  words = await loadDictionary(config.dictionary);
} catch (err) {
  log.fatal({ err }, 'cannot load dictionary');
  process.exit(1);
}
log.info({ dictionary: config.dictionary, words: words.length }, 'dictionary loaded');

const app = createApp({
  words,
  sessions: new SessionStore(),
  log,
  corsOrigin: config.corsOrigin,
});

app.listen(config.port, () => log.info({ port: config.port }, 'server up'));
