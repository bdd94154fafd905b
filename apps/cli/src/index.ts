// apps/cli/src/index.ts
//
// Process entry for the letter-sieve CLI.

import 'dotenv/config';

import { run } from './cli.js';
import { readEnv } from './config.js';
import { createLogger } from './logger.js';

const env = readEnv();
const log = createLogger(env.logLevel);

try {
  process.exitCode = await run(process.argv.slice(2), {
    env,
    log,
    io: {
      out: (line) => process.stdout.write(`${line}\n`),
      err: (line) => process.stderr.write(`${line}\n`),
    },
  });
} catch (err) {
  log.fatal({ err }, 'unexpected failure');
  process.exitCode = 1;
}
