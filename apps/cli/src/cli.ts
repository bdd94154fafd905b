// apps/cli/src/cli.ts
//
// letter-sieve: print the words in a dictionary that are still possible after
// a sequence of guesses.
//
//   letter-sieve [options] <guess> <feedback> [<guess> <feedback> ...]
//   letter-sieve --answer crane slate prime     (replay a known game)
//
// Output on stdout: the letter constraint table (26 lines), then one
// candidate per line. Usage, validation and contradiction errors print one
// line on stderr before any output; an unreadable dictionary fails after
// the table has been printed.

import { Command, CommanderError } from 'commander';
import type { Logger } from 'pino';

import {
  createEngine,
  formatConstraintTable,
  narrowAsync,
  parseAttempts,
  readDictionary,
  scoreGuess,
  SieveError,
  type ConstraintEngine,
} from '@sieve/core';
import { cliOptions, type CliOptions } from '@sieve/protocol';

import type { CliEnv } from './config.js';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliContext {
  io: CliIO;
  log: Logger;
  env: CliEnv;
}

type RawOptions = {
  min: number;
  max: number;
  limit?: number;
  sort?: boolean;
  dictionary: string;
  answer?: string;
};

function buildProgram(env: CliEnv): Command {
  return new Command()
    .name('letter-sieve')
    .description('List dictionary words consistent with word-game feedback.')
    .argument(
      '[attempts...]',
      'guess/feedback pairs; feedback uses "." eliminated, "x" wrong position, "o" correct',
    )
    .option('--min <n>', 'minimum candidate length', (v) => Number(v), 5)
    .option('--max <n>', 'maximum candidate length', (v) => Number(v), 5)
    .option('-n, --limit <n>', 'print at most this many candidates', (v) => Number(v))
    .option('-s, --sort', 'rank candidates by letter frequency')
    .option('-d, --dictionary <path>', 'newline-delimited word list', env.dictionary)
    .option('-a, --answer <word>', 'score bare guesses against a known answer');
}

/**
 * Expand the positional arguments into guess/feedback pairs. With --answer,
 * every positional is a guess and its feedback is computed.
 */
function attemptArgs(args: string[], answer: string | undefined): string[] {
  if (answer === undefined) return args;
  return args.flatMap((guess) => [guess, scoreGuess(answer, guess)]);
}

function fail(ctx: CliContext, err: SieveError): number {
  ctx.log.error({ code: err.code }, err.message);
  ctx.io.err(`error: ${err.message}`);
  return 1;
}

/**
 * run executes one CLI invocation and resolves to the process exit code.
 *
 * @param argv - user arguments (process.argv without node and the script)
 */
export async function run(argv: string[], ctx: CliContext): Promise<number> {
  const program = buildProgram(ctx.env)
    .exitOverride()
    .configureOutput({
      writeOut: (s) => ctx.io.out(s.trimEnd()),
      writeErr: (s) => ctx.io.err(s.trimEnd()),
    });

  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const raw = program.opts<RawOptions>();
  const parsed = cliOptions.safeParse({
    min: raw.min,
    max: raw.max,
    limit: raw.limit,
    sort: raw.sort ?? false,
    dictionary: raw.dictionary,
  });
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.') || 'options'}: ${i.message}`)
      .join('; ');
    ctx.log.error({ issues: parsed.error.issues }, 'invalid options');
    ctx.io.err(`error: invalid options: ${detail}`);
    return 1;
  }
  const opts: CliOptions = parsed.data;
  ctx.log.debug({ opts }, 'options');

  let engine: ConstraintEngine;
  try {
    const records = parseAttempts(attemptArgs(program.args, raw.answer));
    engine = createEngine(records, { min: opts.min, max: opts.max });
  } catch (err) {
    if (err instanceof SieveError) return fail(ctx, err);
    throw err;
  }

  ctx.io.out(formatConstraintTable(engine.constraints.snapshot()));

  ctx.log.info({ dictionary: opts.dictionary }, 'scanning dictionary');
  try {
    const { candidates, scanned, accepted } = await narrowAsync(readDictionary(opts.dictionary), {
      engine,
      sort: opts.sort,
      limit: opts.limit,
    });
    ctx.log.info({ scanned, accepted, printed: candidates.length }, 'narrowed');
    for (const word of candidates) ctx.io.out(word);
  } catch (err) {
    if (err instanceof SieveError) return fail(ctx, err);
    throw err;
  }

  return 0;
}
