// apps/cli/src/config.ts
//
// Environment-driven defaults. `.env` is loaded by the entry point
// (dotenv/config) before anything reads these; flags override them.
//
//   SIEVE_DICTIONARY → default word list (fallback /usr/share/dict/words)
//   LOG_LEVEL        → pino level (fallback "info")

export const DEFAULT_DICTIONARY = '/usr/share/dict/words';

export interface CliEnv {
  dictionary: string;
  logLevel: string;
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): CliEnv {
  return {
    dictionary: env.SIEVE_DICTIONARY || DEFAULT_DICTIONARY,
    logLevel: env.LOG_LEVEL ?? 'info',
  };
}
