// apps/server/src/config.ts
//
// Server settings from the environment (.env loaded by dotenv/config).

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  dictionary: string;
  logLevel: string;
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: Number(env.PORT ?? 3001),
    corsOrigin: env.CORS_ORIGIN || '*',
    dictionary: env.SIEVE_DICTIONARY || '/usr/share/dict/words',
    logLevel: env.LOG_LEVEL ?? 'info',
  };
}
