import dotenv from 'dotenv';

dotenv.config();

type Env = NodeJS.ProcessEnv;

export function numberFromEnv(name: string, fallback: number, env: Env = process.env): number {
  const raw = env[name];
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

/** A value in [0, 1]; anything else warns and falls back. */
export function fractionFromEnv(name: string, fallback: number, env: Env = process.env): number {
  const value = numberFromEnv(name, fallback, env);
  if (value < 0 || value > 1) {
    console.warn(`Warning: ${name}=${env[name]} is outside [0, 1], using ${fallback}`);
    return fallback;
  }
  return value;
}

/** A whole number of at least 1; anything else warns and falls back. */
export function countFromEnv(name: string, fallback: number, env: Env = process.env): number {
  const value = numberFromEnv(name, fallback, env);
  if (!Number.isInteger(value) || value < 1) {
    console.warn(`Warning: ${name}=${env[name]} must be a whole number of at least 1, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function booleanFromEnv(name: string, fallback: boolean, env: Env = process.env): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  return !['false', '0', 'no', 'off'].includes(raw);
}

export const config = {
  port: parseInt(process.env.PORT || '8085', 10),
  db: {
    path: process.env.DB_PATH || './data/app.db',
  },
  tmdb: {
    apiKey: process.env.TMDB_API_KEY || '',
    language: process.env.TMDB_LANGUAGE || 'en-US',
    timeoutMs: numberFromEnv('TMDB_TIMEOUT_MS', 10000),
    fetchDetails: booleanFromEnv('TMDB_FETCH_DETAILS', true),
  },
  cache: {
    ttlSeconds: numberFromEnv('CACHE_TTL_SECONDS', 86400),
    lowConfidenceTtlSeconds: numberFromEnv('CACHE_LOW_TTL_SECONDS', 3600),
  },
  matching: {
    acceptanceThreshold: fractionFromEnv('MATCH_THRESHOLD', 0.6),
    floorFraction: fractionFromEnv('MATCH_FLOOR_FRACTION', 0.6),
    maxAttempts: countFromEnv('MATCH_MAX_ATTEMPTS', 5),
  },
};

export type AppConfig = typeof config;

if (!config.tmdb.apiKey) {
  console.warn('Warning: TMDB_API_KEY must be set to resolve titles against TMDB');
}
