/**
 * Runtime configuration from environment variables. Entry points load .env
 * through dotenv before calling loadConfig(). Numeric values that are missing,
 * malformed or out of range fall back to their defaults.
 */

import path from 'path';

export interface AppConfig {
  anthropicApiKey: string | null;
  anthropicModel: string;
  googleClientId: string | null;
  googleClientSecret: string | null;
  dataDir: string;
  checkLimit: number;
  requestSpacingMs: number;
  resultCacheSize: number;
  resultCacheTtlMs: number;
}

type Env = Record<string, string | undefined>;

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

function optionalString(env: Env, key: string): string | null {
  const v = env[key]?.trim();
  return v && v.length > 0 ? v : null;
}

function boundedInt(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    console.warn(`[config] ignoring ${key}=${raw}; expected an integer in [${min}, ${max}]`);
    return fallback;
  }
  return n;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    anthropicApiKey: optionalString(env, 'ANTHROPIC_API_KEY'),
    anthropicModel: optionalString(env, 'ANTHROPIC_MODEL') ?? DEFAULT_MODEL,
    googleClientId: optionalString(env, 'GOOGLE_CLIENT_ID'),
    googleClientSecret: optionalString(env, 'GOOGLE_CLIENT_SECRET'),
    dataDir: path.resolve(optionalString(env, 'SCREENER_DATA_DIR') ?? 'data'),
    checkLimit: boundedInt(env, 'CHECK_LIMIT', 10, 1, 50),
    requestSpacingMs: boundedInt(env, 'REQUEST_SPACING_MS', 15_000, 0, 10 * 60_000),
    resultCacheSize: boundedInt(env, 'RESULT_CACHE_SIZE', 100, 0, 10_000),
    resultCacheTtlMs: boundedInt(env, 'RESULT_CACHE_TTL_MS', 60 * 60_000, 0, 7 * 24 * 60 * 60_000),
  };
}

export function databasePath(config: AppConfig): string {
  return path.join(config.dataDir, 'screener.db');
}
