import { join } from 'node:path';
import { Value } from '@sinclair/typebox/value';
import { AppConfigSchema, DEFAULT_CONFIG, type AppConfig } from '../model/config.js';
import { parseDuration, ParseError, type DurationParseOptions } from '../../../shared/utils/duration-parser.js';
import { ConfigError } from '../../../shared/errors/index.js';

type Env = Record<string, string | undefined>;

type Bounds = Pick<DurationParseOptions, 'minMs' | 'maxMs'>;

const TTL_BOUNDS: Bounds = { minMs: 1000 };
// better-sqlite3 blocks the event loop while it waits.
const BUSY_TIMEOUT_BOUNDS: Bounds = { maxMs: 1000 };

/**
 * Build the config from environment variables.
 *
 *   PORT, DATA_DIR, LOCK_DB_FILE, LOCK_BUSY_TIMEOUT,
 *   LOCK_TTL ("15m"), LOCK_CLOCK_SKEW ("2s"), LOCK_CLASS_TTLS ("session=5m,conference=20m"),
 *   LOCK_API_KEYS, ADMIN_USER_IDS, CORS_ORIGINS (comma lists),
 *   STORE_RETRY_ATTEMPTS
 *
 * @throws ConfigError naming the first invalid setting
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    port: env.PORT ? Number(env.PORT) : DEFAULT_CONFIG.port,
    dataDir: env.DATA_DIR || DEFAULT_CONFIG.dataDir,
    dbFile: env.LOCK_DB_FILE || DEFAULT_CONFIG.dbFile,
    busyTimeoutMs: duration(
      'LOCK_BUSY_TIMEOUT',
      env.LOCK_BUSY_TIMEOUT,
      DEFAULT_CONFIG.busyTimeoutMs,
      BUSY_TIMEOUT_BOUNDS
    ),
    lockTtlMs: duration('LOCK_TTL', env.LOCK_TTL, DEFAULT_CONFIG.lockTtlMs, TTL_BOUNDS),
    clockSkewMs: duration('LOCK_CLOCK_SKEW', env.LOCK_CLOCK_SKEW, DEFAULT_CONFIG.clockSkewMs),
    classTtls: env.LOCK_CLASS_TTLS ? parseClassTtls(env.LOCK_CLASS_TTLS) : DEFAULT_CONFIG.classTtls,
    apiKeys: list(env.LOCK_API_KEYS) ?? DEFAULT_CONFIG.apiKeys,
    adminUserIds: list(env.ADMIN_USER_IDS) ?? DEFAULT_CONFIG.adminUserIds,
    corsOrigins: list(env.CORS_ORIGINS) ?? DEFAULT_CONFIG.corsOrigins,
    storeRetryAttempts: env.STORE_RETRY_ATTEMPTS
      ? Number(env.STORE_RETRY_ATTEMPTS)
      : DEFAULT_CONFIG.storeRetryAttempts,
  };

  const error = Value.Errors(AppConfigSchema, config).First();
  if (error) {
    throw new ConfigError(`Invalid configuration at ${error.path}: ${error.message}`);
  }
  return config;
}

/** Path of the lock database, or ':memory:'. */
export function databasePath(config: AppConfig): string {
  return config.dbFile === ':memory:' ? ':memory:' : join(config.dataDir, config.dbFile);
}

function duration(name: string, raw: string | undefined, fallback: number, bounds: Bounds = {}): number {
  if (!raw) return fallback;
  try {
    return parseDuration(raw, { defaultUnit: 'ms', ...bounds });
  } catch (err) {
    if (err instanceof ParseError) {
      throw new ConfigError(`${name}: ${err.message}`);
    }
    throw err;
  }
}

function list(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw.split(',').map(s => s.trim()).filter(Boolean);
}

/** "session=5m, conference=20m" → { session: 300000, conference: 1200000 } */
export function parseClassTtls(raw: string): Record<string, number> {
  const ttls: Record<string, number> = {};
  for (const entry of list(raw) ?? []) {
    const [resourceClass, value, ...rest] = entry.split('=').map(s => s.trim());
    if (!resourceClass || !value || rest.length > 0) {
      throw new ConfigError(`LOCK_CLASS_TTLS: expected class=duration, got "${entry}"`);
    }
    ttls[resourceClass] = duration(`LOCK_CLASS_TTLS[${resourceClass}]`, value, 0, TTL_BOUNDS);
  }
  return ttls;
}
