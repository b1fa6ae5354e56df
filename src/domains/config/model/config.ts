/**
 * Service configuration, read from the environment at startup.
 */
import { Type, type Static } from '@sinclair/typebox';

export const AppConfigSchema = Type.Object({
  port: Type.Integer({ minimum: 1, maximum: 65535 }),

  /** Directory holding the lock database. */
  dataDir: Type.String({ minLength: 1 }),

  /** Database file name inside dataDir, or ':memory:'. */
  dbFile: Type.String({ minLength: 1 }),

  /** How long SQLite blocks on the write lock before reporting busy; retries cover the rest. */
  busyTimeoutMs: Type.Integer({ minimum: 0 }),

  /** Default lock TTL. */
  lockTtlMs: Type.Integer({ minimum: 1 }),

  /** Drift tolerated on holder renewals. */
  clockSkewMs: Type.Integer({ minimum: 0 }),

  /** TTL overrides per resource class, e.g. { session: 300000 }. */
  classTtls: Type.Record(Type.String({ pattern: '^[A-Za-z0-9_-]+$' }), Type.Integer({ minimum: 1 })),

  /** Accepted X-API-Key values. Empty disables key checks. */
  apiKeys: Type.Array(Type.String({ minLength: 1 })),

  /** Users allowed to force-release and run lifecycle hooks. */
  adminUserIds: Type.Array(Type.String({ minLength: 1 })),

  corsOrigins: Type.Array(Type.String({ minLength: 1 })),

  /** Attempts per store call when the database is busy. */
  storeRetryAttempts: Type.Integer({ minimum: 1, maximum: 10 }),
});

export type AppConfig = Static<typeof AppConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = {
  port: 8000,
  dataDir: './data',
  dbFile: 'locks.db',
  busyTimeoutMs: 25,
  lockTtlMs: 15 * 60 * 1000,
  clockSkewMs: 2000,
  classTtls: {},
  apiKeys: [],
  adminUserIds: [],
  corsOrigins: ['http://localhost:3000', 'http://127.0.0.1:3000'],
  storeRetryAttempts: 5,
};
