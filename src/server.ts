import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { loadConfig, databasePath } from './domains/config/index.js';
import { SqliteLockStore, openLockDatabase } from './domains/lock/store/sqlite-lock-store.js';
import { ExpiryPolicy } from './domains/lock/policy/expiry-policy.js';
import { LockManager } from './domains/lock/services/lock-manager.js';
import { LifecycleHooks } from './domains/lock/services/lifecycle-hooks.js';
import { SqliteEditorAssignments } from './domains/lock/adapters/editor-assignments.js';
import { systemClock } from './domains/lock/ports/index.js';
import { DEFAULT_RETRY } from './shared/utils/retry.js';
import { logger } from './shared/logging/logger.js';

const config = loadConfig();

const db = openLockDatabase(databasePath(config), config.busyTimeoutMs);
const lockStore = new SqliteLockStore(db);
const assignments = new SqliteEditorAssignments(db, config.adminUserIds);
const policy = new ExpiryPolicy({
  ttlMs: config.lockTtlMs,
  clockSkewMs: config.clockSkewMs,
  classTtls: config.classTtls,
});
const lockManager = new LockManager(lockStore, policy, assignments, systemClock, {
  retry: { ...DEFAULT_RETRY, attempts: config.storeRetryAttempts },
});
const lifecycleHooks = new LifecycleHooks(lockManager, assignments);

const app = createApp({
  lockManager,
  lifecycleHooks,
  isAdmin: (userId) => assignments.isAdmin(userId),
  apiKeys: config.apiKeys,
  corsOrigins: config.corsOrigins,
});

const server = serve({ fetch: app.fetch, port: config.port });
logger.info({ port: config.port, db: databasePath(config), ttlMs: config.lockTtlMs }, 'conference lock API running');

function shutdown(signal: string): void {
  logger.info({ signal }, 'shutting down');
  server.close(() => {
    lockStore.close();
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
