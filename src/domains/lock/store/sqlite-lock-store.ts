import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LockStore } from './lock-store.js';
import type {
  AcquireResult,
  Lock,
  ReleaseResult,
  RenewResult,
  StoredLockStatus,
} from '../model/lock.js';
import { StoreUnavailableError } from '../../../shared/errors/index.js';
import { createLogger } from '../../../shared/logging/logger.js';

const log = createLogger('lock-store');

interface LockRow {
  resource_id: string;
  holder_id: string;
  token: number;
  acquired_at: number;
  last_renewed_at: number;
  expires_at: number;
}

/** SQLite result codes that mean "try again later" rather than "bad statement". */
const TRANSIENT_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_CANTOPEN', 'SQLITE_IOERR', 'SQLITE_PROTOCOL'];

export function isTransientSqliteError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err) || typeof err.code !== 'string') {
    return false;
  }
  const code = err.code;
  return TRANSIENT_CODES.some(prefix => code === prefix || code.startsWith(`${prefix}_`));
}

function toLock(row: LockRow): Lock {
  return {
    resourceId: row.resource_id,
    holderId: row.holder_id,
    token: row.token,
    acquiredAt: row.acquired_at,
    lastRenewedAt: row.last_renewed_at,
    expiresAt: row.expires_at,
  };
}

/** Default wait for the write lock. better-sqlite3 waits synchronously, so keep it short. */
export const DEFAULT_BUSY_TIMEOUT_MS = 25;

/**
 * Open a database file shared by every process coordinating on it.
 * WAL lets readers run beside the single writer. busy_timeout bounds how long
 * a writer blocks on the write lock before SQLITE_BUSY is raised; longer
 * contention is left to the caller's async retry.
 */
export function openLockDatabase(dbPath: string, busyTimeoutMs = DEFAULT_BUSY_TIMEOUT_MS): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma(`busy_timeout = ${busyTimeoutMs}`);
  return db;
}

/**
 * LockStore over a SQLite table. Each mutation runs in a `BEGIN IMMEDIATE`
 * transaction, which takes the database write lock before the row is read,
 * so the read-check-write is serialized across connections and processes.
 */
export class SqliteLockStore implements LockStore {
  private readonly selectStmt: Database.Statement<[string], LockRow>;
  private readonly insertStmt: Database.Statement<[string, string, number, number, number, number]>;
  private readonly overwriteStmt: Database.Statement<[string, number, number, number, number, string]>;
  private readonly renewStmt: Database.Statement<[number, number, string, number]>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private readonly byHolderStmt: Database.Statement<[string], LockRow>;
  private readonly nextTokenStmt: Database.Statement<[], { value: number }>;
  private readonly isRemovedStmt: Database.Statement<[string], { removed: number }>;
  private readonly markRemovedStmt: Database.Statement<[string, number]>;
  private readonly unmarkRemovedStmt: Database.Statement<[string]>;
  private readonly deleteByHolderStmt: Database.Statement<[string], { resource_id: string }>;

  constructor(private readonly db: Database.Database) {
    this.init();

    this.selectStmt = db.prepare<[string], LockRow>(
      'SELECT * FROM conference_locks WHERE resource_id = ?'
    );
    this.insertStmt = db.prepare<[string, string, number, number, number, number]>(`
      INSERT INTO conference_locks (resource_id, holder_id, token, acquired_at, last_renewed_at, expires_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    this.overwriteStmt = db.prepare<[string, number, number, number, number, string]>(`
      UPDATE conference_locks
      SET holder_id = ?, token = ?, acquired_at = ?, last_renewed_at = ?, expires_at = ?
      WHERE resource_id = ?
    `);
    this.renewStmt = db.prepare<[number, number, string, number]>(`
      UPDATE conference_locks
      SET last_renewed_at = ?, expires_at = ?
      WHERE resource_id = ? AND token = ?
    `);
    this.deleteStmt = db.prepare<[string]>('DELETE FROM conference_locks WHERE resource_id = ?');
    this.byHolderStmt = db.prepare<[string], LockRow>(
      'SELECT * FROM conference_locks WHERE holder_id = ? ORDER BY resource_id'
    );
    this.nextTokenStmt = db.prepare<[], { value: number }>(
      'UPDATE lock_sequence SET value = value + 1 WHERE id = 1 RETURNING value'
    );
    this.isRemovedStmt = db.prepare<[string], { removed: number }>(
      'SELECT 1 AS removed FROM removed_holders WHERE holder_id = ?'
    );
    this.markRemovedStmt = db.prepare<[string, number]>(`
      INSERT INTO removed_holders (holder_id, removed_at) VALUES (?, ?)
      ON CONFLICT(holder_id) DO UPDATE SET removed_at = excluded.removed_at
    `);
    this.unmarkRemovedStmt = db.prepare<[string]>('DELETE FROM removed_holders WHERE holder_id = ?');
    this.deleteByHolderStmt = db.prepare<[string], { resource_id: string }>(
      'DELETE FROM conference_locks WHERE holder_id = ? RETURNING resource_id'
    );
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conference_locks (
        resource_id TEXT PRIMARY KEY,
        holder_id TEXT NOT NULL,
        token INTEGER NOT NULL,
        acquired_at INTEGER NOT NULL,
        last_renewed_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_locks_holder ON conference_locks(holder_id);

      CREATE TABLE IF NOT EXISTS lock_sequence (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        value INTEGER NOT NULL
      );
      INSERT OR IGNORE INTO lock_sequence (id, value) VALUES (1, 0);

      CREATE TABLE IF NOT EXISTS removed_holders (
        holder_id TEXT PRIMARY KEY,
        removed_at INTEGER NOT NULL
      );
    `);
  }

  async tryAcquire(resourceId: string, holderId: string, ttlMs: number, now: number): Promise<AcquireResult> {
    return this.write('acquire', () => {
      if (this.isRemovedStmt.get(holderId)) {
        return { kind: 'holder_removed' };
      }
      const row = this.selectStmt.get(resourceId);
      const expiresAt = now + ttlMs;

      if (!row) {
        const token = this.nextToken();
        this.insertStmt.run(resourceId, holderId, token, now, now, expiresAt);
        log.debug({ resourceId, holderId, token }, 'lock created');
        return { kind: 'granted', expiresAt, token };
      }

      const expired = now >= row.expires_at;
      if (!expired && row.holder_id !== holderId) {
        return { kind: 'conflict', holderId: row.holder_id, expiresAt: row.expires_at };
      }

      // Same holder keeps its original acquisition time; a reclaim starts over.
      const acquiredAt = expired ? now : row.acquired_at;
      const token = this.nextToken();
      this.overwriteStmt.run(holderId, token, acquiredAt, now, expiresAt, resourceId);
      if (expired) {
        log.debug({ resourceId, holderId, previousHolder: row.holder_id, token }, 'expired lock reclaimed');
      }
      return { kind: 'granted', expiresAt, token };
    });
  }

  async renew(
    resourceId: string,
    holderId: string,
    ttlMs: number,
    now: number,
    graceMs: number,
    expectedToken?: number
  ): Promise<RenewResult> {
    return this.write('renew', () => {
      const row = this.selectStmt.get(resourceId);
      if (!row || row.holder_id !== holderId) {
        return { kind: 'not_holder' };
      }
      if (expectedToken !== undefined && row.token !== expectedToken) {
        return { kind: 'not_holder' };
      }
      if (now >= row.expires_at + graceMs) {
        return { kind: 'expired' };
      }

      const expiresAt = Math.max(now + ttlMs, row.expires_at + 1);
      const lastRenewedAt = Math.max(now, row.last_renewed_at);
      this.renewStmt.run(lastRenewedAt, expiresAt, resourceId, row.token);
      return { kind: 'granted', expiresAt, token: row.token };
    });
  }

  async release(resourceId: string, holderId: string): Promise<ReleaseResult> {
    return this.write('release', () => {
      const row = this.selectStmt.get(resourceId);
      if (!row) {
        return { kind: 'released' };
      }
      if (row.holder_id !== holderId) {
        return { kind: 'not_holder' };
      }
      this.deleteStmt.run(resourceId);
      return { kind: 'released' };
    });
  }

  async forceRelease(resourceId: string): Promise<{ kind: 'released' }> {
    return this.write('force-release', () => {
      this.deleteStmt.run(resourceId);
      return { kind: 'released' };
    });
  }

  async removeHolder(holderId: string, resourceIds: string[], now: number): Promise<string[]> {
    return this.write('remove-holder', () => {
      this.markRemovedStmt.run(holderId, now);
      const removed = new Set(this.deleteByHolderStmt.all(holderId).map(row => row.resource_id));
      for (const resourceId of resourceIds) {
        if (this.deleteStmt.run(resourceId).changes > 0) {
          removed.add(resourceId);
        }
      }
      return [...removed].sort();
    });
  }

  async reinstateHolder(holderId: string): Promise<boolean> {
    return this.write('reinstate-holder', () => this.unmarkRemovedStmt.run(holderId).changes > 0);
  }

  async status(resourceId: string, now: number): Promise<StoredLockStatus> {
    const row = this.read('status', () => this.selectStmt.get(resourceId));
    if (!row) {
      return { kind: 'absent' };
    }
    if (now >= row.expires_at) {
      return { kind: 'expired', lastHolderId: row.holder_id, expiredAt: row.expires_at };
    }
    return {
      kind: 'active',
      holderId: row.holder_id,
      expiresAt: row.expires_at,
      acquiredAt: row.acquired_at,
      token: row.token,
    };
  }

  async listHeldBy(holderId: string): Promise<Lock[]> {
    return this.read('list', () => this.byHolderStmt.all(holderId)).map(toLock);
  }

  close(): void {
    this.db.close();
  }

  private nextToken(): number {
    const row = this.nextTokenStmt.get();
    if (!row) {
      throw new Error('lock_sequence row missing');
    }
    return row.value;
  }

  private write<T>(operation: string, fn: () => T): T {
    return this.guard(operation, () => this.db.transaction(fn).immediate());
  }

  private read<T>(operation: string, fn: () => T): T {
    return this.guard(operation, fn);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isTransientSqliteError(err)) {
        log.warn({ operation, err }, 'lock store unavailable');
        throw new StoreUnavailableError(operation, err);
      }
      throw err;
    }
  }
}
