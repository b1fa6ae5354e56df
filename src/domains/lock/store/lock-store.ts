import type {
  AcquireResult,
  Lock,
  ReleaseResult,
  RenewResult,
  StoredLockStatus,
} from '../model/lock.js';

/**
 * Persistence for one lock row per resource.
 *
 * Every mutating call is a single atomic read-check-write: two concurrent
 * `tryAcquire` calls for the same resource never both return `granted`.
 * A row is expired once `now >= expiresAt`; expiry is only ever evaluated,
 * never written. Storage failures surface as `StoreUnavailableError`.
 */
export interface LockStore {
  /**
   * Insert, reclaim an expired row, or refresh the caller's own row.
   * Each grant carries a fresh token. A holder marked removed is refused.
   */
  tryAcquire(resourceId: string, holderId: string, ttlMs: number, now: number): Promise<AcquireResult>;

  /**
   * Extend the caller's row. Accepted until `expiresAt + graceMs`.
   * When `expectedToken` is given it must match the stored token.
   */
  renew(
    resourceId: string,
    holderId: string,
    ttlMs: number,
    now: number,
    graceMs: number,
    expectedToken?: number
  ): Promise<RenewResult>;

  /** Delete the caller's row, expired or not. A missing row counts as released. */
  release(resourceId: string, holderId: string): Promise<ReleaseResult>;

  /** Delete regardless of holder. */
  forceRelease(resourceId: string): Promise<{ kind: 'released' }>;

  /**
   * In one transaction: mark the holder removed, delete every row naming it
   * and the listed rows whoever holds them. Returns the deleted resource ids,
   * sorted. Later acquires by the holder get `holder_removed`.
   */
  removeHolder(holderId: string, resourceIds: string[], now: number): Promise<string[]>;

  /** Lift a removal mark. Returns false when the holder was not marked. */
  reinstateHolder(holderId: string): Promise<boolean>;

  status(resourceId: string, now: number): Promise<StoredLockStatus>;

  /** Rows held by the user, expired ones included, ordered by resource id. */
  listHeldBy(holderId: string): Promise<Lock[]>;

  close(): void;
}
