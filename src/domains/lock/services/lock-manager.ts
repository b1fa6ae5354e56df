import type { LockStore } from '../store/lock-store.js';
import type { ExpiryPolicy } from '../policy/expiry-policy.js';
import type { Clock, PermissionChecker } from '../ports/index.js';
import type {
  AcquireLockResult,
  Lock,
  LockStatus,
  ReleaseResult,
  RenewLockResult,
} from '../model/lock.js';
import { StoreUnavailableError } from '../../../shared/errors/index.js';
import { DEFAULT_RETRY, withRetry, type RetryOptions } from '../../../shared/utils/retry.js';
import { auditLog } from '../../../shared/logging/audit.js';
import { createLogger } from '../../../shared/logging/logger.js';

const log = createLogger('lock-manager');

export interface LockManagerOptions {
  /** Bounded retry applied to transient store failures. */
  retry?: RetryOptions;
}

export type ForceReleaseReason = 'admin' | 'user-removed';

/** Who triggered a forced release, recorded in the audit log. */
export interface ForceReleaseActor {
  actorId: string;
  reason: ForceReleaseReason;
}

/**
 * Coordinates edit locks for conferences.
 *
 * Every call returns immediately with a definitive outcome; callers that get
 * a conflict decide their own polling. Logical outcomes are values. Only a
 * store that stays unavailable after the retry budget throws.
 */
export class LockManager {
  private readonly retry: RetryOptions;

  constructor(
    private readonly store: LockStore,
    private readonly policy: ExpiryPolicy,
    private readonly permissions: PermissionChecker,
    private readonly clock: Clock,
    options: LockManagerOptions = {}
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY;
  }

  async acquireLock(resourceId: string, userId: string): Promise<AcquireLockResult> {
    if (!(await this.permissions.canEdit(userId, resourceId))) {
      log.debug({ resourceId, userId }, 'acquire denied');
      return { kind: 'permission_denied' };
    }

    const ttlMs = this.policy.ttlFor(resourceId);
    const result = await this.withStore('acquire', () =>
      this.store.tryAcquire(resourceId, userId, ttlMs, this.clock.now())
    );

    if (result.kind === 'holder_removed') {
      log.info({ resourceId, userId }, 'acquire refused for removed user');
      return { kind: 'permission_denied' };
    }
    if (result.kind === 'conflict') {
      log.debug({ resourceId, userId, holderId: result.holderId }, 'lock conflict');
      return result;
    }
    log.info({ resourceId, userId, token: result.token }, 'lock acquired');
    return { ...result, heartbeatIntervalMs: this.policy.heartbeatIntervalMs(resourceId) };
  }

  /**
   * Heartbeat from an active editing session.
   * @param token - token from the acquire; a mismatch means another session re-acquired
   */
  async renewLock(resourceId: string, userId: string, token?: number): Promise<RenewLockResult> {
    if (!(await this.permissions.canEdit(userId, resourceId))) {
      return { kind: 'permission_denied' };
    }

    const ttlMs = this.policy.ttlFor(resourceId);
    const result = await this.withStore('renew', () =>
      this.store.renew(resourceId, userId, ttlMs, this.clock.now(), this.policy.renewGraceMs, token)
    );

    if (result.kind !== 'granted') {
      log.warn({ resourceId, userId, outcome: result.kind }, 'lock renew failed');
      return result;
    }
    return { ...result, heartbeatIntervalMs: this.policy.heartbeatIntervalMs(resourceId) };
  }

  /** Ends an editing session. Not permission-gated so revoked editors can still let go. */
  async releaseLock(resourceId: string, userId: string): Promise<ReleaseResult> {
    const result = await this.withStore('release', () => this.store.release(resourceId, userId));
    if (result.kind === 'released') {
      log.info({ resourceId, userId }, 'lock released');
    }
    return result;
  }

  async forceReleaseLock(resourceId: string, actor: ForceReleaseActor): Promise<{ kind: 'released' }> {
    const result = await this.withStore('force-release', () => this.store.forceRelease(resourceId));
    auditLog('lock.force_release', actor.actorId, [resourceId], { reason: actor.reason });
    return result;
  }

  /**
   * Bar the user from acquiring and force-release every lock naming them plus
   * `resourceIds`, in one store transaction. Returns the released ids.
   */
  async removeHolder(userId: string, resourceIds: string[], actor: ForceReleaseActor): Promise<string[]> {
    const unique = [...new Set(resourceIds)];
    const released = await this.withStore('remove-holder', () =>
      this.store.removeHolder(userId, unique, this.clock.now())
    );
    auditLog('lock.remove_holder', actor.actorId, released, { userId, reason: actor.reason });
    return released;
  }

  /** Let a previously removed user acquire locks again. */
  async reinstateHolder(userId: string, actorId: string): Promise<boolean> {
    const reinstated = await this.withStore('reinstate-holder', () => this.store.reinstateHolder(userId));
    if (reinstated) {
      auditLog('lock.reinstate_holder', actorId, undefined, { userId });
    }
    return reinstated;
  }

  async statusOf(resourceId: string): Promise<LockStatus> {
    const status = await this.withStore('status', () => this.store.status(resourceId, this.clock.now()));
    switch (status.kind) {
      case 'absent':
        return status;
      case 'active':
        return { kind: 'active', holderId: status.holderId, expiresAt: status.expiresAt };
      case 'expired':
        return { kind: 'expired', lastHolderId: status.lastHolderId };
    }
  }

  /** Unexpired locks held by the user. */
  async locksHeldBy(userId: string): Promise<Lock[]> {
    const locks = await this.withStore('list', () => this.store.listHeldBy(userId));
    const now = this.clock.now();
    return locks.filter(lock => !this.policy.isExpired(lock.expiresAt, now));
  }

  /** Every row naming the user, expired ones included. */
  async allLocksOf(userId: string): Promise<Lock[]> {
    return this.withStore('list', () => this.store.listHeldBy(userId));
  }

  private withStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(
      fn,
      err => err instanceof StoreUnavailableError,
      this.retry,
      (err, attempt, delayMs) => {
        log.warn({ operation, attempt, delayMs, err }, 'lock store unavailable, retrying');
      }
    );
  }
}
