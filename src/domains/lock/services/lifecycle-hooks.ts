import type { LockManager } from './lock-manager.js';
import type { ResourceOwnershipIndex } from '../ports/index.js';
import { createLogger } from '../../../shared/logging/logger.js';

const log = createLogger('lifecycle-hooks');

export interface UserRemovedResult {
  /** Resources targeted: supplied or owned ids plus every lock row naming the user. */
  resourceIds: string[];
  /** Locks that actually existed and were removed. */
  released: number;
}

export interface UserRestoredResult {
  /** False when the user had not been removed. */
  reinstated: boolean;
}

export interface SessionEndedResult {
  released: string[];
  /** Locks that had already passed to another user. */
  notHeld: string[];
  failed: { resourceId: string; error: string }[];
}

/**
 * Bulk release entry points for the user-removal and logout workflows.
 */
export class LifecycleHooks {
  constructor(
    private readonly locks: LockManager,
    private readonly ownership?: ResourceOwnershipIndex
  ) {}

  /**
   * Force-release everything the departing user holds or owns and bar further
   * acquires, in one store transaction, so an acquire racing the removal
   * cannot leave a lock naming the deleted user. Errors propagate so the
   * caller can abort the user deletion.
   */
  async onUserRemoved(userId: string, resourceIds?: string[], actorId = 'system'): Promise<UserRemovedResult> {
    const owned = resourceIds ?? (this.ownership ? await this.ownership.resourcesFor(userId) : []);
    const released = await this.locks.removeHolder(userId, owned, { actorId, reason: 'user-removed' });
    const targets = [...new Set([...owned, ...released])].sort();

    log.info({ userId, targets: targets.length, released: released.length }, 'locks released for removed user');
    return { resourceIds: targets, released: released.length };
  }

  /** A removed user id is back in use; allow it to acquire again. */
  async onUserRestored(userId: string, actorId = 'system'): Promise<UserRestoredResult> {
    const reinstated = await this.locks.reinstateHolder(userId, actorId);
    log.info({ userId, reinstated }, 'user restored');
    return { reinstated };
  }

  /**
   * Release the ending session's locks. Best effort: failures are logged and
   * reported, never thrown, since TTL expiry reclaims whatever is left.
   */
  async onSessionEnded(userId: string, resourceIds?: string[]): Promise<SessionEndedResult> {
    const result: SessionEndedResult = { released: [], notHeld: [], failed: [] };

    let targets: string[];
    try {
      targets = resourceIds ?? (await this.locks.allLocksOf(userId)).map(lock => lock.resourceId);
    } catch (err) {
      log.warn({ userId, err }, 'could not list locks for ended session');
      result.failed.push({ resourceId: '*', error: errorMessage(err) });
      return result;
    }

    for (const resourceId of new Set(targets)) {
      try {
        const outcome = await this.locks.releaseLock(resourceId, userId);
        if (outcome.kind === 'released') {
          result.released.push(resourceId);
        } else {
          result.notHeld.push(resourceId);
        }
      } catch (err) {
        log.warn({ userId, resourceId, err }, 'session-end release failed');
        result.failed.push({ resourceId, error: errorMessage(err) });
      }
    }

    log.debug({ userId, released: result.released.length, failed: result.failed.length }, 'session ended');
    return result;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
