import type { Lock, LockGranted, LockStatus } from '../model/lock.js';

const iso = (ms: number) => new Date(ms).toISOString();

export function mapGranted(resourceId: string, granted: LockGranted) {
  return {
    acquired: true,
    resource_id: resourceId,
    token: granted.token,
    expires_at: iso(granted.expiresAt),
    heartbeat_interval_ms: granted.heartbeatIntervalMs,
  };
}

/** 423 body: who holds the resource and until when. */
export function mapConflict(resourceId: string, holderId: string, expiresAt: number) {
  return {
    error: 'Resource is locked by another editor',
    resource_id: resourceId,
    holder_id: holderId,
    expires_at: iso(expiresAt),
  };
}

export function mapStatus(resourceId: string, status: LockStatus) {
  switch (status.kind) {
    case 'absent':
      return { resource_id: resourceId, state: 'absent' as const };
    case 'active':
      return {
        resource_id: resourceId,
        state: 'active' as const,
        holder_id: status.holderId,
        expires_at: iso(status.expiresAt),
      };
    case 'expired':
      return { resource_id: resourceId, state: 'expired' as const, last_holder_id: status.lastHolderId };
  }
}

export function mapHeldLock(lock: Lock) {
  return {
    resource_id: lock.resourceId,
    token: lock.token,
    acquired_at: iso(lock.acquiredAt),
    last_renewed_at: iso(lock.lastRenewedAt),
    expires_at: iso(lock.expiresAt),
  };
}
