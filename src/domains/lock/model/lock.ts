/**
 * Lock record and operation outcomes.
 * Outcomes are discriminated on `kind`; only storage failures are thrown.
 * Timestamps are epoch milliseconds.
 */

export interface Lock {
  resourceId: string;
  holderId: string;
  /** Increases on every acquire of the resource; unchanged by renew. */
  token: number;
  acquiredAt: number;
  lastRenewedAt: number;
  expiresAt: number;
}

// Store-level outcomes

export type AcquireResult =
  | { kind: 'granted'; expiresAt: number; token: number }
  | { kind: 'conflict'; holderId: string; expiresAt: number }
  | { kind: 'holder_removed' };

export type RenewResult =
  | { kind: 'granted'; expiresAt: number; token: number }
  | { kind: 'not_holder' }
  | { kind: 'expired' };

export type ReleaseResult =
  | { kind: 'released' }
  | { kind: 'not_holder' };

export type StoredLockStatus =
  | { kind: 'absent' }
  | { kind: 'active'; holderId: string; expiresAt: number; acquiredAt: number; token: number }
  | { kind: 'expired'; lastHolderId: string; expiredAt: number };

// Manager-level outcomes

export type PermissionDenied = { kind: 'permission_denied' };

export type LockGranted = {
  kind: 'granted';
  expiresAt: number;
  token: number;
  /** How often the editing client should renew. */
  heartbeatIntervalMs: number;
};

export type AcquireLockResult =
  | LockGranted
  | { kind: 'conflict'; holderId: string; expiresAt: number }
  | PermissionDenied;

export type RenewLockResult =
  | LockGranted
  | { kind: 'not_holder' }
  | { kind: 'expired' }
  | PermissionDenied;

/** Public view: no token, no acquisition time. */
export type LockStatus =
  | { kind: 'absent' }
  | { kind: 'active'; holderId: string; expiresAt: number }
  | { kind: 'expired'; lastHolderId: string };
