import { ValidationError } from '../../../shared/errors/index.js';

export const DEFAULT_TTL_MS = 15 * 60 * 1000;
export const DEFAULT_CLOCK_SKEW_MS = 2000;

export interface ExpiryPolicyOptions {
  ttlMs?: number;
  /** Drift below this is tolerated when the holder renews. */
  clockSkewMs?: number;
  /** TTL overrides keyed by resource class (`conference` in `conference:42`). */
  classTtls?: Record<string, number>;
}

/**
 * All TTL arithmetic lives here.
 *
 * Acquisition and status use the exact expiry instant, so another user may
 * reclaim at `expiresAt`. Renewal by the current holder is accepted up to
 * `clockSkewMs` later, so a heartbeat that arrives a moment late still lands.
 */
export class ExpiryPolicy {
  readonly defaultTtlMs: number;
  readonly clockSkewMs: number;
  private readonly classTtls: ReadonlyMap<string, number>;

  constructor(opts: ExpiryPolicyOptions = {}) {
    this.defaultTtlMs = opts.ttlMs ?? DEFAULT_TTL_MS;
    this.clockSkewMs = opts.clockSkewMs ?? DEFAULT_CLOCK_SKEW_MS;
    this.classTtls = new Map(Object.entries(opts.classTtls ?? {}));

    validateTtl('default', this.defaultTtlMs);
    for (const [resourceClass, ttl] of this.classTtls) {
      validateTtl(resourceClass, ttl);
    }
    if (!Number.isFinite(this.clockSkewMs) || this.clockSkewMs < 0) {
      throw new ValidationError('clock skew tolerance must be a non-negative number of milliseconds');
    }
    const shortest = Math.min(this.defaultTtlMs, ...this.classTtls.values());
    if (this.clockSkewMs >= shortest / 3) {
      throw new ValidationError(
        `clock skew tolerance (${this.clockSkewMs}ms) must be below a third of the shortest TTL (${shortest}ms)`
      );
    }
  }

  ttlFor(resourceId: string): number {
    const resourceClass = resourceClassOf(resourceId);
    if (resourceClass === undefined) return this.defaultTtlMs;
    return this.classTtls.get(resourceClass) ?? this.defaultTtlMs;
  }

  expiresAtFrom(now: number, resourceId: string): number {
    return now + this.ttlFor(resourceId);
  }

  isExpired(expiresAt: number, now: number): boolean {
    return now >= expiresAt;
  }

  /** How long after `expiresAt` the holder's renew is still accepted. */
  get renewGraceMs(): number {
    return this.clockSkewMs;
  }

  /** Renew often enough that one missed heartbeat does not lose the lock. */
  heartbeatIntervalMs(resourceId: string): number {
    return Math.floor(this.ttlFor(resourceId) / 3);
  }
}

/** `conference:42` → `conference`; ids without a prefix have no class. */
export function resourceClassOf(resourceId: string): string | undefined {
  const idx = resourceId.indexOf(':');
  return idx > 0 ? resourceId.slice(0, idx) : undefined;
}

function validateTtl(label: string, ttl: number): void {
  if (!Number.isFinite(ttl) || ttl <= 0) {
    throw new ValidationError(`TTL for ${label} must be a positive number of milliseconds`);
  }
}
