import type { Clock, PermissionChecker, ResourceOwnershipIndex } from '../domains/lock/ports/index.js';

/** Clock moved by hand. */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/** Grants edit rights per user, optionally per resource. */
export class StaticPermissions implements PermissionChecker {
  private readonly grants = new Map<string, Set<string> | '*'>();

  allow(userId: string, resourceIds: string[] | '*' = '*'): this {
    this.grants.set(userId, resourceIds === '*' ? '*' : new Set(resourceIds));
    return this;
  }

  revoke(userId: string): void {
    this.grants.delete(userId);
  }

  canEdit(userId: string, resourceId: string): boolean {
    const grant = this.grants.get(userId);
    if (grant === undefined) return false;
    return grant === '*' || grant.has(resourceId);
  }
}

export class StaticOwnership implements ResourceOwnershipIndex {
  constructor(private readonly owned: Record<string, string[]>) {}

  resourcesFor(userId: string): string[] {
    return this.owned[userId] ?? [];
  }
}

export const FAST_RETRY = { attempts: 3, baseDelayMs: 1, maxDelayMs: 1 };
