// Collaborators supplied by the surrounding system.

export interface PermissionChecker {
  canEdit(userId: string, resourceId: string): boolean | Promise<boolean>;
}

/** Supplies the resources a departing user holds or is assigned to edit. */
export interface ResourceOwnershipIndex {
  resourcesFor(userId: string): string[] | Promise<string[]>;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
