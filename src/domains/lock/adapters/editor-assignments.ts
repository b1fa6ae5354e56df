import type Database from 'better-sqlite3';
import type { PermissionChecker, ResourceOwnershipIndex } from '../ports/index.js';
import { resourceClassOf } from '../policy/expiry-policy.js';

const CONFERENCE_CLASS = 'conference';

/** `conference:42` or `42` → `42`; ids of other classes → undefined. */
export function conferenceIdOf(resourceId: string): string | undefined {
  const resourceClass = resourceClassOf(resourceId);
  if (resourceClass === undefined) return resourceId;
  if (resourceClass !== CONFERENCE_CLASS) return undefined;
  return resourceId.slice(CONFERENCE_CLASS.length + 1) || undefined;
}

export function conferenceResourceId(conferenceId: string | number): string {
  return `${CONFERENCE_CLASS}:${conferenceId}`;
}

/**
 * Edit rights and ownership read from the conference tables that the
 * surrounding application maintains: the conference creator and the editors
 * assigned through `conference_user`. Configured admins may edit everything.
 */
export class SqliteEditorAssignments implements PermissionChecker, ResourceOwnershipIndex {
  private readonly admins: ReadonlySet<string>;
  private readonly canEditStmt: Database.Statement<[string, string, string, string], { allowed: number }>;
  private readonly ownedStmt: Database.Statement<[string, string], { id: string }>;

  constructor(private readonly db: Database.Database, adminUserIds: string[] = []) {
    this.admins = new Set(adminUserIds);
    this.ensureSchema();

    this.canEditStmt = db.prepare<[string, string, string, string], { allowed: number }>(`
      SELECT EXISTS (
        SELECT 1 FROM conferences WHERE CAST(id AS TEXT) = ? AND created_by = ?
        UNION ALL
        SELECT 1 FROM conference_user WHERE CAST(conference_id AS TEXT) = ? AND user_id = ?
      ) AS allowed
    `);
    this.ownedStmt = db.prepare<[string, string], { id: string }>(`
      SELECT CAST(id AS TEXT) AS id FROM conferences WHERE created_by = ?
      UNION
      SELECT CAST(conference_id AS TEXT) AS id FROM conference_user WHERE user_id = ?
      ORDER BY id
    `);
  }

  /** Creates the tables when this service runs against an empty database. */
  ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conferences (
        id INTEGER PRIMARY KEY,
        created_by TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS conference_user (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        conference_id INTEGER NOT NULL REFERENCES conferences(id) ON DELETE CASCADE,
        user_id TEXT NOT NULL,
        assigned_by TEXT NOT NULL,
        created_at INTEGER,
        updated_at INTEGER,
        UNIQUE (conference_id, user_id)
      );
    `);
  }

  isAdmin(userId: string): boolean {
    return this.admins.has(userId);
  }

  canEdit(userId: string, resourceId: string): boolean {
    if (this.isAdmin(userId)) return true;
    const conferenceId = conferenceIdOf(resourceId);
    if (conferenceId === undefined) return false;
    const row = this.canEditStmt.get(conferenceId, userId, conferenceId, userId);
    return row?.allowed === 1;
  }

  resourcesFor(userId: string): string[] {
    return this.ownedStmt.all(userId, userId).map(row => conferenceResourceId(row.id));
  }
}
