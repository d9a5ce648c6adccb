import { asc, eq } from "drizzle-orm";
import type { Db } from "../db.js";
import { auditLogs } from "../schema.js";
import type { AuditEntry } from "../../types/index.js";

type AuditRow = typeof auditLogs.$inferSelect;

function toEntry(row: AuditRow): AuditEntry {
  return {
    id: row.id,
    groupId: row.groupId,
    entityType: row.entityType,
    entityId: row.entityId,
    action: row.action,
    actorId: row.actorId ?? undefined,
    before: row.beforeState ?? undefined,
    after: row.afterState ?? undefined,
    createdAt: row.createdAt,
  };
}

/**
 * Append-only change history. States are stored as JSON, so dates come back as ISO strings.
 */
export class AuditRepo {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  async record(entry: Omit<AuditEntry, "id" | "createdAt">): Promise<AuditEntry> {
    const row = this.db
      .insert(auditLogs)
      .values({
        groupId: entry.groupId,
        entityType: entry.entityType,
        entityId: entry.entityId,
        action: entry.action,
        actorId: entry.actorId ?? null,
        beforeState: entry.before ?? null,
        afterState: entry.after ?? null,
        createdAt: new Date(),
      })
      .returning()
      .get();

    return toEntry(row);
  }

  /**
   * A group's history, oldest first
   */
  async findByGroupId(groupId: string): Promise<AuditEntry[]> {
    const rows = await this.db
      .select()
      .from(auditLogs)
      .where(eq(auditLogs.groupId, groupId))
      .orderBy(asc(auditLogs.id));

    return rows.map(toEntry);
  }
}
