import { db, type Database } from "../db/index";
import { auditLogs } from "../db/schema/index";

// ============================================
// Audit Logging — append-only audit trail
// ============================================

export interface AuditLogEntry {
  userId?: string | null;
  action: string;
  resourceType?: string;
  resourceId?: string;
  changes?: {
    before?: Record<string, unknown>;
    after?: Record<string, unknown>;
  };
  ipAddress?: string;
}

/**
 * Create an audit log entry.
 * This is append-only — audit logs are never updated or deleted.
 *
 * @param database - Pass ctx.db (or the open transaction) so the entry
 *                   commits or rolls back with the change it describes.
 */
export async function createAuditLog(
  entry: AuditLogEntry,
  database: Database = db
): Promise<void> {
  await database.insert(auditLogs).values({
    userId: entry.userId ?? null,
    action: entry.action,
    resourceType: entry.resourceType ?? null,
    resourceId: entry.resourceId ?? null,
    changes: entry.changes ?? null,
    ipAddress: entry.ipAddress ?? null,
  });
}
