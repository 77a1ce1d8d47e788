import { eq, desc } from "drizzle-orm";
import { z } from "zod";
import { router, adminProcedure } from "../procedures";
import { auditLogs, users } from "../../db/schema/index";

// ============================================
// Audit Router — view the activity log (admins only)
// ============================================

export const auditRouter = router({
  /**
   * Newest entries first, with the acting username.
   */
  list: adminProcedure
    .input(
      z
        .object({
          resourceType: z.string().trim().max(50).optional(),
          limit: z.number().int().min(1).max(200).default(50),
        })
        .optional()
    )
    .query(async ({ input, ctx }) => {
      return ctx.db
        .select({
          id: auditLogs.id,
          action: auditLogs.action,
          resourceType: auditLogs.resourceType,
          resourceId: auditLogs.resourceId,
          changes: auditLogs.changes,
          ipAddress: auditLogs.ipAddress,
          createdAt: auditLogs.createdAt,
          userId: auditLogs.userId,
          username: users.username,
        })
        .from(auditLogs)
        .leftJoin(users, eq(auditLogs.userId, users.id))
        .where(
          input?.resourceType
            ? eq(auditLogs.resourceType, input.resourceType)
            : undefined
        )
        .orderBy(desc(auditLogs.createdAt), desc(auditLogs.id))
        .limit(input?.limit ?? 50);
    }),
});
