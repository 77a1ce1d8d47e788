import { TRPCError } from "@trpc/server";
import { eq, and, asc } from "drizzle-orm";
import { z } from "zod";
import { router, adminProcedure } from "../procedures";
import { users, type User } from "../../db/schema/index";
import type { Database } from "../../db/index";
import { hashPassword } from "../../auth/password";
import { invalidateAllUserSessions } from "../../auth/session";
import { createAuditLog } from "../../audit/index";
import {
  createUserSchema,
  updateUserSchema,
  resetPasswordSchema,
  uuidSchema,
} from "@rigtrack/shared";

// ============================================
// Users Router — admin-only account management
// ============================================

const publicUserColumns = {
  id: users.id,
  username: users.username,
  role: users.role,
  isActive: users.isActive,
  lastLoginAt: users.lastLoginAt,
  createdAt: users.createdAt,
  updatedAt: users.updatedAt,
};

async function findUser(database: Database, id: string): Promise<User> {
  const [user] = await database
    .select()
    .from(users)
    .where(eq(users.id, id))
    .limit(1);
  if (!user) {
    throw new TRPCError({ code: "NOT_FOUND", message: "User not found" });
  }
  return user;
}

/**
 * Refuse to take `target` out of the active admins when nobody else is
 * left. The active admin rows stay locked until the transaction ends, so
 * two admins removing each other cannot both pass.
 */
async function ensureAnotherActiveAdmin(
  tx: Database,
  target: User
): Promise<void> {
  if (target.role !== "admin" || !target.isActive) return;

  const admins = await tx
    .select({ id: users.id })
    .from(users)
    .where(and(eq(users.role, "admin"), eq(users.isActive, true)))
    .for("update");
  if (!admins.some((admin) => admin.id !== target.id)) {
    throw new TRPCError({
      code: "BAD_REQUEST",
      message: "At least one active admin is required",
    });
  }
}

async function ensureUsernameAvailable(
  database: Database,
  username: string
): Promise<void> {
  const [existing] = await database
    .select({ id: users.id })
    .from(users)
    .where(eq(users.username, username))
    .limit(1);
  if (existing) {
    throw new TRPCError({
      code: "CONFLICT",
      message: `The username "${username}" is already taken`,
    });
  }
}

export const usersRouter = router({
  list: adminProcedure.query(async ({ ctx }) => {
    return ctx.db
      .select(publicUserColumns)
      .from(users)
      .orderBy(asc(users.username));
  }),

  create: adminProcedure
    .input(createUserSchema)
    .mutation(async ({ input, ctx }) => {
      await ensureUsernameAvailable(ctx.db, input.username);

      const [user] = await ctx.db
        .insert(users)
        .values({
          username: input.username,
          passwordHash: await hashPassword(input.password),
          role: input.role,
        })
        .returning(publicUserColumns);

      if (!user) {
        throw new TRPCError({
          code: "INTERNAL_SERVER_ERROR",
          message: "Failed to create user",
        });
      }

      await createAuditLog(
        {
          userId: ctx.session.user.id,
          action: "user:created",
          resourceType: "user",
          resourceId: user.id,
          changes: { after: { username: user.username, role: user.role } },
          ipAddress: ctx.ipAddress,
        },
        ctx.db
      );

      return user;
    }),

  /**
   * Change role or active flag. Admins cannot demote or deactivate
   * themselves, and the last active admin stays an active admin.
   */
  update: adminProcedure
    .input(updateUserSchema)
    .mutation(async ({ input, ctx }) => {
      const demoting = input.role !== undefined && input.role !== "admin";
      const deactivating = input.isActive === false;

      if (input.id === ctx.session.user.id && (demoting || deactivating)) {
        throw new TRPCError({
          code: "BAD_REQUEST",
          message: "You cannot demote or deactivate your own account",
        });
      }

      const changes: Partial<Pick<User, "role" | "isActive">> = {};
      if (input.role !== undefined) changes.role = input.role;
      if (input.isActive !== undefined) changes.isActive = input.isActive;

      return ctx.db.transaction(async (tx) => {
        const target = await findUser(tx, input.id);
        if (Object.keys(changes).length === 0) {
          const { passwordHash: _hash, ...unchanged } = target;
          return unchanged;
        }
        if (demoting || deactivating) {
          await ensureAnotherActiveAdmin(tx, target);
        }

        const [updated] = await tx
          .update(users)
          .set(changes)
          .where(eq(users.id, input.id))
          .returning(publicUserColumns);

        if (deactivating) {
          await invalidateAllUserSessions(input.id, {}, tx);
        }

        await createAuditLog(
          {
            userId: ctx.session.user.id,
            action: "user:updated",
            resourceType: "user",
            resourceId: input.id,
            changes: {
              before: { role: target.role, isActive: target.isActive },
              after: changes,
            },
            ipAddress: ctx.ipAddress,
          },
          tx
        );

        return updated;
      });
    }),

  /**
   * Set a new password and sign the user out everywhere.
   */
  resetPassword: adminProcedure
    .input(resetPasswordSchema)
    .mutation(async ({ input, ctx }) => {
      const passwordHash = await hashPassword(input.password);

      return ctx.db.transaction(async (tx) => {
        await findUser(tx, input.id);

        await tx
          .update(users)
          .set({ passwordHash })
          .where(eq(users.id, input.id));

        await invalidateAllUserSessions(input.id, {}, tx);

        await createAuditLog(
          {
            userId: ctx.session.user.id,
            action: "user:password_reset",
            resourceType: "user",
            resourceId: input.id,
            ipAddress: ctx.ipAddress,
          },
          tx
        );

        return { success: true };
      });
    }),

  delete: adminProcedure
    .input(z.object({ id: uuidSchema }))
    .mutation(async ({ input, ctx }) => {
      if (input.id === ctx.session.user.id) {
        throw new TRPCError({
          code: "BAD_REQUEST",
          message: "You cannot delete your own account",
        });
      }

      return ctx.db.transaction(async (tx) => {
        const target = await findUser(tx, input.id);
        await ensureAnotherActiveAdmin(tx, target);

        await tx.delete(users).where(eq(users.id, input.id));

        await createAuditLog(
          {
            userId: ctx.session.user.id,
            action: "user:deleted",
            resourceType: "user",
            resourceId: input.id,
            changes: {
              before: { username: target.username, role: target.role },
            },
            ipAddress: ctx.ipAddress,
          },
          tx
        );

        return { success: true };
      });
    }),
});
