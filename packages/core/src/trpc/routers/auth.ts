import { TRPCError } from "@trpc/server";
import { eq } from "drizzle-orm";
import { router, publicProcedure, protectedProcedure } from "../procedures";
import { users } from "../../db/schema/index";
import { hashPassword, verifyPassword } from "../../auth/password";
import {
  invalidateSession,
  invalidateAllUserSessions,
} from "../../auth/session";
import { createAuditLog } from "../../audit/index";
import { changePasswordSchema } from "@rigtrack/shared";

// ============================================
// Auth Router — session info, password change, logout
// Login itself happens in POST /api/auth/login so the
// token can be set as an httpOnly cookie.
// ============================================

export const authRouter = router({
  /**
   * The current user, or null when not signed in.
   */
  me: publicProcedure.query(({ ctx }) => {
    if (!ctx.session) return null;
    return {
      user: ctx.session.user,
      expiresAt: ctx.session.session.expiresAt,
    };
  }),

  /**
   * Change the caller's password. Every other session of the user is
   * signed out.
   */
  changePassword: protectedProcedure
    .input(changePasswordSchema)
    .mutation(async ({ input, ctx }) => {
      const [user] = await ctx.db
        .select({ passwordHash: users.passwordHash })
        .from(users)
        .where(eq(users.id, ctx.session.user.id))
        .limit(1);

      if (!user || !(await verifyPassword(input.currentPassword, user.passwordHash))) {
        throw new TRPCError({
          code: "BAD_REQUEST",
          message: "Current password is incorrect",
        });
      }

      await ctx.db
        .update(users)
        .set({ passwordHash: await hashPassword(input.newPassword) })
        .where(eq(users.id, ctx.session.user.id));

      await invalidateAllUserSessions(
        ctx.session.user.id,
        { exceptSessionId: ctx.session.session.id },
        ctx.db
      );

      await createAuditLog(
        {
          userId: ctx.session.user.id,
          action: "auth:password_changed",
          resourceType: "user",
          resourceId: ctx.session.user.id,
          ipAddress: ctx.ipAddress,
        },
        ctx.db
      );

      return { success: true };
    }),

  /**
   * Logout — invalidate the current session.
   */
  logout: protectedProcedure.mutation(async ({ ctx }) => {
    await invalidateSession(ctx.session.session.id, ctx.db);
    return { success: true };
  }),
});
