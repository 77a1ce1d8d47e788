import { initTRPC, TRPCError } from "@trpc/server";
import superjson from "superjson";
import { ZodError } from "zod";
import type { Context } from "./context";
import { checkPermission, isAdminRole } from "../rbac/index";
import { isUniqueViolation } from "../db/errors";

// ============================================
// tRPC Initialization + Base Procedures
// ============================================

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        zodError:
          error.code === "BAD_REQUEST" && error.cause instanceof ZodError
            ? error.cause.flatten()
            : null,
      },
    };
  },
});

export const router = t.router;
export const createCallerFactory = t.createCallerFactory;

// ------------------------------------------
// Middleware: database errors
// A unique violation that slipped past a pre-check becomes CONFLICT
// ------------------------------------------
const mapDatabaseErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok && isUniqueViolation(result.error)) {
    throw new TRPCError({
      code: "CONFLICT",
      message: "A record with the same identifier already exists",
      cause: result.error.cause,
    });
  }
  return result;
});

// ------------------------------------------
// Middleware: CSRF protection
// Verify X-TRPC-Source header on mutations
// ------------------------------------------
const csrfProtection = t.middleware(({ ctx, type, next }) => {
  // Only enforce on mutations (POST requests)
  if (type === "mutation") {
    const source = ctx.trpcSource;
    if (source !== "react" && source !== "server") {
      throw new TRPCError({
        code: "FORBIDDEN",
        message: "Invalid request source",
      });
    }
  }
  return next({ ctx });
});

// ------------------------------------------
// Middleware: Auth (session validation)
// ------------------------------------------
const isAuthenticated = t.middleware(({ ctx, next }) => {
  if (!ctx.session) {
    throw new TRPCError({
      code: "UNAUTHORIZED",
      message: "You must be logged in",
    });
  }

  return next({
    ctx: {
      ...ctx,
      session: ctx.session, // now guaranteed non-null
    },
  });
});

// ------------------------------------------
// Middleware: Admin check
// ------------------------------------------
const isAdmin = t.middleware(({ ctx, next }) => {
  if (!ctx.session) {
    throw new TRPCError({ code: "UNAUTHORIZED" });
  }

  if (!isAdminRole(ctx.session.user.role)) {
    throw new TRPCError({
      code: "FORBIDDEN",
      message: "Admin access required",
    });
  }

  return next({
    ctx: {
      ...ctx,
      session: ctx.session,
    },
  });
});

// ------------------------------------------
// Procedures
// ------------------------------------------

/** No auth required */
export const publicProcedure = t.procedure.use(mapDatabaseErrors);

/** Must be logged in (with CSRF protection on mutations) */
export const protectedProcedure = t.procedure
  .use(mapDatabaseErrors)
  .use(csrfProtection)
  .use(isAuthenticated);

/** Must be logged in as an admin */
export const adminProcedure = t.procedure
  .use(mapDatabaseErrors)
  .use(csrfProtection)
  .use(isAuthenticated)
  .use(isAdmin);

// ------------------------------------------
// Permission middleware factory
// ------------------------------------------

/**
 * Create a middleware that checks for a specific permission.
 * Usage: protectedProcedure.use(requirePermission("inventory:items:write"))
 */
export function requirePermission(permission: string) {
  return t.middleware(({ ctx, next }) => {
    if (!ctx.session) {
      throw new TRPCError({
        code: "UNAUTHORIZED",
        message: "You must be logged in",
      });
    }

    if (!checkPermission(ctx.session.user.permissions, permission)) {
      throw new TRPCError({
        code: "FORBIDDEN",
        message: `Missing permission: ${permission}`,
      });
    }

    return next();
  });
}
