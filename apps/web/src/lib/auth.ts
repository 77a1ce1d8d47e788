import { cookies } from "next/headers";
import { SESSION_COOKIE_NAME, validateSession } from "@rigtrack/core/auth";
import type { SessionValidationResult } from "@rigtrack/core/auth";
import { hasPermission } from "@rigtrack/shared";

// ============================================
// Session helpers for server components and route handlers
// ============================================

export async function getSession(): Promise<SessionValidationResult | null> {
  const cookieStore = await cookies();
  const token = cookieStore.get(SESSION_COOKIE_NAME)?.value;
  if (!token) return null;
  return validateSession(token);
}

type SessionGuard =
  | { ok: true; session: SessionValidationResult }
  | { ok: false; response: Response };

/**
 * Route-handler guard: 401 without a session, 403 without the permission.
 */
export async function requireSession(permission?: string): Promise<SessionGuard> {
  const session = await getSession();
  if (!session) {
    return {
      ok: false,
      response: Response.json({ error: "Not authenticated" }, { status: 401 }),
    };
  }
  if (permission && !hasPermission(session.user.permissions, permission)) {
    return {
      ok: false,
      response: Response.json(
        { error: `Missing permission: ${permission}` },
        { status: 403 }
      ),
    };
  }
  return { ok: true, session };
}
