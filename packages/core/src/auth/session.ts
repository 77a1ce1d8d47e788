import { eq, and, gt, lt, ne } from "drizzle-orm";
import crypto from "crypto";
import { db, type Database } from "../db/index";
import { sessions, users } from "../db/schema/index";
import { hashToken } from "@rigtrack/shared";
import { permissionsForRole } from "../rbac/index";
import type { UserRole } from "@rigtrack/shared";

// ============================================
// Session Management — database-backed sessions
// ============================================
// Only the SHA-256 of the token is stored; the raw token lives in the
// httpOnly cookie and nowhere else.
// ============================================

export const SESSION_COOKIE_NAME = "session_token";
export const PERSISTENT_SESSION_DURATION_MS = 30 * 24 * 60 * 60 * 1000; // 30 days ("remember me")
export const SESSION_DURATION_MS = 12 * 60 * 60 * 1000; // 12 hours

export interface SessionValidationResult {
  session: {
    id: string;
    userId: string;
    persistent: boolean;
    expiresAt: Date;
  };
  user: {
    id: string;
    username: string;
    role: UserRole;
    permissions: string[];
  };
}

/**
 * Generate a cryptographically secure session token.
 * 256 bits from crypto.randomBytes, hex encoded.
 */
function generateSecureToken(): string {
  return crypto.randomBytes(32).toString("hex");
}

/**
 * Create a new session for a user.
 * Returns the raw token (to be set as httpOnly cookie) and the session record.
 */
export async function createSession(
  params: {
    userId: string;
    persistent?: boolean;
    ipAddress?: string;
    userAgent?: string;
  },
  database: Database = db
): Promise<{ token: string; sessionId: string; expiresAt: Date }> {
  const token = generateSecureToken();
  const tokenHash = await hashToken(token);
  const persistent = params.persistent ?? false;

  const expiresAt = new Date(
    Date.now() +
      (persistent ? PERSISTENT_SESSION_DURATION_MS : SESSION_DURATION_MS)
  );

  const [session] = await database
    .insert(sessions)
    .values({
      userId: params.userId,
      tokenHash,
      persistent,
      ipAddress: params.ipAddress ?? null,
      userAgent: params.userAgent ?? null,
      expiresAt,
    })
    .returning({ id: sessions.id });

  if (!session) {
    throw new Error("Failed to create session");
  }

  return { token, sessionId: session.id, expiresAt };
}

/**
 * Validate a session token.
 * Returns user + role permissions if valid, null if unknown, expired or
 * the user has been deactivated.
 */
export async function validateSession(
  token: string,
  database: Database = db
): Promise<SessionValidationResult | null> {
  if (!token) return null;
  const tokenHash = await hashToken(token);

  const [row] = await database
    .select({
      sessionId: sessions.id,
      sessionPersistent: sessions.persistent,
      sessionExpiresAt: sessions.expiresAt,
      userId: users.id,
      username: users.username,
      role: users.role,
      isActive: users.isActive,
    })
    .from(sessions)
    .innerJoin(users, eq(sessions.userId, users.id))
    .where(
      and(
        eq(sessions.tokenHash, tokenHash),
        gt(sessions.expiresAt, new Date())
      )
    )
    .limit(1);

  if (!row || !row.isActive) return null;

  return {
    session: {
      id: row.sessionId,
      userId: row.userId,
      persistent: row.sessionPersistent,
      expiresAt: row.sessionExpiresAt,
    },
    user: {
      id: row.userId,
      username: row.username,
      role: row.role,
      permissions: permissionsForRole(row.role),
    },
  };
}

/**
 * Invalidate (delete) a specific session.
 */
export async function invalidateSession(
  sessionId: string,
  database: Database = db
): Promise<void> {
  await database.delete(sessions).where(eq(sessions.id, sessionId));
}

/**
 * Invalidate all sessions for a user, optionally keeping the current one.
 */
export async function invalidateAllUserSessions(
  userId: string,
  options: { exceptSessionId?: string } = {},
  database: Database = db
): Promise<void> {
  await database
    .delete(sessions)
    .where(
      and(
        eq(sessions.userId, userId),
        options.exceptSessionId
          ? ne(sessions.id, options.exceptSessionId)
          : undefined
      )
    );
}

/**
 * Clean up expired sessions. Returns how many were removed.
 */
export async function cleanupExpiredSessions(
  database: Database = db
): Promise<number> {
  const result = await database
    .delete(sessions)
    .where(lt(sessions.expiresAt, new Date()))
    .returning({ id: sessions.id });
  return result.length;
}
