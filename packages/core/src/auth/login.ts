import { eq } from "drizzle-orm";
import { db, type Database } from "../db/index";
import { users } from "../db/schema/index";
import { verifyPassword, getDummyHash } from "./password";
import { createSession } from "./session";
import { createAuditLog } from "../audit/index";
import type { UserRole } from "@rigtrack/shared";

// ============================================
// Auth Logic — used by the login API route
// Returns the raw token for the caller to set as an httpOnly
// cookie. NEVER return tokens to clients.
// ============================================

const INVALID_CREDENTIALS = "Invalid username or password";

export interface LoginResult {
  token: string;
  user: { id: string; username: string; role: UserRole };
  persistent: boolean;
  expiresAt: Date;
}

/**
 * Authenticate a user with username + password.
 * Unknown users, inactive users and wrong passwords all fail with the
 * same message.
 */
export async function loginWithPassword(
  params: {
    username: string;
    password: string;
    remember?: boolean;
    ipAddress?: string;
    userAgent?: string;
  },
  database: Database = db
): Promise<LoginResult> {
  const { username, password, ipAddress, userAgent } = params;
  const persistent = params.remember ?? false;

  const [user] = await database
    .select()
    .from(users)
    .where(eq(users.username, username.trim()))
    .limit(1);

  if (!user) {
    await verifyPassword(password, await getDummyHash());
    throw new AuthError(INVALID_CREDENTIALS, 401);
  }

  const isValid = await verifyPassword(password, user.passwordHash);
  if (!isValid || !user.isActive) {
    throw new AuthError(INVALID_CREDENTIALS, 401);
  }

  const { token, expiresAt } = await createSession(
    { userId: user.id, persistent, ipAddress, userAgent },
    database
  );

  await database
    .update(users)
    .set({ lastLoginAt: new Date() })
    .where(eq(users.id, user.id));

  await createAuditLog(
    {
      userId: user.id,
      action: "auth:login",
      resourceType: "user",
      resourceId: user.id,
      ipAddress,
    },
    database
  );

  return {
    token,
    user: { id: user.id, username: user.username, role: user.role },
    persistent,
    expiresAt,
  };
}

/**
 * Custom error class for auth operations.
 * Includes HTTP status code for API route handlers.
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public statusCode: number
  ) {
    super(message);
    this.name = "AuthError";
  }
}
