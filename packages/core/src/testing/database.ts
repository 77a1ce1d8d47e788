import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import * as schema from "../db/schema/index";
import type { Database } from "../db/index";
import { provisionSchema } from "../db/provision";
import { hashPassword } from "../auth/password";
import { createSession, validateSession, type SessionValidationResult } from "../auth/session";
import { createContext } from "../trpc/context";
import { createCallerFactory } from "../trpc/procedures";
import { appRouter } from "../trpc/routers/index";
import { users } from "../db/schema/index";
import type { UserRole } from "@rigtrack/shared";

// ============================================
// Test harness — in-process Postgres (PGlite) with the real DDL
// ============================================

export interface TestDatabase {
  db: Database;
  close: () => Promise<void>;
}

export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite();
  const db = drizzle(client, { schema });
  await provisionSchema(db);
  return { db, close: () => client.close() };
}

export async function createTestUser(
  db: Database,
  params: { username: string; password?: string; role?: UserRole; isActive?: boolean }
): Promise<{ id: string; username: string }> {
  const [user] = await db
    .insert(users)
    .values({
      username: params.username,
      passwordHash: await hashPassword(params.password ?? "password123"),
      role: params.role ?? "user",
      isActive: params.isActive ?? true,
    })
    .returning({ id: users.id, username: users.username });
  if (!user) throw new Error("Failed to create test user");
  return user;
}

/** A real session row for the user, validated the way requests are */
export async function createTestSession(
  db: Database,
  userId: string
): Promise<SessionValidationResult> {
  const { token } = await createSession({ userId }, db);
  const session = await validateSession(token, db);
  if (!session) throw new Error("Failed to validate test session");
  return session;
}

const createCaller = createCallerFactory(appRouter);

export function callerFor(
  db: Database,
  session: SessionValidationResult | null,
  trpcSource: string | null = "server"
) {
  return createCaller(
    createContext({ session, db, trpcSource: trpcSource ?? undefined })
  );
}
