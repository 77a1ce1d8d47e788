import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { eq } from "drizzle-orm";
import { AuthError, loginWithPassword } from "../auth/login";
import {
  PERSISTENT_SESSION_DURATION_MS,
  SESSION_DURATION_MS,
  cleanupExpiredSessions,
  invalidateSession,
  validateSession,
} from "../auth/session";
import { sessions, users } from "../db/schema/index";
import {
  createTestDatabase,
  createTestUser,
  type TestDatabase,
} from "../testing/database";

let testDb: TestDatabase;

beforeAll(async () => {
  testDb = await createTestDatabase();
  await createTestUser(testDb.db, { username: "crew", password: "crew12345" });
  await createTestUser(testDb.db, {
    username: "former",
    password: "former123",
    isActive: false,
  });
});

afterAll(async () => {
  await testDb.close();
});

async function expectInvalidCredentials(promise: Promise<unknown>) {
  await expect(promise).rejects.toBeInstanceOf(AuthError);
  await expect(promise).rejects.toMatchObject({
    message: "Invalid username or password",
    statusCode: 401,
  });
}

describe("loginWithPassword", () => {
  it("creates a session that validates to the user and role permissions", async () => {
    const result = await loginWithPassword(
      { username: "crew", password: "crew12345", ipAddress: "10.0.0.5" },
      testDb.db
    );

    expect(result.user).toMatchObject({ username: "crew", role: "user" });
    expect(result.token).toMatch(/^[0-9a-f]{64}$/);

    const session = await validateSession(result.token, testDb.db);
    expect(session?.user).toEqual({
      id: result.user.id,
      username: "crew",
      role: "user",
      permissions: ["inventory:*", "productions:*", "reports:*", "labels:*"],
    });
  });

  it("never stores the raw token", async () => {
    const { token } = await loginWithPassword(
      { username: "crew", password: "crew12345" },
      testDb.db
    );
    const stored = await testDb.db
      .select({ tokenHash: sessions.tokenHash })
      .from(sessions)
      .where(eq(sessions.tokenHash, token));
    expect(stored).toHaveLength(0);
  });

  it("keeps remembered sessions for 30 days and others for 12 hours", async () => {
    const before = Date.now();
    const remembered = await loginWithPassword(
      { username: "crew", password: "crew12345", remember: true },
      testDb.db
    );
    const regular = await loginWithPassword(
      { username: "crew", password: "crew12345" },
      testDb.db
    );

    const rememberedFor = remembered.expiresAt.getTime() - before;
    const regularFor = regular.expiresAt.getTime() - before;
    expect(rememberedFor).toBeGreaterThanOrEqual(PERSISTENT_SESSION_DURATION_MS);
    expect(rememberedFor).toBeLessThan(PERSISTENT_SESSION_DURATION_MS + 60_000);
    expect(regularFor).toBeGreaterThanOrEqual(SESSION_DURATION_MS);
    expect(regularFor).toBeLessThan(SESSION_DURATION_MS + 60_000);
    expect(remembered.persistent).toBe(true);
    expect(regular.persistent).toBe(false);
  });

  it("records the last login time", async () => {
    await loginWithPassword(
      { username: "crew", password: "crew12345" },
      testDb.db
    );
    const [user] = await testDb.db
      .select({ lastLoginAt: users.lastLoginAt })
      .from(users)
      .where(eq(users.username, "crew"));
    expect(user?.lastLoginAt).toBeInstanceOf(Date);
  });

  it("gives the same answer for unknown users, wrong passwords and inactive users", async () => {
    await expectInvalidCredentials(
      loginWithPassword({ username: "nobody", password: "crew12345" }, testDb.db)
    );
    await expectInvalidCredentials(
      loginWithPassword({ username: "crew", password: "wrong1234" }, testDb.db)
    );
    await expectInvalidCredentials(
      loginWithPassword({ username: "former", password: "former123" }, testDb.db)
    );
  });
});

describe("sessions", () => {
  it("stop validating once invalidated", async () => {
    const { token } = await loginWithPassword(
      { username: "crew", password: "crew12345" },
      testDb.db
    );
    const session = await validateSession(token, testDb.db);
    expect(session).not.toBeNull();

    await invalidateSession(session?.session.id ?? "", testDb.db);
    expect(await validateSession(token, testDb.db)).toBeNull();
  });

  it("ignore unknown tokens", async () => {
    expect(await validateSession("not-a-real-token", testDb.db)).toBeNull();
    expect(await validateSession("", testDb.db)).toBeNull();
  });

  it("expire and get cleaned up", async () => {
    const { token } = await loginWithPassword(
      { username: "crew", password: "crew12345" },
      testDb.db
    );
    const session = await validateSession(token, testDb.db);
    await testDb.db
      .update(sessions)
      .set({ expiresAt: new Date(Date.now() - 1000) })
      .where(eq(sessions.id, session?.session.id ?? ""));

    expect(await validateSession(token, testDb.db)).toBeNull();
    expect(await cleanupExpiredSessions(testDb.db)).toBeGreaterThanOrEqual(1);
  });

  it("end when the user is deactivated", async () => {
    const { token, user } = await loginWithPassword(
      { username: "crew", password: "crew12345" },
      testDb.db
    );
    await testDb.db
      .update(users)
      .set({ isActive: false })
      .where(eq(users.id, user.id));

    expect(await validateSession(token, testDb.db)).toBeNull();

    await testDb.db
      .update(users)
      .set({ isActive: true })
      .where(eq(users.id, user.id));
  });
});
