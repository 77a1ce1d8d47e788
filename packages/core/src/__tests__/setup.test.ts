import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { asc } from "drizzle-orm";
import { getSetupStatus, provisionInstance, SetupError } from "../setup/index";
import { getCompanyBranding } from "../modules/settings/company";
import { parseLogoUpload } from "../modules/settings/company";
import { users } from "../db/schema/index";
import { ensureSchema } from "../db/provision";
import { createTestDatabase, type TestDatabase } from "../testing/database";
import { createPng } from "../testing/images";

let testDb: TestDatabase;

beforeAll(async () => {
  testDb = await createTestDatabase();
});

afterAll(async () => {
  await testDb.close();
});

describe("setup wizard", () => {
  it("reports an incomplete setup on a fresh database", async () => {
    expect(await getSetupStatus(testDb.db)).toEqual({
      databaseConfigured: true,
      completed: false,
    });
  });

  it("provisions the admin, the default user and the company profile", async () => {
    const logo = parseLogoUpload(createPng(3, 3), "logo.png");
    const result = await provisionInstance(testDb.db, {
      adminUsername: "admin",
      adminPassword: "admin12345",
      defaultUser: { username: "crew", password: "crew12345" },
      companyName: "Test Events Ltd",
      logo,
      ipAddress: "192.168.1.20",
    });

    expect(result.defaultUserId).not.toBeNull();

    const accounts = await testDb.db
      .select({ username: users.username, role: users.role })
      .from(users)
      .orderBy(asc(users.username));
    expect(accounts).toEqual([
      { username: "admin", role: "admin" },
      { username: "crew", role: "user" },
    ]);

    const branding = await getCompanyBranding(testDb.db);
    expect(branding.companyName).toBe("Test Events Ltd");
    expect(branding.logo?.mimeType).toBe("image/png");
    expect(branding.logo?.data).toEqual(logo.data);

    expect(await getSetupStatus(testDb.db)).toEqual({
      databaseConfigured: true,
      completed: true,
    });
  });

  it("refuses to run a second time", async () => {
    const attempt = provisionInstance(testDb.db, {
      adminUsername: "intruder",
      adminPassword: "intruder123",
      companyName: "",
    });
    await expect(attempt).rejects.toBeInstanceOf(SetupError);
    await expect(attempt).rejects.toMatchObject({ statusCode: 409 });

    const accounts = await testDb.db.select({ id: users.id }).from(users);
    expect(accounts).toHaveLength(2);
  });

  it("can re-apply the schema without error", async () => {
    await expect(ensureSchema(testDb.db)).resolves.toBeUndefined();
  });
});
