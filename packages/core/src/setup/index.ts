import { eq } from "drizzle-orm";
import { db, isDatabaseConfigured, type Database } from "../db/index";
import { users } from "../db/schema/index";
import { ensureSchema } from "../db/provision";
import { hashPassword } from "../auth/password";
import { createAuditLog } from "../audit/index";
import {
  saveCompanyProfile,
  type CompanyLogo,
} from "../modules/settings/company";

// ============================================
// Setup Wizard — first-run provisioning
// ============================================

export class SetupError extends Error {
  constructor(
    message: string,
    public statusCode: number
  ) {
    super(message);
    this.name = "SetupError";
  }
}

export interface SetupStatus {
  databaseConfigured: boolean;
  /** An admin account exists */
  completed: boolean;
}

async function adminExists(database: Database): Promise<boolean> {
  const [admin] = await database
    .select({ id: users.id })
    .from(users)
    .where(eq(users.role, "admin"))
    .limit(1);
  return Boolean(admin);
}

/**
 * Whether the wizard still has to run. Provisions the schema on the way,
 * so a fresh but reachable database reports `completed: false`.
 */
export async function getSetupStatus(
  database?: Database
): Promise<SetupStatus> {
  if (!database && !isDatabaseConfigured()) {
    return { databaseConfigured: false, completed: false };
  }
  const target = database ?? db;
  await ensureSchema(target);
  return { databaseConfigured: true, completed: await adminExists(target) };
}

export interface ProvisionInstanceParams {
  adminUsername: string;
  adminPassword: string;
  defaultUser?: { username: string; password: string };
  companyName: string;
  logo?: CompanyLogo | null;
  ipAddress?: string;
}

export interface ProvisionInstanceResult {
  adminId: string;
  defaultUserId: string | null;
}

/**
 * Create the schema, the first admin, an optional default user and the
 * company profile. Everything after the DDL runs in one transaction.
 */
export async function provisionInstance(
  database: Database,
  params: ProvisionInstanceParams
): Promise<ProvisionInstanceResult> {
  await ensureSchema(database);

  const adminHash = await hashPassword(params.adminPassword);
  const defaultUserHash = params.defaultUser
    ? await hashPassword(params.defaultUser.password)
    : null;

  return database.transaction(async (tx) => {
    if (await adminExists(tx)) {
      throw new SetupError("Setup has already been completed", 409);
    }

    const [admin] = await tx
      .insert(users)
      .values({
        username: params.adminUsername,
        passwordHash: adminHash,
        role: "admin",
      })
      .returning({ id: users.id });
    if (!admin) {
      throw new SetupError("Failed to create the admin account", 500);
    }

    let defaultUserId: string | null = null;
    if (params.defaultUser && defaultUserHash) {
      const [user] = await tx
        .insert(users)
        .values({
          username: params.defaultUser.username,
          passwordHash: defaultUserHash,
          role: "user",
        })
        .returning({ id: users.id });
      defaultUserId = user?.id ?? null;
    }

    await saveCompanyProfile(
      { companyName: params.companyName, logo: params.logo ?? null },
      tx
    );

    await createAuditLog(
      {
        userId: admin.id,
        action: "setup:completed",
        resourceType: "instance",
        changes: {
          after: {
            adminUsername: params.adminUsername,
            defaultUsername: params.defaultUser?.username ?? null,
            companyName: params.companyName,
            logo: Boolean(params.logo),
          },
        },
        ipAddress: params.ipAddress,
      },
      tx
    );

    return { adminId: admin.id, defaultUserId };
  });
}
