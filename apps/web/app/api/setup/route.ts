import { NextRequest, NextResponse } from "next/server";
import {
  getSetupStatus,
  provisionInstance,
  SetupError,
} from "@rigtrack/core/setup";
import {
  buildDatabaseUrl,
  saveInstanceConfig,
  ConfigurationError,
} from "@rigtrack/core/config";
import { db, testConnection, withDatabase } from "@rigtrack/core/db";
import { LogoError, parseLogoUpload } from "@rigtrack/core/settings";
import type { CompanyLogo } from "@rigtrack/core/settings";
import { setupFormErrors, setupSchema } from "@rigtrack/shared";
import type { SetupFormErrors } from "@rigtrack/shared";
import { getClientIp } from "@/lib/request";

// ============================================
// /api/setup — first-run wizard
//
// GET  → { databaseConfigured, completed }
// POST → multipart form: admin account, optional default user,
//        company name and logo, and the database connection when
//        none is configured yet.
// ============================================

function textField(form: FormData, name: string): string | undefined {
  const value = form.get(name);
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

function readSetupForm(form: FormData) {
  const host = textField(form, "dbHost");
  return {
    database: host
      ? {
          host,
          port: textField(form, "dbPort") ?? 5432,
          name: textField(form, "dbName") ?? "",
          user: textField(form, "dbUser") ?? "",
          password: textField(form, "dbPassword") ?? "",
          ssl: form.get("dbSsl") === "on",
        }
      : undefined,
    adminUsername: textField(form, "adminUsername") ?? "",
    adminPassword: textField(form, "adminPassword") ?? "",
    defaultUserUsername: textField(form, "defaultUserUsername"),
    defaultUserPassword: textField(form, "defaultUserPassword"),
    companyName: textField(form, "companyName") ?? "",
  };
}

function invalidInput(details: SetupFormErrors) {
  return NextResponse.json(
    { error: "Invalid input", details },
    { status: 400 }
  );
}

async function readLogo(form: FormData): Promise<CompanyLogo | null> {
  const file = form.get("logo");
  if (!(file instanceof File) || file.size === 0) return null;
  return parseLogoUpload(new Uint8Array(await file.arrayBuffer()), file.name);
}

export async function GET() {
  try {
    return NextResponse.json(await getSetupStatus());
  } catch (error) {
    console.error("Setup status error:", error);
    return NextResponse.json(
      { error: "Internal server error" },
      { status: 500 }
    );
  }
}

export async function POST(req: NextRequest) {
  try {
    const status = await getSetupStatus();
    if (status.completed) {
      throw new SetupError("Setup has already been completed", 409);
    }

    const form = await req.formData();
    const parsed = setupSchema.safeParse(readSetupForm(form));
    if (!parsed.success) {
      return invalidInput(setupFormErrors(parsed.error));
    }
    const input = parsed.data;
    if (!status.databaseConfigured && !input.database) {
      return invalidInput({
        formErrors: [],
        fieldErrors: { dbHost: ["Host is required"] },
      });
    }
    const logo = await readLogo(form);

    const params = {
      adminUsername: input.adminUsername,
      adminPassword: input.adminPassword,
      defaultUser:
        input.defaultUserUsername && input.defaultUserPassword
          ? {
              username: input.defaultUserUsername,
              password: input.defaultUserPassword,
            }
          : undefined,
      companyName: input.companyName,
      logo,
      ipAddress: getClientIp(req),
    };

    if (status.databaseConfigured) {
      await provisionInstance(db, params);
    } else if (input.database) {
      const url = buildDatabaseUrl(input.database);
      try {
        await testConnection(url);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new SetupError(`Could not connect to the database: ${reason}`, 400);
      }
      await withDatabase(url, (database) => provisionInstance(database, params));
      saveInstanceConfig(input.database);
    }

    return NextResponse.json({ success: true }, { status: 201 });
  } catch (error) {
    if (error instanceof SetupError || error instanceof LogoError) {
      return NextResponse.json(
        { error: error.message },
        { status: error.statusCode }
      );
    }
    if (error instanceof ConfigurationError) {
      return NextResponse.json({ error: error.message }, { status: 500 });
    }
    console.error("Setup error:", error);
    return NextResponse.json(
      { error: "Internal server error" },
      { status: 500 }
    );
  }
}
