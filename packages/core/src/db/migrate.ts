import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index";
import { provisionSchema } from "./provision";
import { resolveDatabaseUrl } from "../config/index";
import { cleanupExpiredSessions } from "../auth/session";

// ============================================
// Schema Provisioning CLI
//
// Applies the same idempotent DDL the setup wizard runs, so an
// existing database can be brought up to date from the shell.
// ============================================

async function runProvisioning() {
  const connectionString = resolveDatabaseUrl();
  if (!connectionString) {
    throw new Error(
      "DATABASE_URL is not set and no instance.json was found"
    );
  }

  console.log("🔄 Provisioning schema...");

  const client = postgres(connectionString, { max: 1 });
  const db = drizzle(client, { schema });

  try {
    await provisionSchema(db);
    console.log("✅ Schema is up to date");

    const pruned = await cleanupExpiredSessions(db);
    console.log(`🧹 Removed ${pruned} expired session(s)`);
  } finally {
    await client.end();
  }
}

runProvisioning().catch((err) => {
  console.error("❌ Provisioning failed:", err);
  process.exit(1);
});
