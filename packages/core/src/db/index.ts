import { drizzle } from "drizzle-orm/postgres-js";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import postgres from "postgres";
import * as schema from "./schema/index";
import { resolveDatabaseUrl } from "../config/index";

// ============================================
// Database Connection (Lazy-Initialized)
// ============================================
// The pool is created on first access so that `next build` and the
// setup wizard can run before any database is configured.
// ============================================

/**
 * Any Drizzle Postgres database or transaction over our schema.
 * Route handlers use the pooled `db`; tests pass an in-process one.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

let _db: Database | null = null;

function getDb(): Database {
  if (!_db) {
    const connectionString = resolveDatabaseUrl();
    if (!connectionString) {
      throw new Error(
        "No database configured: set DATABASE_URL or complete the setup wizard"
      );
    }
    const client = postgres(connectionString, {
      max: 10,
      idle_timeout: 20,
      connect_timeout: 10,
    });
    _db = drizzle(client, { schema });
  }
  return _db;
}

/** Pooled application database */
export const db = new Proxy({} as Database, {
  get(_target, prop) {
    return Reflect.get(getDb(), prop);
  },
});

/**
 * Run `fn` against a short-lived single connection to `connectionString`.
 * The setup wizard provisions a database this way before its URL is saved.
 */
export async function withDatabase<T>(
  connectionString: string,
  fn: (database: Database) => Promise<T>
): Promise<T> {
  const client = postgres(connectionString, { max: 1, connect_timeout: 10 });
  try {
    return await fn(drizzle(client, { schema }));
  } finally {
    await client.end({ timeout: 5 });
  }
}

export function isDatabaseConfigured(): boolean {
  return _db !== null || resolveDatabaseUrl() !== null;
}

/**
 * Open a one-off connection and run `SELECT 1`.
 * Used by the setup wizard before it saves the connection.
 */
export async function testConnection(connectionString: string): Promise<void> {
  const client = postgres(connectionString, { max: 1, connect_timeout: 10 });
  try {
    await client`select 1`;
  } finally {
    await client.end({ timeout: 5 });
  }
}

// Export schema for convenience
export { schema };

// Re-export schema types
export * from "./schema/index";
