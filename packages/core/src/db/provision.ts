import { sql } from "drizzle-orm";
import type { Database } from "./index";

// ============================================
// Schema Provisioning — idempotent DDL
// ============================================
// Mirrors ./schema. Run by the setup wizard, the provision CLI and the
// test harness, so every statement must be safe to re-run.
// ============================================

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS users (
    id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
    username varchar(128) NOT NULL UNIQUE,
    password_hash text NOT NULL,
    role varchar(20) NOT NULL DEFAULT 'user',
    is_active boolean NOT NULL DEFAULT true,
    last_login_at timestamptz,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_users_role ON users (role, is_active)`,

  `CREATE TABLE IF NOT EXISTS sessions (
    id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
    user_id uuid NOT NULL REFERENCES users (id) ON DELETE CASCADE,
    token_hash text NOT NULL UNIQUE,
    persistent boolean NOT NULL DEFAULT false,
    ip_address varchar(64),
    user_agent text,
    expires_at timestamptz NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions (user_id)`,
  `CREATE INDEX IF NOT EXISTS idx_sessions_expires ON sessions (expires_at)`,

  `CREATE TABLE IF NOT EXISTS locations (
    id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
    parent_id uuid REFERENCES locations (id) ON DELETE RESTRICT,
    name varchar(255) NOT NULL,
    description text,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_locations_parent ON locations (parent_id)`,

  `CREATE TABLE IF NOT EXISTS items (
    inventory_id varchar(64) PRIMARY KEY,
    name varchar(255) NOT NULL,
    category varchar(128),
    description text,
    serial_number varchar(128),
    manufacturer varchar(128),
    model varchar(128),
    location_id uuid REFERENCES locations (id) ON DELETE RESTRICT,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_items_name ON items (name)`,
  `CREATE INDEX IF NOT EXISTS idx_items_category ON items (category)`,
  `CREATE INDEX IF NOT EXISTS idx_items_location ON items (location_id)`,

  `CREATE TABLE IF NOT EXISTS productions (
    id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
    name varchar(255) NOT NULL,
    start_date date,
    end_date date,
    notes text,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_productions_start ON productions (start_date)`,

  `CREATE TABLE IF NOT EXISTS production_items (
    production_id uuid NOT NULL REFERENCES productions (id) ON DELETE CASCADE,
    inventory_id varchar(64) NOT NULL REFERENCES items (inventory_id) ON DELETE CASCADE,
    quantity integer NOT NULL DEFAULT 1,
    starts_on date,
    ends_on date,
    notes text,
    assigned_at timestamptz NOT NULL DEFAULT now(),
    PRIMARY KEY (production_id, inventory_id)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_production_items_item ON production_items (inventory_id)`,

  `CREATE TABLE IF NOT EXISTS company_profile (
    id integer PRIMARY KEY DEFAULT 1 CHECK (id = 1),
    company_name varchar(255) NOT NULL DEFAULT '',
    logo_data text,
    logo_mime_type varchar(50),
    logo_file_name varchar(255),
    updated_at timestamptz NOT NULL DEFAULT now()
  )`,

  `CREATE TABLE IF NOT EXISTS audit_logs (
    id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
    user_id uuid REFERENCES users (id) ON DELETE SET NULL,
    action varchar(100) NOT NULL,
    resource_type varchar(50),
    resource_id varchar(128),
    changes jsonb,
    ip_address varchar(64),
    created_at timestamptz NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_audit_date ON audit_logs (created_at)`,
  `CREATE INDEX IF NOT EXISTS idx_audit_resource ON audit_logs (resource_type, resource_id)`,
  `CREATE INDEX IF NOT EXISTS idx_audit_user ON audit_logs (user_id)`,
];

/** Create every table and index that does not exist yet */
export async function provisionSchema(database: Database): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await database.execute(sql.raw(statement));
  }
}

const provisioned = new WeakMap<object, Promise<void>>();

/**
 * provisionSchema, at most once per database handle for the process
 * lifetime. A failed attempt is forgotten so the next call retries.
 */
export function ensureSchema(database: Database): Promise<void> {
  const existing = provisioned.get(database);
  if (existing) return existing;

  const pending = provisionSchema(database).catch((err: unknown) => {
    provisioned.delete(database);
    throw err;
  });
  provisioned.set(database, pending);
  return pending;
}
