import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { databaseConnectionSchema } from "@rigtrack/shared";
import type { DatabaseConnectionInput } from "@rigtrack/shared";

// ============================================
// Configuration — environment + instance.json
// ============================================
// The setup wizard writes the database connection to
// `<RIGTRACK_DATA_DIR>/instance.json`. DATABASE_URL, when set, wins.
// ============================================

const envSchema = z.object({
  DATABASE_URL: z.string().trim().min(1).optional(),
  RIGTRACK_DATA_DIR: z.string().trim().min(1).default("./data"),
  HTTPS_ENFORCEMENT: z.enum(["on", "off"]).default("on"),
});

export type Env = z.infer<typeof envSchema>;

const instanceConfigSchema = z.object({
  database: databaseConnectionSchema,
  createdAt: z.string(),
});

export type InstanceConfig = z.infer<typeof instanceConfigSchema>;

export const INSTANCE_CONFIG_FILE = "instance.json";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Parse the environment. Empty strings count as unset. */
export function loadEnv(
  source: Record<string, string | undefined> = process.env
): Env {
  const result = envSchema.safeParse({
    DATABASE_URL: source.DATABASE_URL || undefined,
    RIGTRACK_DATA_DIR: source.RIGTRACK_DATA_DIR || undefined,
    HTTPS_ENFORCEMENT: source.HTTPS_ENFORCEMENT?.toLowerCase() || undefined,
  });
  if (!result.success) {
    const fields = Object.keys(result.error.flatten().fieldErrors).join(", ");
    throw new ConfigurationError(`Invalid environment: ${fields}`);
  }
  return result.data;
}

export function instanceConfigPath(env: Env = loadEnv()): string {
  return path.resolve(env.RIGTRACK_DATA_DIR, INSTANCE_CONFIG_FILE);
}

/**
 * Read instance.json. Returns null when the wizard has not written it yet.
 */
export function loadInstanceConfig(
  filePath: string = instanceConfigPath()
): InstanceConfig | null {
  if (!existsSync(filePath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`${filePath} is not valid JSON: ${reason}`);
  }

  const result = instanceConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `${filePath} is missing required settings: ${result.error.issues
        .map((issue) => issue.path.join("."))
        .join(", ")}`
    );
  }
  return result.data;
}

export function saveInstanceConfig(
  database: DatabaseConnectionInput,
  filePath: string = instanceConfigPath()
): InstanceConfig {
  const config: InstanceConfig = {
    database,
    createdAt: new Date().toISOString(),
  };
  mkdirSync(path.dirname(filePath), { recursive: true });
  // Holds the database password
  writeFileSync(filePath, `${JSON.stringify(config, null, 2)}\n`, {
    mode: 0o600,
  });
  return config;
}

export function buildDatabaseUrl(connection: DatabaseConnectionInput): string {
  const user = encodeURIComponent(connection.user);
  const password = encodeURIComponent(connection.password);
  const name = encodeURIComponent(connection.name);
  const url = `postgres://${user}:${password}@${connection.host}:${connection.port}/${name}`;
  return connection.ssl ? `${url}?sslmode=require` : url;
}

/** DATABASE_URL first, then the saved instance config, else null */
export function resolveDatabaseUrl(env: Env = loadEnv()): string | null {
  if (env.DATABASE_URL) return env.DATABASE_URL;
  const instance = loadInstanceConfig(instanceConfigPath(env));
  return instance ? buildDatabaseUrl(instance.database) : null;
}

export function isHttpsEnforced(env: Env = loadEnv()): boolean {
  return env.HTTPS_ENFORCEMENT === "on";
}
