// ============================================
// Core package — main entry point
// ============================================

// Database
export {
  db,
  schema,
  isDatabaseConfigured,
  testConnection,
  withDatabase,
} from "./db/index";
export type { Database } from "./db/index";
export { provisionSchema, ensureSchema } from "./db/provision";
export { isUniqueViolation } from "./db/errors";

// Configuration
export {
  loadEnv,
  loadInstanceConfig,
  saveInstanceConfig,
  buildDatabaseUrl,
  resolveDatabaseUrl,
  isHttpsEnforced,
  ConfigurationError,
} from "./config/index";
export type { Env, InstanceConfig } from "./config/index";

// Auth
export {
  hashPassword,
  verifyPassword,
  createSession,
  validateSession,
  invalidateSession,
  invalidateAllUserSessions,
  cleanupExpiredSessions,
  loginWithPassword,
  AuthError,
  SESSION_COOKIE_NAME,
} from "./auth/index";
export type { SessionValidationResult, LoginResult } from "./auth/index";

// RBAC
export { checkPermission, hasPermission, permissionsForRole } from "./rbac/index";

// Audit
export { createAuditLog } from "./audit/index";
export type { AuditLogEntry } from "./audit/index";

// Setup
export { getSetupStatus, provisionInstance, SetupError } from "./setup/index";
export type { SetupStatus, ProvisionInstanceParams } from "./setup/index";

// tRPC
export {
  createContext,
  router,
  publicProcedure,
  protectedProcedure,
  adminProcedure,
  createCallerFactory,
  requirePermission,
  appRouter,
} from "./trpc/index";
export type { Context, AppRouter } from "./trpc/index";
