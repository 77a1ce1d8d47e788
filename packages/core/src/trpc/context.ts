import type { SessionValidationResult } from "../auth/session";
import { db as defaultDb, type Database } from "../db/index";

// ============================================
// tRPC Context — created per-request
// ============================================

export interface Context {
  /** Session data (null if not authenticated) */
  session: SessionValidationResult | null;
  /** Database for this request; tests pass an in-process one */
  db: Database;
  /** Client IP address */
  ipAddress?: string;
  /** Client user agent */
  userAgent?: string;
  /** X-TRPC-Source header for CSRF protection */
  trpcSource?: string;
}

/**
 * Create the tRPC context for a request.
 * Called by the tRPC handler in the Next.js app.
 */
export function createContext(params: {
  session: SessionValidationResult | null;
  db?: Database;
  ipAddress?: string;
  userAgent?: string;
  trpcSource?: string;
}): Context {
  return {
    session: params.session,
    db: params.db ?? defaultDb,
    ipAddress: params.ipAddress,
    userAgent: params.userAgent,
    trpcSource: params.trpcSource,
  };
}
