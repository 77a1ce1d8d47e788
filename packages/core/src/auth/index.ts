export { hashPassword, verifyPassword } from "./password";
export {
  createSession,
  validateSession,
  invalidateSession,
  invalidateAllUserSessions,
  cleanupExpiredSessions,
  SESSION_COOKIE_NAME,
  SESSION_DURATION_MS,
  PERSISTENT_SESSION_DURATION_MS,
  type SessionValidationResult,
} from "./session";
export { loginWithPassword, AuthError, type LoginResult } from "./login";
