// ============================================
// Postgres error helpers
// ============================================

const UNIQUE_VIOLATION = "23505";

function hasPgCode(err: unknown, code: string): boolean {
  // Drivers wrap the server error, sometimes more than once
  let current: unknown = err;
  for (let depth = 0; depth < 5; depth++) {
    if (typeof current !== "object" || current === null) return false;
    if (Reflect.get(current, "code") === code) return true;
    current = Reflect.get(current, "cause");
  }
  return false;
}

export function isUniqueViolation(err: unknown): boolean {
  return hasPgCode(err, UNIQUE_VIOLATION);
}
