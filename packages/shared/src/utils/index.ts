// ============================================
// Shared Utilities
// ============================================

/** Check if a permission matches against a set of granted permissions.
 *  Supports wildcards: `*` matches everything, `module:*` matches all in module,
 *  `module:resource:*` matches all actions on a resource.
 */
export function hasPermission(
  grantedPermissions: string[],
  requiredPermission: string
): boolean {
  // Full wildcard — admin
  if (grantedPermissions.includes("*")) return true;

  // Direct match
  if (grantedPermissions.includes(requiredPermission)) return true;

  // Check wildcard matches
  const parts = requiredPermission.split(":");

  // module:* — matches anything in that module
  if (parts.length >= 2 && grantedPermissions.includes(`${parts[0]}:*`)) {
    return true;
  }

  // module:resource:* — matches any action on that resource
  if (
    parts.length === 3 &&
    grantedPermissions.includes(`${parts[0]}:${parts[1]}:*`)
  ) {
    return true;
  }

  return false;
}

/** Format a date with time */
export function formatDateTime(date: Date | string, locale = "en-GB"): string {
  const d = typeof date === "string" ? new Date(date) : date;
  return d.toLocaleString(locale, {
    year: "numeric",
    month: "short",
    day: "numeric",
    hour: "2-digit",
    minute: "2-digit",
  });
}

/** Render an optional date range such as "2026-05-01 – 2026-05-03" */
export function formatDateRange(
  start: string | null,
  end: string | null
): string {
  if (start && end) return start === end ? start : `${start} – ${end}`;
  if (start) return `from ${start}`;
  if (end) return `until ${end}`;
  return "No dates";
}

/** Hash a token using SHA-256 for storage */
export async function hashToken(token: string): Promise<string> {
  const encoder = new TextEncoder();
  const data = encoder.encode(token);
  const hashBuffer = await crypto.subtle.digest("SHA-256", data);
  const hashArray = new Uint8Array(hashBuffer);
  return Array.from(hashArray, (b) => b.toString(16).padStart(2, "0")).join("");
}

/** Escape LIKE special characters */
export function escapeLike(s: string): string {
  return s.replace(/[%_\\]/g, "\\$&");
}
