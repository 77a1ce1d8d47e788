import { hasPermission, ROLE_PERMISSIONS } from "@rigtrack/shared";
import type { UserRole } from "@rigtrack/shared";

// ============================================
// RBAC — Role-Based Access Control
// ============================================

/**
 * Check if a user's permissions grant a specific permission.
 * Supports wildcards: *, module:*, module:resource:*
 */
export function checkPermission(
  userPermissions: string[],
  requiredPermission: string
): boolean {
  return hasPermission(userPermissions, requiredPermission);
}

/** Permissions that come with a built-in role */
export function permissionsForRole(role: UserRole): string[] {
  return ROLE_PERMISSIONS[role];
}

export function isAdminRole(role: UserRole): boolean {
  return role === "admin";
}

// Re-export for convenience
export { hasPermission };
