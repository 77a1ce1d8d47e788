// ============================================
// Core Types — shared across all packages
// ============================================

/** Built-in user roles */
export const USER_ROLES = ["admin", "user"] as const;
export type UserRole = (typeof USER_ROLES)[number];

/** Permissions granted by each role */
export const ROLE_PERMISSIONS: Record<UserRole, string[]> = {
  admin: ["*"],
  user: ["inventory:*", "productions:*", "reports:*", "labels:*"],
};

/** Label stock dimensions in millimetres */
export interface LabelSize {
  widthMm: number;
  heightMm: number;
}

export const DEFAULT_LABEL_SIZE: LabelSize = { widthMm: 100, heightMm: 54 };

/** Logo formats accepted for labels and report headers */
export const LOGO_MIME_TYPES = ["image/png", "image/jpeg"] as const;
export type LogoMimeType = (typeof LOGO_MIME_TYPES)[number];

export const MAX_LOGO_BYTES = 2 * 1024 * 1024;

export const UNCATEGORIZED = "Uncategorized";
