import { z } from "zod";
import { USER_ROLES } from "../types/index";

// ============================================
// Common Validators — reused everywhere
// ============================================

/** UUID v4 validator */
export const uuidSchema = z.string().uuid();

/** Password validator — min 8 chars, at least 1 letter + 1 number */
export const passwordSchema = z
  .string()
  .min(8, "Password must be at least 8 characters")
  .max(128, "Password must be at most 128 characters")
  .regex(/[a-zA-Z]/, "Password must contain at least one letter")
  .regex(/[0-9]/, "Password must contain at least one number");

/** Username — used to log in */
export const usernameSchema = z
  .string()
  .trim()
  .min(3, "Username must be at least 3 characters")
  .max(128, "Username must be at most 128 characters")
  .regex(
    /^[A-Za-z0-9._@-]+$/,
    "Username may only contain letters, numbers and . _ @ -"
  );

/** Inventory ID — printed on labels and encoded in QR codes */
export const inventoryIdSchema = z
  .string()
  .trim()
  .min(1, "Inventory ID is required")
  .max(64, "Inventory ID must be at most 64 characters")
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9._-]*$/,
    "Inventory ID may only contain letters, numbers, dots, dashes and underscores"
  );

const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

/** Calendar date in YYYY-MM-DD form */
export const dateSchema = z
  .string()
  .regex(DATE_REGEX, "Use the YYYY-MM-DD format")
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return (
      !Number.isNaN(parsed.getTime()) &&
      parsed.toISOString().slice(0, 10) === value
    );
  }, "Not a valid calendar date");

/** Optional date — empty strings from HTML forms become null */
export const optionalDateSchema = z
  .string()
  .nullish()
  .transform((value) => (value ? value : null))
  .pipe(dateSchema.nullable());

/** Optional free text — trimmed, empty becomes null */
function optionalText(max: number) {
  return z
    .string()
    .trim()
    .max(max, `Must be at most ${max} characters`)
    .nullish()
    .transform((value) => (value ? value : null));
}

/** Optional reference — empty strings from selects become null */
const optionalUuidSchema = z
  .string()
  .nullish()
  .transform((value) => (value ? value : null))
  .pipe(uuidSchema.nullable());

function endsAfterStart(
  start: string | null,
  end: string | null
): boolean {
  return !start || !end || end >= start;
}

// ============================================
// Auth Schemas
// ============================================

export const loginSchema = z.object({
  username: z.string().trim().min(1, "Username is required"),
  password: z.string().min(1, "Password is required"),
  remember: z.boolean().default(false),
});

export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1, "Current password is required"),
  newPassword: passwordSchema,
});

// ============================================
// Setup Schemas
// ============================================

export const databaseConnectionSchema = z.object({
  host: z.string().trim().min(1, "Host is required").max(255),
  port: z.coerce
    .number()
    .int()
    .min(1, "Port must be between 1 and 65535")
    .max(65535, "Port must be between 1 and 65535")
    .default(5432),
  name: z.string().trim().min(1, "Database name is required").max(63),
  user: z.string().trim().min(1, "Database user is required").max(63),
  password: z.string().min(1, "Database password is required"),
  ssl: z.boolean().default(false),
});

export const setupSchema = z
  .object({
    database: databaseConnectionSchema.optional(),
    adminUsername: usernameSchema,
    adminPassword: passwordSchema,
    defaultUserUsername: usernameSchema.optional(),
    defaultUserPassword: passwordSchema.optional(),
    companyName: z.string().trim().max(255).default(""),
  })
  .refine(
    (data) =>
      Boolean(data.defaultUserUsername) === Boolean(data.defaultUserPassword),
    {
      message: "Provide both a username and a password for the default user",
      path: ["defaultUserPassword"],
    }
  )
  .refine(
    (data) =>
      !data.defaultUserUsername ||
      data.defaultUserUsername.toLowerCase() !==
        data.adminUsername.toLowerCase(),
    {
      message: "The default user needs a different username than the admin",
      path: ["defaultUserUsername"],
    }
  );

// Wizard form field for each database connection key
const SETUP_DATABASE_FIELDS: Record<string, string> = {
  host: "dbHost",
  port: "dbPort",
  name: "dbName",
  user: "dbUser",
  password: "dbPassword",
  ssl: "dbSsl",
};

export interface SetupFormErrors {
  formErrors: string[];
  fieldErrors: Record<string, string[]>;
}

/**
 * Flatten setup errors onto the wizard's form field names:
 * `database.port` becomes `dbPort`.
 */
export function setupFormErrors(error: z.ZodError): SetupFormErrors {
  const result: SetupFormErrors = { formErrors: [], fieldErrors: {} };
  for (const issue of error.issues) {
    const [head, nested] = issue.path;
    const field =
      head === "database"
        ? typeof nested === "string"
          ? SETUP_DATABASE_FIELDS[nested]
          : undefined
        : typeof head === "string"
          ? head
          : undefined;
    if (!field) {
      result.formErrors.push(issue.message);
      continue;
    }
    const messages = result.fieldErrors[field] ?? [];
    messages.push(issue.message);
    result.fieldErrors[field] = messages;
  }
  return result;
}

// ============================================
// User Schemas
// ============================================

export const createUserSchema = z.object({
  username: usernameSchema,
  password: passwordSchema,
  role: z.enum(USER_ROLES).default("user"),
});

export const updateUserSchema = z.object({
  id: uuidSchema,
  role: z.enum(USER_ROLES).optional(),
  isActive: z.boolean().optional(),
});

export const resetPasswordSchema = z.object({
  id: uuidSchema,
  password: passwordSchema,
});

// ============================================
// Location Schemas
// ============================================

const locationFields = {
  name: z
    .string()
    .trim()
    .min(1, "Name is required")
    .max(255, "Name must be at most 255 characters"),
  description: optionalText(2000),
  parentId: optionalUuidSchema,
};

export const createLocationSchema = z.object(locationFields);

export const updateLocationSchema = z.object({
  id: uuidSchema,
  ...locationFields,
});

// ============================================
// Item Schemas
// ============================================

/** Items are saved whole: create and update carry every field. */
export const itemSchema = z.object({
  inventoryId: inventoryIdSchema,
  name: z
    .string()
    .trim()
    .min(1, "Name is required")
    .max(255, "Name must be at most 255 characters"),
  category: optionalText(128),
  description: optionalText(5000),
  serialNumber: optionalText(128),
  manufacturer: optionalText(128),
  model: optionalText(128),
  locationId: optionalUuidSchema,
});

export const itemFilterSchema = z.object({
  search: z.string().trim().max(255).optional(),
  category: z.string().trim().max(128).optional(),
  locationId: uuidSchema.optional(),
});

// ============================================
// Production Schemas
// ============================================

const productionFields = z.object({
  name: z
    .string()
    .trim()
    .min(1, "Name is required")
    .max(255, "Name must be at most 255 characters"),
  startDate: optionalDateSchema,
  endDate: optionalDateSchema,
  notes: optionalText(5000),
});

const productionDateRange = {
  message: "End date must be on or after the start date",
  path: ["endDate"],
};

export const createProductionSchema = productionFields.refine(
  (data) => endsAfterStart(data.startDate, data.endDate),
  productionDateRange
);

export const updateProductionSchema = productionFields
  .extend({ id: uuidSchema })
  .refine(
    (data) => endsAfterStart(data.startDate, data.endDate),
    productionDateRange
  );

const assignmentFields = z.object({
  productionId: uuidSchema,
  inventoryId: inventoryIdSchema,
  quantity: z
    .number()
    .int("Quantity must be a whole number")
    .min(1, "Quantity must be at least 1")
    .max(100_000)
    .default(1),
  startsOn: optionalDateSchema,
  endsOn: optionalDateSchema,
  notes: optionalText(1000),
});

const assignmentWindow = {
  message: "The assignment must end on or after it starts",
  path: ["endsOn"],
};

export const assignItemSchema = assignmentFields.refine(
  (data) => endsAfterStart(data.startsOn, data.endsOn),
  assignmentWindow
);

export const updateAssignmentSchema = assignItemSchema;

export const unassignItemSchema = z.object({
  productionId: uuidSchema,
  inventoryId: inventoryIdSchema,
});

// ============================================
// Settings Schemas
// ============================================

export const updateCompanySchema = z.object({
  companyName: z.string().trim().max(255),
});

// ============================================
// Type exports from validators
// ============================================

export type LoginInput = z.infer<typeof loginSchema>;
export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
export type DatabaseConnectionInput = z.infer<typeof databaseConnectionSchema>;
export type SetupInput = z.infer<typeof setupSchema>;
export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
export type CreateLocationInput = z.infer<typeof createLocationSchema>;
export type UpdateLocationInput = z.infer<typeof updateLocationSchema>;
export type ItemInput = z.infer<typeof itemSchema>;
export type ItemFilterInput = z.infer<typeof itemFilterSchema>;
export type CreateProductionInput = z.infer<typeof createProductionSchema>;
export type UpdateProductionInput = z.infer<typeof updateProductionSchema>;
export type AssignItemInput = z.infer<typeof assignItemSchema>;
export type UnassignItemInput = z.infer<typeof unassignItemSchema>;
