import {
  pgTable,
  integer,
  varchar,
  text,
  timestamp,
} from "drizzle-orm/pg-core";
import type { LogoMimeType } from "@rigtrack/shared";

// ============================================
// COMPANY PROFILE — single row (id = 1)
// Logo is kept base64-encoded so it survives every driver unchanged.
// ============================================
export const COMPANY_PROFILE_ID = 1;

export const companyProfile = pgTable("company_profile", {
  id: integer("id").primaryKey().default(COMPANY_PROFILE_ID),
  companyName: varchar("company_name", { length: 255 }).default("").notNull(),
  logoData: text("logo_data"),
  logoMimeType: varchar("logo_mime_type", { length: 50 }).$type<LogoMimeType>(),
  logoFileName: varchar("logo_file_name", { length: 255 }),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .defaultNow()
    .notNull()
    .$onUpdate(() => new Date()),
});

export type CompanyProfile = typeof companyProfile.$inferSelect;
export type NewCompanyProfile = typeof companyProfile.$inferInsert;
