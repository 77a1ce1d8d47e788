import {
  pgTable,
  uuid,
  varchar,
  text,
  boolean,
  timestamp,
  index,
} from "drizzle-orm/pg-core";
import type { UserRole } from "@rigtrack/shared";

// ============================================
// USERS — people who can log in
// ============================================
export const users = pgTable(
  "users",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    username: varchar("username", { length: 128 }).unique().notNull(),
    passwordHash: text("password_hash").notNull(),
    role: varchar("role", { length: 20 })
      .$type<UserRole>()
      .default("user")
      .notNull(),
    isActive: boolean("is_active").default(true).notNull(),
    lastLoginAt: timestamp("last_login_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .defaultNow()
      .notNull()
      .$onUpdate(() => new Date()),
  },
  (table) => [index("idx_users_role").on(table.role, table.isActive)]
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
