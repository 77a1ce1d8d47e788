import {
  pgTable,
  uuid,
  varchar,
  text,
  integer,
  date,
  timestamp,
  index,
  primaryKey,
} from "drizzle-orm/pg-core";
import { items } from "../inventory/schema";

// ============================================
// PRODUCTIONS — events and the equipment booked for them
// ============================================
export const productions = pgTable(
  "productions",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    name: varchar("name", { length: 255 }).notNull(),
    startDate: date("start_date", { mode: "string" }),
    endDate: date("end_date", { mode: "string" }),
    notes: text("notes"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .defaultNow()
      .notNull()
      .$onUpdate(() => new Date()),
  },
  (table) => [index("idx_productions_start").on(table.startDate)]
);

// The BOM is always read from here; nothing else stores it.
export const productionItems = pgTable(
  "production_items",
  {
    productionId: uuid("production_id")
      .notNull()
      .references(() => productions.id, { onDelete: "cascade" }),
    inventoryId: varchar("inventory_id", { length: 64 })
      .notNull()
      .references(() => items.inventoryId, { onDelete: "cascade" }),
    quantity: integer("quantity").default(1).notNull(),
    startsOn: date("starts_on", { mode: "string" }),
    endsOn: date("ends_on", { mode: "string" }),
    notes: text("notes"),
    assignedAt: timestamp("assigned_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.productionId, table.inventoryId] }),
    index("idx_production_items_item").on(table.inventoryId),
  ]
);

export type Production = typeof productions.$inferSelect;
export type NewProduction = typeof productions.$inferInsert;
export type ProductionItem = typeof productionItems.$inferSelect;
export type NewProductionItem = typeof productionItems.$inferInsert;
