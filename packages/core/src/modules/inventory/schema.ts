import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  index,
  type AnyPgColumn,
} from "drizzle-orm/pg-core";

// ============================================
// INVENTORY — locations and the items stored in them
// ============================================

// Locations nest through parentId; a flat list is simply all roots.
export const locations = pgTable(
  "locations",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    parentId: uuid("parent_id").references((): AnyPgColumn => locations.id, {
      onDelete: "restrict",
    }),
    name: varchar("name", { length: 255 }).notNull(),
    description: text("description"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .defaultNow()
      .notNull()
      .$onUpdate(() => new Date()),
  },
  (table) => [index("idx_locations_parent").on(table.parentId)]
);

export const items = pgTable(
  "items",
  {
    inventoryId: varchar("inventory_id", { length: 64 }).primaryKey(),
    name: varchar("name", { length: 255 }).notNull(),
    category: varchar("category", { length: 128 }),
    description: text("description"),
    serialNumber: varchar("serial_number", { length: 128 }),
    manufacturer: varchar("manufacturer", { length: 128 }),
    model: varchar("model", { length: 128 }),
    locationId: uuid("location_id").references(() => locations.id, {
      onDelete: "restrict",
    }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .defaultNow()
      .notNull()
      .$onUpdate(() => new Date()),
  },
  (table) => [
    index("idx_items_name").on(table.name),
    index("idx_items_category").on(table.category),
    index("idx_items_location").on(table.locationId),
  ]
);

export type Location = typeof locations.$inferSelect;
export type NewLocation = typeof locations.$inferInsert;
export type Item = typeof items.$inferSelect;
export type NewItem = typeof items.$inferInsert;
