import { TRPCError } from "@trpc/server";
import { eq, and, or, asc, ilike, isNotNull, count } from "drizzle-orm";
import { z } from "zod";
import {
  router,
  protectedProcedure,
  requirePermission,
} from "../../trpc/procedures";
import { createAuditLog } from "../../audit/index";
import type { Database } from "../../db/index";
import {
  itemSchema,
  itemFilterSchema,
  inventoryIdSchema,
  createLocationSchema,
  updateLocationSchema,
  uuidSchema,
  escapeLike,
} from "@rigtrack/shared";
import { items, locations } from "./schema";
import { productions, productionItems } from "../productions/schema";
import { loadLocationNodes, loadLocationPaths } from "./queries";
import { buildLocationPaths, wouldCreateCycle } from "./tree";

// ============================================
// Helpers
// ============================================

async function ensureLocationExists(
  database: Database,
  locationId: string | null
): Promise<void> {
  if (!locationId) return;
  const [location] = await database
    .select({ id: locations.id })
    .from(locations)
    .where(eq(locations.id, locationId))
    .limit(1);
  if (!location) {
    throw new TRPCError({
      code: "BAD_REQUEST",
      message: "The selected location does not exist",
    });
  }
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

// ============================================
// Items Router
// ============================================
export const itemsRouter = router({
  /**
   * List items, ordered by name. `search` matches name, inventory ID,
   * serial number, manufacturer or model.
   */
  list: protectedProcedure
    .use(requirePermission("inventory:items:read"))
    .input(itemFilterSchema.optional())
    .query(async ({ input, ctx }) => {
      const search = input?.search
        ? `%${escapeLike(input.search)}%`
        : undefined;

      const rows = await ctx.db
        .select()
        .from(items)
        .where(
          and(
            search
              ? or(
                  ilike(items.name, search),
                  ilike(items.inventoryId, search),
                  ilike(items.serialNumber, search),
                  ilike(items.manufacturer, search),
                  ilike(items.model, search)
                )
              : undefined,
            input?.category ? eq(items.category, input.category) : undefined,
            input?.locationId
              ? eq(items.locationId, input.locationId)
              : undefined
          )
        )
        .orderBy(asc(items.name), asc(items.inventoryId));

      const paths = await loadLocationPaths(ctx.db);
      return rows.map((item) => ({
        ...item,
        locationPath: item.locationId
          ? (paths.get(item.locationId) ?? null)
          : null,
      }));
    }),

  /**
   * A single item with its location path and production assignments.
   */
  get: protectedProcedure
    .use(requirePermission("inventory:items:read"))
    .input(z.object({ inventoryId: inventoryIdSchema }))
    .query(async ({ input, ctx }) => {
      const [item] = await ctx.db
        .select()
        .from(items)
        .where(eq(items.inventoryId, input.inventoryId))
        .limit(1);

      if (!item) {
        throw new TRPCError({ code: "NOT_FOUND", message: "Item not found" });
      }

      const assignments = await ctx.db
        .select({
          productionId: productions.id,
          productionName: productions.name,
          startDate: productions.startDate,
          endDate: productions.endDate,
          quantity: productionItems.quantity,
          startsOn: productionItems.startsOn,
          endsOn: productionItems.endsOn,
        })
        .from(productionItems)
        .innerJoin(productions, eq(productionItems.productionId, productions.id))
        .where(eq(productionItems.inventoryId, item.inventoryId))
        .orderBy(asc(productions.startDate), asc(productions.name));

      const paths = await loadLocationPaths(ctx.db);
      return {
        ...item,
        locationPath: item.locationId
          ? (paths.get(item.locationId) ?? null)
          : null,
        assignments,
      };
    }),

  /** Distinct categories in use, sorted */
  categories: protectedProcedure
    .use(requirePermission("inventory:items:read"))
    .query(async ({ ctx }) => {
      const rows = await ctx.db
        .selectDistinct({ category: items.category })
        .from(items)
        .where(isNotNull(items.category))
        .orderBy(asc(items.category));
      return rows.flatMap((row) => (row.category ? [row.category] : []));
    }),

  create: protectedProcedure
    .use(requirePermission("inventory:items:write"))
    .input(itemSchema)
    .mutation(async ({ input, ctx }) => {
      const [existing] = await ctx.db
        .select({ inventoryId: items.inventoryId })
        .from(items)
        .where(eq(items.inventoryId, input.inventoryId))
        .limit(1);

      if (existing) {
        throw new TRPCError({
          code: "CONFLICT",
          message: `An item with inventory ID "${input.inventoryId}" already exists`,
        });
      }

      await ensureLocationExists(ctx.db, input.locationId);

      const [item] = await ctx.db.insert(items).values(input).returning();
      if (!item) {
        throw new TRPCError({
          code: "INTERNAL_SERVER_ERROR",
          message: "Failed to create item",
        });
      }

      await createAuditLog(
        {
          userId: ctx.session.user.id,
          action: "item:created",
          resourceType: "item",
          resourceId: item.inventoryId,
          changes: { after: { ...input } },
          ipAddress: ctx.ipAddress,
        },
        ctx.db
      );

      return item;
    }),

  /**
   * Save every field of an existing item. The inventory ID identifies
   * the item and cannot change.
   */
  update: protectedProcedure
    .use(requirePermission("inventory:items:write"))
    .input(itemSchema)
    .mutation(async ({ input, ctx }) => {
      const { inventoryId, ...fields } = input;

      const [before] = await ctx.db
        .select()
        .from(items)
        .where(eq(items.inventoryId, inventoryId))
        .limit(1);

      if (!before) {
        throw new TRPCError({ code: "NOT_FOUND", message: "Item not found" });
      }

      await ensureLocationExists(ctx.db, fields.locationId);

      const [updated] = await ctx.db
        .update(items)
        .set(fields)
        .where(eq(items.inventoryId, inventoryId))
        .returning();

      await createAuditLog(
        {
          userId: ctx.session.user.id,
          action: "item:updated",
          resourceType: "item",
          resourceId: inventoryId,
          changes: {
            before: {
              name: before.name,
              category: before.category,
              locationId: before.locationId,
            },
            after: { ...fields },
          },
          ipAddress: ctx.ipAddress,
        },
        ctx.db
      );

      return updated;
    }),

  /**
   * Delete an item together with its production assignments.
   */
  delete: protectedProcedure
    .use(requirePermission("inventory:items:delete"))
    .input(z.object({ inventoryId: inventoryIdSchema }))
    .mutation(async ({ input, ctx }) => {
      return ctx.db.transaction(async (tx) => {
        const [item] = await tx
          .select()
          .from(items)
          .where(eq(items.inventoryId, input.inventoryId))
          .limit(1);

        if (!item) {
          throw new TRPCError({ code: "NOT_FOUND", message: "Item not found" });
        }

        const removed = await tx
          .delete(productionItems)
          .where(eq(productionItems.inventoryId, input.inventoryId))
          .returning({ productionId: productionItems.productionId });

        await tx.delete(items).where(eq(items.inventoryId, input.inventoryId));

        await createAuditLog(
          {
            userId: ctx.session.user.id,
            action: "item:deleted",
            resourceType: "item",
            resourceId: input.inventoryId,
            changes: {
              before: { name: item.name, category: item.category },
              after: { removedAssignments: removed.length },
            },
            ipAddress: ctx.ipAddress,
          },
          tx
        );

        return { success: true, removedAssignments: removed.length };
      });
    }),
});

// ============================================
// Locations Router
// ============================================
export const locationsRouter = router({
  /**
   * Every location with its full path, item count and child count,
   * ordered by path.
   */
  list: protectedProcedure
    .use(requirePermission("inventory:locations:read"))
    .query(async ({ ctx }) => {
      const rows = await ctx.db.select().from(locations);
      const itemCounts = await ctx.db
        .select({ locationId: items.locationId, total: count() })
        .from(items)
        .where(isNotNull(items.locationId))
        .groupBy(items.locationId);

      const paths = buildLocationPaths(rows);
      const countByLocation = new Map(
        itemCounts.map((row) => [row.locationId, row.total])
      );
      const childCounts = new Map<string, number>();
      for (const row of rows) {
        if (row.parentId) {
          childCounts.set(row.parentId, (childCounts.get(row.parentId) ?? 0) + 1);
        }
      }

      return rows
        .map((row) => ({
          ...row,
          path: paths.get(row.id) ?? row.name,
          itemCount: countByLocation.get(row.id) ?? 0,
          childCount: childCounts.get(row.id) ?? 0,
        }))
        .sort((a, b) => a.path.localeCompare(b.path));
    }),

  create: protectedProcedure
    .use(requirePermission("inventory:locations:write"))
    .input(createLocationSchema)
    .mutation(async ({ input, ctx }) => {
      await ensureLocationExists(ctx.db, input.parentId);

      const [location] = await ctx.db
        .insert(locations)
        .values(input)
        .returning();
      if (!location) {
        throw new TRPCError({
          code: "INTERNAL_SERVER_ERROR",
          message: "Failed to create location",
        });
      }

      await createAuditLog(
        {
          userId: ctx.session.user.id,
          action: "location:created",
          resourceType: "location",
          resourceId: location.id,
          changes: { after: { ...input } },
          ipAddress: ctx.ipAddress,
        },
        ctx.db
      );

      return location;
    }),

  update: protectedProcedure
    .use(requirePermission("inventory:locations:write"))
    .input(updateLocationSchema)
    .mutation(async ({ input, ctx }) => {
      const { id, ...fields } = input;

      const [before] = await ctx.db
        .select()
        .from(locations)
        .where(eq(locations.id, id))
        .limit(1);
      if (!before) {
        throw new TRPCError({
          code: "NOT_FOUND",
          message: "Location not found",
        });
      }

      await ensureLocationExists(ctx.db, fields.parentId);
      const nodes = await loadLocationNodes(ctx.db);
      if (wouldCreateCycle(nodes, id, fields.parentId)) {
        throw new TRPCError({
          code: "BAD_REQUEST",
          message: "A location cannot be placed inside itself or one of its sub-locations",
        });
      }

      const [updated] = await ctx.db
        .update(locations)
        .set(fields)
        .where(eq(locations.id, id))
        .returning();

      await createAuditLog(
        {
          userId: ctx.session.user.id,
          action: "location:updated",
          resourceType: "location",
          resourceId: id,
          changes: {
            before: {
              name: before.name,
              description: before.description,
              parentId: before.parentId,
            },
            after: { ...fields },
          },
          ipAddress: ctx.ipAddress,
        },
        ctx.db
      );

      return updated;
    }),

  /**
   * Delete an empty location. Locations that still hold items or
   * sub-locations are rejected, never emptied.
   */
  delete: protectedProcedure
    .use(requirePermission("inventory:locations:delete"))
    .input(z.object({ id: uuidSchema }))
    .mutation(async ({ input, ctx }) => {
      return ctx.db.transaction(async (tx) => {
        const [location] = await tx
          .select()
          .from(locations)
          .where(eq(locations.id, input.id))
          .limit(1);
        if (!location) {
          throw new TRPCError({
            code: "NOT_FOUND",
            message: "Location not found",
          });
        }

        const [itemRow] = await tx
          .select({ total: count() })
          .from(items)
          .where(eq(items.locationId, input.id));
        const [childRow] = await tx
          .select({ total: count() })
          .from(locations)
          .where(eq(locations.parentId, input.id));
        const itemCount = itemRow?.total ?? 0;
        const childCount = childRow?.total ?? 0;

        if (itemCount > 0 || childCount > 0) {
          const held = [
            itemCount > 0 ? plural(itemCount, "item") : null,
            childCount > 0 ? plural(childCount, "sub-location") : null,
          ]
            .filter(Boolean)
            .join(" and ");
          throw new TRPCError({
            code: "CONFLICT",
            message: `"${location.name}" still holds ${held}. Move or delete them first.`,
          });
        }

        await tx.delete(locations).where(eq(locations.id, input.id));

        await createAuditLog(
          {
            userId: ctx.session.user.id,
            action: "location:deleted",
            resourceType: "location",
            resourceId: input.id,
            changes: { before: { name: location.name } },
            ipAddress: ctx.ipAddress,
          },
          tx
        );

        return { success: true };
      });
    }),
});
