import { TRPCError } from "@trpc/server";
import { eq, and, asc, count, sql } from "drizzle-orm";
import { z } from "zod";
import {
  router,
  protectedProcedure,
  requirePermission,
} from "../../trpc/procedures";
import { createAuditLog } from "../../audit/index";
import type { Database } from "../../db/index";
import {
  createProductionSchema,
  updateProductionSchema,
  assignItemSchema,
  updateAssignmentSchema,
  unassignItemSchema,
  uuidSchema,
} from "@rigtrack/shared";
import { items } from "../inventory/schema";
import { loadLocationPaths } from "../inventory/queries";
import { productions, productionItems, type Production } from "./schema";
import { loadBillOfMaterials } from "./bom";

// ============================================
// Helpers
// ============================================

async function findProduction(
  database: Database,
  id: string
): Promise<Production> {
  const [production] = await database
    .select()
    .from(productions)
    .where(eq(productions.id, id))
    .limit(1);
  if (!production) {
    throw new TRPCError({ code: "NOT_FOUND", message: "Production not found" });
  }
  return production;
}

async function ensureItemExists(
  database: Database,
  inventoryId: string
): Promise<void> {
  const [item] = await database
    .select({ inventoryId: items.inventoryId })
    .from(items)
    .where(eq(items.inventoryId, inventoryId))
    .limit(1);
  if (!item) {
    throw new TRPCError({
      code: "NOT_FOUND",
      message: `No item with inventory ID "${inventoryId}"`,
    });
  }
}

type DateRange = Pick<Production, "startDate" | "endDate">;
type AssignmentWindow = { startsOn: string | null; endsOn: string | null };

/** Whether any end of the window falls outside the production's dates */
function windowOutside(range: DateRange, window: AssignmentWindow): boolean {
  const { startDate, endDate } = range;
  return Boolean(
    (startDate && window.startsOn && window.startsOn < startDate) ||
      (startDate && window.endsOn && window.endsOn < startDate) ||
      (endDate && window.startsOn && window.startsOn > endDate) ||
      (endDate && window.endsOn && window.endsOn > endDate)
  );
}

/** An assignment window has to sit inside the production's dates */
function ensureWindowWithinProduction(
  production: Production,
  window: AssignmentWindow
): void {
  if (windowOutside(production, window)) {
    throw new TRPCError({
      code: "BAD_REQUEST",
      message: "The assignment dates must fall within the production's dates",
    });
  }
}

// ============================================
// Productions Router
// ============================================
export const productionsRouter = router({
  /**
   * Productions with their line count and total quantity, newest first.
   */
  list: protectedProcedure
    .use(requirePermission("productions:productions:read"))
    .query(async ({ ctx }) => {
      return ctx.db
        .select({
          id: productions.id,
          name: productions.name,
          startDate: productions.startDate,
          endDate: productions.endDate,
          notes: productions.notes,
          createdAt: productions.createdAt,
          updatedAt: productions.updatedAt,
          lineCount: count(productionItems.inventoryId),
          totalQuantity: sql<number>`coalesce(sum(${productionItems.quantity}), 0)::int`.mapWith(Number),
        })
        .from(productions)
        .leftJoin(
          productionItems,
          eq(productionItems.productionId, productions.id)
        )
        .groupBy(productions.id)
        .orderBy(
          sql`${productions.startDate} desc nulls last`,
          asc(productions.name)
        );
    }),

  /**
   * A production with its assigned items.
   */
  get: protectedProcedure
    .use(requirePermission("productions:productions:read"))
    .input(z.object({ id: uuidSchema }))
    .query(async ({ input, ctx }) => {
      const production = await findProduction(ctx.db, input.id);

      const rows = await ctx.db
        .select({
          inventoryId: items.inventoryId,
          name: items.name,
          category: items.category,
          manufacturer: items.manufacturer,
          model: items.model,
          locationId: items.locationId,
          quantity: productionItems.quantity,
          startsOn: productionItems.startsOn,
          endsOn: productionItems.endsOn,
          notes: productionItems.notes,
          assignedAt: productionItems.assignedAt,
        })
        .from(productionItems)
        .innerJoin(items, eq(productionItems.inventoryId, items.inventoryId))
        .where(eq(productionItems.productionId, input.id))
        .orderBy(asc(items.name), asc(items.inventoryId));

      const paths = await loadLocationPaths(ctx.db);
      return {
        ...production,
        assignments: rows.map(({ locationId, ...row }) => ({
          ...row,
          locationPath: locationId ? (paths.get(locationId) ?? null) : null,
        })),
      };
    }),

  create: protectedProcedure
    .use(requirePermission("productions:productions:write"))
    .input(createProductionSchema)
    .mutation(async ({ input, ctx }) => {
      const [production] = await ctx.db
        .insert(productions)
        .values(input)
        .returning();
      if (!production) {
        throw new TRPCError({
          code: "INTERNAL_SERVER_ERROR",
          message: "Failed to create production",
        });
      }

      await createAuditLog(
        {
          userId: ctx.session.user.id,
          action: "production:created",
          resourceType: "production",
          resourceId: production.id,
          changes: { after: { ...input } },
          ipAddress: ctx.ipAddress,
        },
        ctx.db
      );

      return production;
    }),

  update: protectedProcedure
    .use(requirePermission("productions:productions:write"))
    .input(updateProductionSchema)
    .mutation(async ({ input, ctx }) => {
      const { id, ...fields } = input;

      return ctx.db.transaction(async (tx) => {
        const [before] = await tx
          .select()
          .from(productions)
          .where(eq(productions.id, id))
          .for("update");
        if (!before) {
          throw new TRPCError({
            code: "NOT_FOUND",
            message: "Production not found",
          });
        }

        // Existing windows have to fit the new dates as well
        const windows = await tx
          .select({
            inventoryId: productionItems.inventoryId,
            startsOn: productionItems.startsOn,
            endsOn: productionItems.endsOn,
          })
          .from(productionItems)
          .where(eq(productionItems.productionId, id))
          .orderBy(asc(productionItems.inventoryId));
        const outside = windows.filter((window) =>
          windowOutside(fields, window)
        );
        if (outside.length > 0) {
          throw new TRPCError({
            code: "BAD_REQUEST",
            message: `Assignments fall outside the new dates: ${outside
              .map((window) => window.inventoryId)
              .join(", ")}. Change their dates first.`,
          });
        }

        const [updated] = await tx
          .update(productions)
          .set(fields)
          .where(eq(productions.id, id))
          .returning();

        await createAuditLog(
          {
            userId: ctx.session.user.id,
            action: "production:updated",
            resourceType: "production",
            resourceId: id,
            changes: {
              before: {
                name: before.name,
                startDate: before.startDate,
                endDate: before.endDate,
              },
              after: { ...fields },
            },
            ipAddress: ctx.ipAddress,
          },
          tx
        );

        return updated;
      });
    }),

  /**
   * Delete a production and its assignments. Items are untouched.
   */
  delete: protectedProcedure
    .use(requirePermission("productions:productions:delete"))
    .input(z.object({ id: uuidSchema }))
    .mutation(async ({ input, ctx }) => {
      return ctx.db.transaction(async (tx) => {
        const production = await findProduction(tx, input.id);

        const removed = await tx
          .delete(productionItems)
          .where(eq(productionItems.productionId, input.id))
          .returning({ inventoryId: productionItems.inventoryId });
        await tx.delete(productions).where(eq(productions.id, input.id));

        await createAuditLog(
          {
            userId: ctx.session.user.id,
            action: "production:deleted",
            resourceType: "production",
            resourceId: input.id,
            changes: {
              before: { name: production.name },
              after: { removedAssignments: removed.length },
            },
            ipAddress: ctx.ipAddress,
          },
          tx
        );

        return { success: true, removedAssignments: removed.length };
      });
    }),

  /**
   * Book an item for a production.
   */
  assign: protectedProcedure
    .use(requirePermission("productions:assignments:write"))
    .input(assignItemSchema)
    .mutation(async ({ input, ctx }) => {
      const production = await findProduction(ctx.db, input.productionId);
      await ensureItemExists(ctx.db, input.inventoryId);
      ensureWindowWithinProduction(production, input);

      const [existing] = await ctx.db
        .select({ quantity: productionItems.quantity })
        .from(productionItems)
        .where(
          and(
            eq(productionItems.productionId, input.productionId),
            eq(productionItems.inventoryId, input.inventoryId)
          )
        )
        .limit(1);

      if (existing) {
        throw new TRPCError({
          code: "CONFLICT",
          message: `"${input.inventoryId}" is already assigned to this production`,
        });
      }

      const [assignment] = await ctx.db
        .insert(productionItems)
        .values(input)
        .returning();

      await createAuditLog(
        {
          userId: ctx.session.user.id,
          action: "production:item_assigned",
          resourceType: "production",
          resourceId: input.productionId,
          changes: { after: { ...input } },
          ipAddress: ctx.ipAddress,
        },
        ctx.db
      );

      return assignment;
    }),

  updateAssignment: protectedProcedure
    .use(requirePermission("productions:assignments:write"))
    .input(updateAssignmentSchema)
    .mutation(async ({ input, ctx }) => {
      const { productionId, inventoryId, ...fields } = input;
      const production = await findProduction(ctx.db, productionId);
      ensureWindowWithinProduction(production, fields);

      const [updated] = await ctx.db
        .update(productionItems)
        .set(fields)
        .where(
          and(
            eq(productionItems.productionId, productionId),
            eq(productionItems.inventoryId, inventoryId)
          )
        )
        .returning();

      if (!updated) {
        throw new TRPCError({
          code: "NOT_FOUND",
          message: "Assignment not found",
        });
      }

      await createAuditLog(
        {
          userId: ctx.session.user.id,
          action: "production:assignment_updated",
          resourceType: "production",
          resourceId: productionId,
          changes: { after: { inventoryId, ...fields } },
          ipAddress: ctx.ipAddress,
        },
        ctx.db
      );

      return updated;
    }),

  /**
   * Remove an item from a production. The item itself stays.
   */
  unassign: protectedProcedure
    .use(requirePermission("productions:assignments:write"))
    .input(unassignItemSchema)
    .mutation(async ({ input, ctx }) => {
      const removed = await ctx.db
        .delete(productionItems)
        .where(
          and(
            eq(productionItems.productionId, input.productionId),
            eq(productionItems.inventoryId, input.inventoryId)
          )
        )
        .returning({ quantity: productionItems.quantity });

      if (removed.length === 0) {
        throw new TRPCError({
          code: "NOT_FOUND",
          message: "Assignment not found",
        });
      }

      await createAuditLog(
        {
          userId: ctx.session.user.id,
          action: "production:item_unassigned",
          resourceType: "production",
          resourceId: input.productionId,
          changes: { before: { inventoryId: input.inventoryId } },
          ipAddress: ctx.ipAddress,
        },
        ctx.db
      );

      return { success: true };
    }),

  /** Bill of materials derived from the current assignments */
  bom: protectedProcedure
    .use(requirePermission("reports:bom:read"))
    .input(z.object({ id: uuidSchema }))
    .query(async ({ input, ctx }) => {
      const bom = await loadBillOfMaterials(input.id, ctx.db);
      if (!bom) {
        throw new TRPCError({
          code: "NOT_FOUND",
          message: "Production not found",
        });
      }
      return bom;
    }),
});
