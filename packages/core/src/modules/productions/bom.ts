import { eq } from "drizzle-orm";
import { db, type Database } from "../../db/index";
import { UNCATEGORIZED } from "@rigtrack/shared";
import { items } from "../inventory/schema";
import { loadLocationPaths } from "../inventory/queries";
import { productions, productionItems, type Production } from "./schema";

// ============================================
// Bill of Materials — derived from the current assignments
// ============================================

export interface BomLine {
  inventoryId: string;
  name: string;
  category: string | null;
  manufacturer: string | null;
  model: string | null;
  serialNumber: string | null;
  locationPath: string | null;
  quantity: number;
  startsOn: string | null;
  endsOn: string | null;
  notes: string | null;
}

export interface BomCategorySummary {
  category: string;
  lineCount: number;
  quantity: number;
}

export interface BillOfMaterials {
  production: Pick<Production, "id" | "name" | "startDate" | "endDate" | "notes">;
  lines: BomLine[];
  categories: BomCategorySummary[];
  totalQuantity: number;
}

function categoryLabel(category: string | null): string {
  return category?.trim() || UNCATEGORIZED;
}

function compareText(a: string, b: string): number {
  return a.localeCompare(b, undefined, { sensitivity: "base" });
}

/** Category order with "Uncategorized" pinned last */
function compareCategories(a: string, b: string): number {
  if (a === b) return 0;
  if (a === UNCATEGORIZED) return 1;
  if (b === UNCATEGORIZED) return -1;
  return compareText(a, b);
}

/**
 * Order lines by category then name, summarise per category and total
 * the quantities.
 */
export function buildBillOfMaterials(
  production: BillOfMaterials["production"],
  assignments: readonly BomLine[]
): BillOfMaterials {
  const lines = [...assignments].sort(
    (a, b) =>
      compareCategories(categoryLabel(a.category), categoryLabel(b.category)) ||
      compareText(a.name, b.name) ||
      compareText(a.inventoryId, b.inventoryId)
  );

  const summaries = new Map<string, BomCategorySummary>();
  for (const line of lines) {
    const category = categoryLabel(line.category);
    const summary = summaries.get(category) ?? {
      category,
      lineCount: 0,
      quantity: 0,
    };
    summary.lineCount += 1;
    summary.quantity += line.quantity;
    summaries.set(category, summary);
  }

  return {
    production,
    lines,
    categories: [...summaries.values()].sort((a, b) =>
      compareCategories(a.category, b.category)
    ),
    totalQuantity: lines.reduce((sum, line) => sum + line.quantity, 0),
  };
}

/**
 * Load the production and its assignments and build the BOM.
 * Returns null when the production does not exist.
 */
export async function loadBillOfMaterials(
  productionId: string,
  database: Database = db
): Promise<BillOfMaterials | null> {
  const [production] = await database
    .select({
      id: productions.id,
      name: productions.name,
      startDate: productions.startDate,
      endDate: productions.endDate,
      notes: productions.notes,
    })
    .from(productions)
    .where(eq(productions.id, productionId))
    .limit(1);

  if (!production) return null;

  const rows = await database
    .select({
      inventoryId: items.inventoryId,
      name: items.name,
      category: items.category,
      manufacturer: items.manufacturer,
      model: items.model,
      serialNumber: items.serialNumber,
      locationId: items.locationId,
      quantity: productionItems.quantity,
      startsOn: productionItems.startsOn,
      endsOn: productionItems.endsOn,
      notes: productionItems.notes,
    })
    .from(productionItems)
    .innerJoin(items, eq(productionItems.inventoryId, items.inventoryId))
    .where(eq(productionItems.productionId, productionId));

  const paths = await loadLocationPaths(database);
  const lines = rows.map(({ locationId, ...row }) => ({
    ...row,
    locationPath: locationId ? (paths.get(locationId) ?? null) : null,
  }));

  return buildBillOfMaterials(production, lines);
}
