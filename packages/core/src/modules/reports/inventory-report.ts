import { asc } from "drizzle-orm";
import type { jsPDF } from "jspdf";
import autoTable from "jspdf-autotable";
import { db, type Database } from "../../db/index";
import { items } from "../inventory/schema";
import { loadLocationPaths } from "../inventory/queries";
import {
  getCompanyBranding,
  type CompanyBranding,
} from "../settings/company";
import {
  A4_MARGIN_MM,
  addPageFooters,
  createA4Document,
  drawReportHeader,
  joinNonEmpty,
  toArrayBuffer,
} from "./pdf";

// ============================================
// Inventory Report — every item as an A4 table
// ============================================

export const INVENTORY_REPORT_TITLE = "Item Inventory Report";

export interface InventoryReportRow {
  inventoryId: string;
  name: string;
  category: string | null;
  serialNumber: string | null;
  manufacturer: string | null;
  model: string | null;
  locationPath: string | null;
}

export interface InventoryReportData {
  branding: CompanyBranding;
  items: InventoryReportRow[];
  generatedAt: Date;
}

export async function loadInventoryReport(
  database: Database = db
): Promise<InventoryReportData> {
  const rows = await database
    .select({
      inventoryId: items.inventoryId,
      name: items.name,
      category: items.category,
      serialNumber: items.serialNumber,
      manufacturer: items.manufacturer,
      model: items.model,
      locationId: items.locationId,
    })
    .from(items)
    .orderBy(asc(items.name), asc(items.inventoryId));

  const paths = await loadLocationPaths(database);
  return {
    branding: await getCompanyBranding(database),
    items: rows.map(({ locationId, ...row }) => ({
      ...row,
      locationPath: locationId ? (paths.get(locationId) ?? null) : null,
    })),
    generatedAt: new Date(),
  };
}

export function composeInventoryReport(data: InventoryReportData): jsPDF {
  const doc = createA4Document();
  const startY = drawReportHeader(doc, {
    title: INVENTORY_REPORT_TITLE,
    branding: data.branding,
    generatedAt: data.generatedAt,
  });

  autoTable(doc, {
    startY,
    margin: { left: A4_MARGIN_MM, right: A4_MARGIN_MM, bottom: 16 },
    head: [
      [
        "Inventory ID",
        "Name",
        "Category",
        "Serial No.",
        "Manufacturer / Model",
        "Location",
      ],
    ],
    body:
      data.items.length > 0
        ? data.items.map((item) => [
            item.inventoryId,
            item.name,
            item.category ?? "",
            item.serialNumber ?? "",
            joinNonEmpty([item.manufacturer, item.model]),
            item.locationPath ?? "",
          ])
        : [[{ content: "No items recorded", colSpan: 6 }]],
    styles: { fontSize: 8, cellPadding: 1.5 },
    headStyles: { fillColor: [33, 37, 41] },
    columnStyles: { 0: { fontStyle: "bold" } },
  });

  addPageFooters(doc);
  return doc;
}

export function renderInventoryReport(data: InventoryReportData): ArrayBuffer {
  return toArrayBuffer(composeInventoryReport(data));
}
