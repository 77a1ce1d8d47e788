import type { jsPDF } from "jspdf";
import autoTable from "jspdf-autotable";
import { db, type Database } from "../../db/index";
import { formatDateRange } from "@rigtrack/shared";
import {
  loadBillOfMaterials,
  type BillOfMaterials,
} from "../productions/bom";
import {
  getCompanyBranding,
  type CompanyBranding,
} from "../settings/company";
import {
  A4_MARGIN_MM,
  PDF_FONT,
  addPageFooters,
  createA4Document,
  drawReportHeader,
  joinNonEmpty,
  toArrayBuffer,
} from "./pdf";

// ============================================
// BOM Report — one production's equipment list
// ============================================

export interface BomReportData {
  branding: CompanyBranding;
  bom: BillOfMaterials;
  generatedAt: Date;
}

export function bomReportTitle(productionName: string): string {
  return `Bill of Materials – ${productionName}`;
}

/** File-system friendly name for the download */
export function bomReportFileName(productionName: string): string {
  const slug = productionName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return `bom-${slug || "production"}.pdf`;
}

export async function loadBomReport(
  productionId: string,
  database: Database = db
): Promise<BomReportData | null> {
  const bom = await loadBillOfMaterials(productionId, database);
  if (!bom) return null;
  return {
    branding: await getCompanyBranding(database),
    bom,
    generatedAt: new Date(),
  };
}

export function composeBomReport(data: BomReportData): jsPDF {
  const { bom } = data;
  const doc = createA4Document();
  const pageWidth = doc.internal.pageSize.getWidth();
  let y = drawReportHeader(doc, {
    title: bomReportTitle(bom.production.name),
    branding: data.branding,
    generatedAt: data.generatedAt,
  });

  doc.setFont(PDF_FONT, "normal");
  doc.setFontSize(10);
  doc.text(
    `Dates: ${formatDateRange(bom.production.startDate, bom.production.endDate)}`,
    A4_MARGIN_MM,
    y
  );
  y += 5;

  if (bom.production.notes) {
    const lines: string[] = doc.splitTextToSize(
      `Notes: ${bom.production.notes}`,
      pageWidth - A4_MARGIN_MM * 2
    );
    doc.text(lines, A4_MARGIN_MM, y);
    y += lines.length * 4.5;
  }

  let finalY = y + 2;
  const trackCursor = (data: { cursor: { y: number } | null }) => {
    finalY = data.cursor?.y ?? finalY;
  };

  autoTable(doc, {
    startY: y + 2,
    margin: { left: A4_MARGIN_MM, right: A4_MARGIN_MM, bottom: 16 },
    head: [
      ["Inventory ID", "Name", "Category", "Manufacturer / Model", "Location", "Qty", "Window"],
    ],
    body:
      bom.lines.length > 0
        ? bom.lines.map((line) => [
            line.inventoryId,
            line.name,
            line.category ?? "",
            joinNonEmpty([line.manufacturer, line.model]),
            line.locationPath ?? "",
            String(line.quantity),
            line.startsOn || line.endsOn
              ? formatDateRange(line.startsOn, line.endsOn)
              : "",
          ])
        : [[{ content: "No equipment assigned", colSpan: 7 }]],
    styles: { fontSize: 8, cellPadding: 1.5 },
    headStyles: { fillColor: [33, 37, 41] },
    columnStyles: { 0: { fontStyle: "bold" }, 5: { halign: "right" } },
    didDrawPage: trackCursor,
  });

  autoTable(doc, {
    startY: finalY + 6,
    margin: { left: A4_MARGIN_MM, right: A4_MARGIN_MM, bottom: 16 },
    tableWidth: 100,
    head: [["Category", "Lines", "Quantity"]],
    body: bom.categories.map((summary) => [
      summary.category,
      String(summary.lineCount),
      String(summary.quantity),
    ]),
    foot: [["Total quantity", "", String(bom.totalQuantity)]],
    styles: { fontSize: 9, cellPadding: 1.5 },
    headStyles: { fillColor: [33, 37, 41] },
    footStyles: { fillColor: [233, 236, 239], textColor: [33, 37, 41] },
    columnStyles: { 1: { halign: "right" }, 2: { halign: "right" } },
  });

  addPageFooters(doc);
  return doc;
}

export function renderBomReport(data: BomReportData): ArrayBuffer {
  return toArrayBuffer(composeBomReport(data));
}
