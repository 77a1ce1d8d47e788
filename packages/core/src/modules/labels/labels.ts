import { eq, asc } from "drizzle-orm";
import { jsPDF } from "jspdf";
import { db, type Database } from "../../db/index";
import { DEFAULT_LABEL_SIZE, type LabelSize } from "@rigtrack/shared";
import { items } from "../inventory/schema";
import { productions, productionItems } from "../productions/schema";
import type { CompanyLogo } from "../settings/company";
import { PDF_FONT, fitImage, imageFormat, joinNonEmpty, toArrayBuffer } from "../reports/pdf";
import {
  QR_QUIET_ZONE_MODULES,
  buildQrMatrix,
  darkRuns,
  logoPad,
  symbolModules,
} from "./qr";

// ============================================
// Labels — one page per item: QR code on the left, text on the right
// ============================================

export interface LabelItem {
  inventoryId: string;
  name: string;
  manufacturer: string | null;
  model: string | null;
}

export interface LabelOptions {
  logo?: CompanyLogo | null;
  size?: LabelSize;
}

export interface LabelLayout {
  margin: number;
  qrSize: number;
  textX: number;
  textWidth: number;
}

/** Positions in mm: the QR fills 90% of the label height */
export function computeLabelLayout(size: LabelSize): LabelLayout {
  const margin = size.heightMm * 0.05;
  const qrSize = size.heightMm * 0.9;
  const textX = margin + qrSize + margin;
  return {
    margin,
    qrSize,
    textX,
    textWidth: size.widthMm - textX - margin,
  };
}

function drawQrCode(
  doc: jsPDF,
  value: string,
  x: number,
  y: number,
  qrSize: number,
  logo: CompanyLogo | null
): void {
  const matrix = buildQrMatrix(value);
  const moduleSize = qrSize / symbolModules(matrix);
  const origin = QR_QUIET_ZONE_MODULES * moduleSize;

  doc.setFillColor(255, 255, 255);
  doc.rect(x, y, qrSize, qrSize, "F");
  doc.setFillColor(0, 0, 0);
  for (const run of darkRuns(matrix)) {
    doc.rect(
      x + origin + run.col * moduleSize,
      y + origin + run.row * moduleSize,
      run.length * moduleSize,
      moduleSize,
      "F"
    );
  }

  if (!logo) return;

  const pad = logoPad(matrix);
  doc.setFillColor(255, 255, 255);
  doc.rect(
    x + pad.offset * moduleSize,
    y + pad.offset * moduleSize,
    pad.size * moduleSize,
    pad.size * moduleSize,
    "F"
  );

  const box = pad.logoSize * moduleSize;
  const fitted = fitImage(doc, logo, box, box);
  doc.addImage(
    logo.data,
    imageFormat(logo),
    x + (qrSize - fitted.width) / 2,
    y + (qrSize - fitted.height) / 2,
    fitted.width,
    fitted.height
  );
}

/** Shrink the font until the text fits on one line */
function fitFontSize(
  doc: jsPDF,
  text: string,
  maxWidth: number,
  preferred: number,
  minimum: number
): number {
  let size = preferred;
  doc.setFontSize(size);
  while (size > minimum && doc.getTextWidth(text) > maxWidth) {
    size -= 0.5;
    doc.setFontSize(size);
  }
  return size;
}

function drawLabelText(
  doc: jsPDF,
  item: LabelItem,
  layout: LabelLayout,
  size: LabelSize
): void {
  let y = size.heightMm * 0.2;

  doc.setFont(PDF_FONT, "bold");
  const idSize = fitFontSize(doc, item.inventoryId, layout.textWidth, 15, 8);
  doc.text(item.inventoryId, layout.textX, y);
  y += idSize * 0.3528 + 4; // pt → mm

  doc.setFont(PDF_FONT, "normal");
  doc.setFontSize(11);
  const nameLines: string[] = doc.splitTextToSize(item.name, layout.textWidth);
  const shownName = nameLines.slice(0, 3);
  doc.text(shownName, layout.textX, y);
  y += shownName.length * 4.6 + 1.5;

  const makeModel = joinNonEmpty([item.manufacturer, item.model]);
  if (makeModel) {
    doc.setFontSize(9);
    const lines: string[] = doc.splitTextToSize(makeModel, layout.textWidth);
    doc.text(lines.slice(0, 2), layout.textX, y);
  }
}

/**
 * One landscape page per item. Throws when `labelItems` is empty; a
 * PDF without pages cannot be printed.
 */
export function composeLabels(
  labelItems: readonly LabelItem[],
  options: LabelOptions = {}
): jsPDF {
  if (labelItems.length === 0) {
    throw new Error("At least one item is required to print labels");
  }

  const size = options.size ?? DEFAULT_LABEL_SIZE;
  const format = [size.widthMm, size.heightMm];
  const layout = computeLabelLayout(size);
  const doc = new jsPDF({ unit: "mm", format, orientation: "landscape" });

  labelItems.forEach((item, index) => {
    if (index > 0) doc.addPage(format, "landscape");
    drawQrCode(
      doc,
      item.inventoryId,
      layout.margin,
      layout.margin,
      layout.qrSize,
      options.logo ?? null
    );
    doc.setTextColor(0, 0, 0);
    drawLabelText(doc, item, layout, size);
  });

  return doc;
}

export function renderLabels(
  labelItems: readonly LabelItem[],
  options: LabelOptions = {}
): ArrayBuffer {
  return toArrayBuffer(composeLabels(labelItems, options));
}

const labelColumns = {
  inventoryId: items.inventoryId,
  name: items.name,
  manufacturer: items.manufacturer,
  model: items.model,
};

export async function loadItemLabel(
  inventoryId: string,
  database: Database = db
): Promise<LabelItem | null> {
  const [item] = await database
    .select(labelColumns)
    .from(items)
    .where(eq(items.inventoryId, inventoryId))
    .limit(1);
  return item ?? null;
}

/**
 * Labels for every item assigned to a production, ordered by name.
 * Returns null when the production does not exist.
 */
export async function loadProductionLabels(
  productionId: string,
  database: Database = db
): Promise<{ productionName: string; items: LabelItem[] } | null> {
  const [production] = await database
    .select({ name: productions.name })
    .from(productions)
    .where(eq(productions.id, productionId))
    .limit(1);
  if (!production) return null;

  const rows = await database
    .select(labelColumns)
    .from(productionItems)
    .innerJoin(items, eq(productionItems.inventoryId, items.inventoryId))
    .where(eq(productionItems.productionId, productionId))
    .orderBy(asc(items.name), asc(items.inventoryId));

  return { productionName: production.name, items: rows };
}
