import { jsPDF } from "jspdf";
import type { CompanyBranding, CompanyLogo } from "../settings/company";
import { formatDateTime } from "@rigtrack/shared";

// ============================================
// PDF helpers shared by reports and labels (units: mm)
// ============================================

export const A4_MARGIN_MM = 14;
export const PDF_FONT = "helvetica";

export type ImageFormat = "PNG" | "JPEG";

export function imageFormat(logo: CompanyLogo): ImageFormat {
  return logo.mimeType === "image/png" ? "PNG" : "JPEG";
}

export function createA4Document(): jsPDF {
  return new jsPDF({ unit: "mm", format: "a4", orientation: "portrait" });
}

/** Largest size with the image's aspect ratio that fits the box */
export function fitImage(
  doc: jsPDF,
  logo: CompanyLogo,
  maxWidth: number,
  maxHeight: number
): { width: number; height: number } {
  const { width, height } = doc.getImageProperties(logo.data);
  if (width <= 0 || height <= 0) return { width: maxWidth, height: maxHeight };
  const scale = Math.min(maxWidth / width, maxHeight / height);
  return { width: width * scale, height: height * scale };
}

/**
 * Title block: company logo at the top right, company name, title and
 * generation time on the left. Returns the y position below it.
 */
export function drawReportHeader(
  doc: jsPDF,
  params: { title: string; branding: CompanyBranding; generatedAt: Date }
): number {
  const pageWidth = doc.internal.pageSize.getWidth();
  let y = A4_MARGIN_MM + 4;

  if (params.branding.logo) {
    const size = fitImage(doc, params.branding.logo, 40, 18);
    doc.addImage(
      params.branding.logo.data,
      imageFormat(params.branding.logo),
      pageWidth - A4_MARGIN_MM - size.width,
      A4_MARGIN_MM,
      size.width,
      size.height
    );
  }

  if (params.branding.companyName) {
    doc.setFont(PDF_FONT, "normal");
    doc.setFontSize(10);
    doc.text(params.branding.companyName, A4_MARGIN_MM, y);
    y += 7;
  }

  doc.setFont(PDF_FONT, "bold");
  doc.setFontSize(16);
  doc.text(params.title, A4_MARGIN_MM, y);
  y += 6;

  doc.setFont(PDF_FONT, "normal");
  doc.setFontSize(9);
  doc.text(`Generated ${formatDateTime(params.generatedAt)}`, A4_MARGIN_MM, y);

  // Leave room for a logo taller than the text block
  return Math.max(y + 6, A4_MARGIN_MM + 24);
}

/** "Page x of y" centred at the bottom of every page */
export function addPageFooters(doc: jsPDF): void {
  const pageCount = doc.getNumberOfPages();
  const pageWidth = doc.internal.pageSize.getWidth();
  const pageHeight = doc.internal.pageSize.getHeight();

  doc.setFont(PDF_FONT, "normal");
  doc.setFontSize(8);
  for (let page = 1; page <= pageCount; page++) {
    doc.setPage(page);
    doc.text(`Page ${page} of ${pageCount}`, pageWidth / 2, pageHeight - 8, {
      align: "center",
    });
  }
}

export function toArrayBuffer(doc: jsPDF): ArrayBuffer {
  return doc.output("arraybuffer");
}

export function joinNonEmpty(
  parts: ReadonlyArray<string | null | undefined>,
  separator = " "
): string {
  return parts
    .map((part) => part?.trim())
    .filter((part): part is string => Boolean(part))
    .join(separator);
}
