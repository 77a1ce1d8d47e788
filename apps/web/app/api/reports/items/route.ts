import { NextResponse } from "next/server";
import { loadInventoryReport, renderInventoryReport } from "@rigtrack/core/reports";
import { requireSession } from "@/lib/auth";
import { pdfResponse } from "@/lib/request";

// GET /api/reports/items — every item as an A4 PDF
export async function GET() {
  const guard = await requireSession("reports:inventory:read");
  if (!guard.ok) return guard.response;

  try {
    const data = await loadInventoryReport();
    return pdfResponse(renderInventoryReport(data), "item-inventory.pdf");
  } catch (error) {
    console.error("Inventory report error:", error);
    return NextResponse.json(
      { error: "Internal server error" },
      { status: 500 }
    );
  }
}
