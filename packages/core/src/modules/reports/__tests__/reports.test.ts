import { describe, it, expect } from "vitest";
import {
  composeInventoryReport,
  renderInventoryReport,
  type InventoryReportRow,
} from "../inventory-report";
import { bomReportFileName, composeBomReport } from "../bom-report";
import { buildBillOfMaterials } from "../../productions/bom";

const branding = { companyName: "Test Events Ltd", logo: null };
const generatedAt = new Date("2026-05-04T10:30:00Z");

function row(n: number): InventoryReportRow {
  return {
    inventoryId: `ITEM-${String(n).padStart(4, "0")}`,
    name: `Test item ${n}`,
    category: n % 2 === 0 ? "Audio" : null,
    serialNumber: null,
    manufacturer: "Acme",
    model: `M${n}`,
    locationPath: "Warehouse / Rack A",
  };
}

describe("composeInventoryReport", () => {
  it("renders the title, company and rows", () => {
    const pdf = composeInventoryReport({
      branding,
      items: [row(1)],
      generatedAt,
    }).output();
    expect(pdf).toContain("(Item Inventory Report)");
    expect(pdf).toContain("(Test Events Ltd)");
    expect(pdf).toContain("(ITEM-0001)");
    expect(pdf).toContain("(Page 1 of 1)");
  });

  it("spills long inventories onto numbered pages", () => {
    const doc = composeInventoryReport({
      branding,
      items: Array.from({ length: 120 }, (_, i) => row(i + 1)),
      generatedAt,
    });
    const pages = doc.getNumberOfPages();
    expect(pages).toBeGreaterThan(1);
    expect(doc.output()).toContain(`(Page ${pages} of ${pages})`);
  });

  it("produces a PDF for an empty inventory", () => {
    const bytes = new Uint8Array(
      renderInventoryReport({ branding, items: [], generatedAt })
    );
    expect(new TextDecoder().decode(bytes.subarray(0, 5))).toBe("%PDF-");
  });
});

describe("composeBomReport", () => {
  it("includes the lines, the category summary and the total", () => {
    const bom = buildBillOfMaterials(
      {
        id: "00000000-0000-4000-8000-000000000002",
        name: "Spring Gala",
        startDate: "2026-04-01",
        endDate: "2026-04-03",
        notes: "Load-in at 08:00",
      },
      [
        {
          inventoryId: "AUD-0001",
          name: "Mixer",
          category: "Audio",
          manufacturer: null,
          model: null,
          serialNumber: null,
          locationPath: null,
          quantity: 2,
          startsOn: null,
          endsOn: null,
          notes: null,
        },
      ]
    );
    const pdf = composeBomReport({ branding, bom, generatedAt }).output();
    expect(pdf).toContain("(AUD-0001)");
    expect(pdf).toContain("(Notes: Load-in at 08:00)");
    expect(pdf).toContain("(Total quantity)");
    expect(pdf).toContain("(Page 1 of 1)");
  });
});

describe("bomReportFileName", () => {
  it("slugs the production name", () => {
    expect(bomReportFileName("Spring Gala 2026!")).toBe("bom-spring-gala-2026.pdf");
    expect(bomReportFileName("***")).toBe("bom-production.pdf");
  });
});
