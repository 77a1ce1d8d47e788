import { describe, it, expect } from "vitest";
import { buildBillOfMaterials, type BomLine } from "../bom";

const production = {
  id: "00000000-0000-4000-8000-000000000001",
  name: "Gala",
  startDate: "2026-06-01",
  endDate: "2026-06-02",
  notes: null,
};

function line(
  inventoryId: string,
  name: string,
  category: string | null,
  quantity: number
): BomLine {
  return {
    inventoryId,
    name,
    category,
    manufacturer: null,
    model: null,
    serialNumber: null,
    locationPath: null,
    quantity,
    startsOn: null,
    endsOn: null,
    notes: null,
  };
}

describe("buildBillOfMaterials", () => {
  const bom = buildBillOfMaterials(production, [
    line("CBL-1", "Power distro", null, 4),
    line("LGT-2", "Par can", "Lighting", 12),
    line("AUD-2", "Speaker", "Audio", 2),
    line("AUD-1", "Mixer", "Audio", 1),
    line("MISC-1", "Gaffer tape", "  ", 3),
  ]);

  it("orders lines by category, then name, with uncategorized last", () => {
    expect(bom.lines.map((l) => l.inventoryId)).toEqual([
      "AUD-1",
      "AUD-2",
      "LGT-2",
      "MISC-1",
      "CBL-1",
    ]);
  });

  it("summarises every category", () => {
    expect(bom.categories).toEqual([
      { category: "Audio", lineCount: 2, quantity: 3 },
      { category: "Lighting", lineCount: 1, quantity: 12 },
      { category: "Uncategorized", lineCount: 2, quantity: 7 },
    ]);
  });

  it("totals the line quantities", () => {
    expect(bom.totalQuantity).toBe(22);
  });

  it("is empty for a production without assignments", () => {
    const empty = buildBillOfMaterials(production, []);
    expect(empty).toEqual({
      production,
      lines: [],
      categories: [],
      totalQuantity: 0,
    });
  });
});
