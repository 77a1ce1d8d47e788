import { describe, it, expect } from "vitest";
import { composeLabels, computeLabelLayout, renderLabels } from "../labels";
import { parseLogoUpload } from "../../settings/company";
import { createPng } from "../../../testing/images";

const items = [
  { inventoryId: "AUD-0001", name: "Mixing console", manufacturer: "Acme", model: "M-32" },
  { inventoryId: "AUD-0002", name: "Active loudspeaker", manufacturer: null, model: null },
  { inventoryId: "LGT-0001", name: "Moving head", manufacturer: "Lumen", model: null },
];

describe("computeLabelLayout", () => {
  it("puts a QR of 90% of the height on the left", () => {
    const layout = computeLabelLayout({ widthMm: 100, heightMm: 54 });
    expect(layout.margin).toBeCloseTo(2.7, 6);
    expect(layout.qrSize).toBeCloseTo(48.6, 6);
    expect(layout.textX).toBeCloseTo(54, 6);
    expect(layout.textWidth).toBeCloseTo(43.3, 6);
  });
});

describe("composeLabels", () => {
  it("prints one 100 x 54 mm landscape page per item", () => {
    const doc = composeLabels(items);
    expect(doc.getNumberOfPages()).toBe(3);
    expect(doc.internal.pageSize.getWidth()).toBeCloseTo(100, 1);
    expect(doc.internal.pageSize.getHeight()).toBeCloseTo(54, 1);
  });

  it("writes the inventory ID, name and make on the label", () => {
    const pdf = composeLabels(items.slice(0, 1)).output();
    expect(pdf).toContain("(AUD-0001)");
    expect(pdf).toContain("(Mixing console)");
    expect(pdf).toContain("(Acme M-32)");
  });

  it("embeds the company logo when one is given", () => {
    const logo = parseLogoUpload(createPng(4, 4), "logo.png");
    const withLogo = composeLabels(items.slice(1, 2), { logo }).output();
    const withoutLogo = composeLabels(items.slice(1, 2)).output();
    expect(withLogo).toContain("/Subtype /Image");
    expect(withoutLogo).not.toContain("/Subtype /Image");
  });

  it("refuses to build an empty document", () => {
    expect(() => composeLabels([])).toThrow(
      "At least one item is required to print labels"
    );
  });

  it("renders to PDF bytes", () => {
    const bytes = new Uint8Array(renderLabels(items));
    expect(new TextDecoder().decode(bytes.subarray(0, 5))).toBe("%PDF-");
  });
});
