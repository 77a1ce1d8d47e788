import { describe, it, expect } from "vitest";
import jsQR from "jsqr";
import {
  QR_MIN_VERSION,
  QR_QUIET_ZONE_MODULES,
  buildQrMatrix,
  darkRuns,
  logoPad,
  symbolModules,
  type QrMatrix,
} from "../qr";

const PIXELS_PER_MODULE = 6;

/** Paint the matrix the way the label does, optionally with the logo pad */
function rasterize(matrix: QrMatrix, withLogoPad: boolean) {
  const modules = symbolModules(matrix);
  const width = modules * PIXELS_PER_MODULE;
  const pixels = new Uint8ClampedArray(width * width * 4);
  const pad = logoPad(matrix);

  for (let py = 0; py < width; py++) {
    for (let px = 0; px < width; px++) {
      const mx = px / PIXELS_PER_MODULE;
      const my = py / PIXELS_PER_MODULE;
      const row = Math.floor(my) - QR_QUIET_ZONE_MODULES;
      const col = Math.floor(mx) - QR_QUIET_ZONE_MODULES;
      const inPad =
        withLogoPad &&
        mx >= pad.offset &&
        mx < pad.offset + pad.size &&
        my >= pad.offset &&
        my < pad.offset + pad.size;
      const dark = !inPad && matrix.modules[row]?.[col] === true;
      const value = dark ? 0 : 255;
      const i = (py * width + px) * 4;
      pixels[i] = value;
      pixels[i + 1] = value;
      pixels[i + 2] = value;
      pixels[i + 3] = 255;
    }
  }
  return { pixels, width };
}

describe("buildQrMatrix", () => {
  it("never goes below the minimum version", () => {
    const matrix = buildQrMatrix("CAM-0001");
    expect(matrix.version).toBe(QR_MIN_VERSION);
    expect(matrix.size).toBe(33);
    expect(matrix.modules).toHaveLength(33);
  });

  it("grows for long identifiers", () => {
    expect(buildQrMatrix(`LONG-${"x".repeat(59)}`).version).toBeGreaterThan(
      QR_MIN_VERSION
    );
  });

  it.each(["CAM-0001", "rig.track_42", `LONG-${"x".repeat(59)}`])(
    "decodes to exactly %s with the logo pad blanked out",
    (inventoryId) => {
      const matrix = buildQrMatrix(inventoryId);
      const { pixels, width } = rasterize(matrix, true);
      expect(jsQR(pixels, width, width)?.data).toBe(inventoryId);
    }
  );
});

describe("logoPad", () => {
  it("keeps the logo at 22% of the symbol and centres the pad", () => {
    const matrix = buildQrMatrix("CAM-0001");
    const pad = logoPad(matrix);
    expect(pad.logoSize).toBeCloseTo(41 * 0.22, 6);
    expect(pad.size).toBeCloseTo(pad.logoSize + 1, 6);
    expect(pad.offset * 2 + pad.size).toBeCloseTo(41, 6);
  });
});

describe("darkRuns", () => {
  it("merges adjacent dark modules into one run", () => {
    const matrix: QrMatrix = {
      value: "x",
      version: 1,
      size: 4,
      modules: [
        [true, true, false, true],
        [false, false, false, false],
        [false, true, true, true],
        [true, false, true, false],
      ],
    };
    expect(darkRuns(matrix)).toEqual([
      { row: 0, col: 0, length: 2 },
      { row: 0, col: 3, length: 1 },
      { row: 2, col: 1, length: 3 },
      { row: 3, col: 0, length: 1 },
      { row: 3, col: 2, length: 1 },
    ]);
  });
});
