import QRCode from "qrcode";

// ============================================
// QR matrix — modules only, drawn as vectors by the label renderer
// ============================================

export const QR_ERROR_CORRECTION = "H";
export const QR_QUIET_ZONE_MODULES = 4;
/** Small symbols leave too few codewords per block to absorb the logo */
export const QR_MIN_VERSION = 4;
/** Logo edge as a share of the symbol edge (quiet zone included) */
export const LOGO_MAX_RATIO = 0.22;

export interface QrMatrix {
  value: string;
  version: number;
  /** Modules per side, without the quiet zone */
  size: number;
  /** modules[row][col], true = dark */
  modules: boolean[][];
}

/** Square region in module units, measured from the outer quiet-zone edge */
export interface LogoPad {
  offset: number;
  size: number;
  logoSize: number;
}

export interface DarkRun {
  row: number;
  col: number;
  length: number;
}

export function buildQrMatrix(value: string): QrMatrix {
  let qr = QRCode.create(value, { errorCorrectionLevel: QR_ERROR_CORRECTION });
  if (qr.version < QR_MIN_VERSION) {
    qr = QRCode.create(value, {
      errorCorrectionLevel: QR_ERROR_CORRECTION,
      version: QR_MIN_VERSION,
    });
  }

  const { size } = qr.modules;
  const modules: boolean[][] = [];
  for (let row = 0; row < size; row++) {
    const line: boolean[] = [];
    for (let col = 0; col < size; col++) {
      line.push(Boolean(qr.modules.get(row, col)));
    }
    modules.push(line);
  }

  return { value, version: qr.version, size, modules };
}

/** Modules per side including the quiet zone on both edges */
export function symbolModules(matrix: QrMatrix): number {
  return matrix.size + QR_QUIET_ZONE_MODULES * 2;
}

/**
 * Centre pad for the logo: the logo box plus half a module of white on
 * every side.
 */
export function logoPad(matrix: QrMatrix): LogoPad {
  const total = symbolModules(matrix);
  const logoSize = total * LOGO_MAX_RATIO;
  const size = logoSize + 1;
  return { offset: (total - size) / 2, size, logoSize };
}

/** Horizontal runs of dark modules, one rectangle each */
export function darkRuns(matrix: QrMatrix): DarkRun[] {
  const runs: DarkRun[] = [];
  matrix.modules.forEach((line, row) => {
    let start = -1;
    for (let col = 0; col <= line.length; col++) {
      const dark = col < line.length && line[col] === true;
      if (dark && start < 0) start = col;
      if (!dark && start >= 0) {
        runs.push({ row, col: start, length: col - start });
        start = -1;
      }
    }
  });
  return runs;
}
