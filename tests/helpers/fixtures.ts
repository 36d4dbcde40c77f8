/**
 * In-memory fixtures: source PDFs built with pdf-lib and small PNGs.
 */

import { PDFDocument, rgb } from "pdf-lib";
import type { GridSpec, RasterImage } from "@/lib/handout/types";
import { loadMuPdf } from "@/lib/pdf/engines/mupdfEngine";

const mupdf = await loadMuPdf();

export const LANDSCAPE_SLIDE: [number, number] = [720, 405];
export const PORTRAIT_SLIDE: [number, number] = [405, 720];

/**
 * Build a PDF with one page per entry in `pageSizes` (points).
 */
export async function makePdf(pageSizes: Array<[number, number]>): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  pageSizes.forEach(([width, height], index) => {
    const page = doc.addPage([width, height]);
    page.drawRectangle({
      x: 20,
      y: 20,
      width: width - 40,
      height: height - 40,
      color: rgb(0.2, 0.4, 0.6 + (index % 4) * 0.1),
    });
  });
  return doc.save({ addDefaultPage: false });
}

/**
 * Solid grey RGB PNG of the given pixel size, encoded by MuPDF.
 */
export function makePng(width: number, height: number): Uint8Array {
  const pixmap = new mupdf.Pixmap(mupdf.ColorSpace.DeviceRGB, [0, 0, width, height], false);
  try {
    pixmap.clear(128);
    return pixmap.asPNG();
  } finally {
    pixmap.destroy();
  }
}

export function makeRasterImage(index: number, width: number, height: number): RasterImage {
  return { index, width, height, png: makePng(Math.min(width, 8), Math.min(height, 8)) };
}

/**
 * 2x2 grid on US Letter (36pt margin, 12pt gap) holding 264 x 148.5 tiles,
 * i.e. a 16:9 slide scaled to the cell width.
 */
export function letterGrid2x2(overrides: Partial<GridSpec> = {}): GridSpec {
  return {
    tileCount: 4,
    columns: 2,
    rows: 2,
    tilesPerPage: 4,
    cellWidth: 264,
    cellHeight: 354,
    scale: 0.25,
    scaledWidth: 264,
    scaledHeight: 148.5,
    pageWidth: 612,
    pageHeight: 792,
    margin: 36,
    gap: 12,
    ...overrides,
  };
}
