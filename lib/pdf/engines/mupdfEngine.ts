/**
 * MuPDF Engine - Single Channel for MuPDF Usage
 *
 * This is the ONLY file in the repository allowed to import 'mupdf'.
 * All MuPDF initialization, loading, and low-level operations are centralized here.
 *
 * Other modules must use functions exported from @/lib/pdf (which internally calls this engine).
 */

import type { Document as MuPdfDocument } from "mupdf";
import { getErrorMessage } from "@/lib/utils/error";

export type MuPdfModule = typeof import("mupdf");
export type { MuPdfDocument };

// Lazy-init MuPDF WASM module with memoization
let mupdfPromise: Promise<MuPdfModule> | null = null;
let mupdfUnavailable = false;

/**
 * Load and initialize MuPDF instance.
 * The WASM binary is compiled on first import, so this is deferred until a
 * document is actually opened.
 *
 * @returns Initialized MuPDF instance
 * @throws Error if MuPDF module is not available
 */
export async function loadMuPdf(): Promise<MuPdfModule> {
  if (mupdfUnavailable) {
    throw new Error("MuPDF module is not available. Please install it by running: npm install mupdf");
  }

  if (!mupdfPromise) {
    mupdfPromise = import("mupdf").catch((error: unknown) => {
      // Mark MuPDF as unavailable to avoid future import attempts
      mupdfUnavailable = true;
      mupdfPromise = null;
      throw new Error(
        `Failed to load MuPDF module: ${getErrorMessage(error)}. ` +
          "Please install it by running: npm install mupdf"
      );
    });
  }

  return mupdfPromise;
}

/**
 * Open a PDF held in memory.
 */
export async function openPdfDocument(pdf: Uint8Array): Promise<MuPdfDocument> {
  const mupdf = await loadMuPdf();
  return mupdf.Document.openDocument(pdf, "application/pdf");
}

/**
 * Render one page to an RGB PNG at a uniform zoom.
 *
 * @param doc - Open document
 * @param pageIndex - Zero-based page index
 * @param zoom - Linear scale applied to both axes (1 = 72 DPI)
 */
export async function renderPageToPng(
  doc: MuPdfDocument,
  pageIndex: number,
  zoom: number
): Promise<{ width: number; height: number; png: Uint8Array }> {
  const mupdf = await loadMuPdf();
  const page = doc.loadPage(pageIndex);
  try {
    const pixmap = page.toPixmap(mupdf.Matrix.scale(zoom, zoom), mupdf.ColorSpace.DeviceRGB, false, true);
    try {
      return {
        width: pixmap.getWidth(),
        height: pixmap.getHeight(),
        png: pixmap.asPNG(),
      };
    } finally {
      pixmap.destroy();
    }
  } finally {
    page.destroy();
  }
}

/**
 * Whether MuPDF had to rebuild the cross-reference table to open the file.
 * A repaired document may be missing pages the original had.
 */
export function wasRepaired(doc: MuPdfDocument): boolean {
  const pdf = doc.asPDF();
  return pdf ? pdf.wasRepaired() : false;
}

/**
 * Extract page bounds in points, normalized to width/height.
 */
export function getPageSizePt(doc: MuPdfDocument, pageIndex: number): { widthPt: number; heightPt: number } {
  const page = doc.loadPage(pageIndex);
  try {
    const [x0, y0, x1, y1] = page.getBounds();
    return { widthPt: x1 - x0, heightPt: y1 - y0 };
  } finally {
    page.destroy();
  }
}
