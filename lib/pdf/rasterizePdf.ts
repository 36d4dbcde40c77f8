/**
 * PDF rasterization using MuPDF WASM.
 *
 * Renders every page of a PDF, in order, to a PNG at `dpi / 72` zoom.
 * DPI is trusted as given; callers clamp it (see clampDpi) before this point.
 *
 * Two shapes of the same operation:
 * - openRasterSource() yields pages one at a time so the composer can embed
 *   and drop each image before the next is rendered
 * - rasterizePdf() renders everything up front and returns the array
 */

import { dpiToZoom, DEFAULT_HANDOUT_CONFIG } from "@/lib/config/handout";
import { SourceDocumentError } from "@/lib/handout/errors";
import type { RasterImage } from "@/lib/handout/types";
import { getErrorMessage } from "@/lib/utils/error";
import { getPageSizePt, openPdfDocument, renderPageToPng, wasRepaired, type MuPdfDocument } from "./engines/mupdfEngine";

const PROGRESS_EVERY = 10;
// PDF readers accept the header anywhere in the first 1KB
const HEADER_SEARCH_BYTES = 1024;

export type RasterizeOptions = {
  dpi: number;
  maxSourceBytes?: number;
};

/**
 * An opened source document whose pages are rendered on demand.
 */
export type RasterSource = {
  pageCount: number;
  /** Renders pages in order, starting at page 0 */
  pages(): AsyncGenerator<RasterImage, void, undefined>;
  /** Releases the document. Safe to call more than once. */
  close(): void;
};

/**
 * Reject input that cannot be a PDF before it reaches the engine.
 */
export function validatePdfBytes(pdf: Uint8Array, maxSourceBytes: number): void {
  if (pdf.length > maxSourceBytes) {
    throw new SourceDocumentError(
      `PDF file too large (${pdf.length} bytes). Maximum size is ${Math.floor(maxSourceBytes / 1024 / 1024)}MB.`
    );
  }

  if (pdf.length < 10) {
    throw new SourceDocumentError("PDF buffer is too small or invalid.");
  }

  const head = Buffer.from(pdf.subarray(0, HEADER_SEARCH_BYTES)).toString("latin1");
  if (!head.includes("%PDF-")) {
    throw new SourceDocumentError("Invalid PDF file format.");
  }
}

/**
 * Open a PDF for page-by-page rasterization.
 *
 * @throws SourceDocumentError if the bytes are not a readable PDF
 */
export async function openRasterSource(pdf: Uint8Array, options: RasterizeOptions): Promise<RasterSource> {
  const { dpi, maxSourceBytes = DEFAULT_HANDOUT_CONFIG.maxSourceBytes } = options;
  validatePdfBytes(pdf, maxSourceBytes);

  let doc: MuPdfDocument;
  let pageCount: number;
  let firstPagePt: { widthPt: number; heightPt: number } | null;
  try {
    doc = await openPdfDocument(pdf);
  } catch (error) {
    throw new SourceDocumentError(`Failed to open PDF document: ${getErrorMessage(error)}`, { cause: error });
  }
  let repaired: boolean;
  try {
    pageCount = doc.countPages();
    repaired = wasRepaired(doc);
    firstPagePt = pageCount > 0 ? getPageSizePt(doc, 0) : null;
  } catch (error) {
    doc.destroy();
    throw new SourceDocumentError(`Failed to read PDF page tree: ${getErrorMessage(error)}`, { cause: error });
  }

  // A truncated file opens after repair but loses its page tree
  if (pageCount === 0 && repaired) {
    doc.destroy();
    throw new SourceDocumentError("PDF document is damaged and no pages could be recovered.");
  }

  const zoom = dpiToZoom(dpi);
  let closed = false;

  console.log("[handout/rasterize] Opened source PDF", {
    sizeBytes: pdf.length,
    pageCount,
    repaired,
    dpi,
    zoom,
    firstPagePt,
  });

  async function* pages(): AsyncGenerator<RasterImage, void, undefined> {
    for (let index = 0; index < pageCount; index++) {
      if (closed) {
        throw new SourceDocumentError("Source document was closed before rasterization finished.");
      }

      let rendered: { width: number; height: number; png: Uint8Array };
      try {
        rendered = await renderPageToPng(doc, index, zoom);
      } catch (error) {
        throw new SourceDocumentError(`Failed to render PDF page ${index + 1}: ${getErrorMessage(error)}`, {
          cause: error,
        });
      }

      if ((index + 1) % PROGRESS_EVERY === 0) {
        console.log(`[handout/rasterize] Converted ${index + 1}/${pageCount} pages`);
      }

      yield { index, ...rendered };
    }

    console.log(`[handout/rasterize] Converted ${pageCount} pages`);
  }

  return {
    pageCount,
    pages,
    close() {
      if (!closed) {
        closed = true;
        doc.destroy();
      }
    },
  };
}

/**
 * Rasterize every page of a PDF and return the images in page order.
 * The document is closed before returning, including on failure.
 */
export async function rasterizePdf(pdf: Uint8Array, options: RasterizeOptions): Promise<RasterImage[]> {
  const source = await openRasterSource(pdf, options);
  try {
    const images: RasterImage[] = [];
    for await (const image of source.pages()) {
      images.push(image);
    }
    return images;
  } finally {
    source.close();
  }
}
