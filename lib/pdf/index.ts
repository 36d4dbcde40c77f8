/**
 * PDF Module - Public API
 *
 * This is the single channel for all PDF reading operations.
 *
 * MuPDF engine isolation: All MuPDF operations go through lib/pdf/engines/mupdfEngine.ts
 * which is the ONLY file allowed to import "mupdf".
 */

export {
  openRasterSource,
  rasterizePdf,
  validatePdfBytes,
  type RasterSource,
  type RasterizeOptions,
} from "./rasterizePdf";
