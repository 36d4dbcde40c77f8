/**
 * Handout pipeline - Main Entry Point
 *
 * source -> (convert) -> rasterize -> plan -> compose
 *
 * A run either returns a finalized PDF or throws; partial output is never
 * returned or written. Pages are rendered and embedded one at a time, which
 * gives the same document as rasterizing everything first.
 */

import { readFile, writeFile } from "node:fs/promises";
import { clampDpi, DEFAULT_HANDOUT_CONFIG, type HandoutConfig } from "@/lib/config/handout";
import { isPresentationFile, LibreOfficeConverter, type PdfConverter } from "@/lib/convert/presentationConverter";
import { openRasterSource } from "@/lib/pdf";
import { getErrorMessage } from "@/lib/utils/error";
import { SourceDocumentError } from "./errors";
import { planGrid } from "./layoutPlanner";
import { composeHandout } from "./pageComposer";
import type { GridSpec, RasterImage, TilePlacement, TilingMode } from "./types";

export type HandoutInput = { pdf: Uint8Array } | { path: string };

export type HandoutOptions = {
  tilingMode?: TilingMode;
  /** Requested DPI; clamped to config.maxDpi */
  dpi?: unknown;
  title?: string;
  creationDate?: Date;
  /** Used for presentation inputs; defaults to LibreOffice */
  converter?: PdfConverter;
  config?: HandoutConfig;
};

export type HandoutResult = {
  pdf: Uint8Array;
  sourcePageCount: number;
  outputPageCount: number;
  dpi: number;
  /** null when the source has no pages */
  grid: GridSpec | null;
  placements: TilePlacement[][];
};

async function readSourceFile(filePath: string): Promise<Uint8Array> {
  try {
    return await readFile(filePath);
  } catch (error) {
    throw new SourceDocumentError(`Cannot read source file ${filePath}: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Resolve the input to PDF bytes, converting presentations first.
 */
async function loadSourcePdf(input: HandoutInput, options: HandoutOptions, config: HandoutConfig): Promise<Uint8Array> {
  if ("pdf" in input) {
    return input.pdf;
  }

  if (isPresentationFile(input.path)) {
    const converter = options.converter ?? new LibreOfficeConverter({ sofficePath: config.sofficePath });
    const pdfPath = await converter.convertToPdf(input.path);
    const pdf = await readSourceFile(pdfPath);
    // Kept on a failed read so the converter output can be inspected
    await converter.release?.(pdfPath);
    return pdf;
  }

  return readSourceFile(input.path);
}

async function* prepend(
  first: RasterImage,
  rest: AsyncIterator<RasterImage, void, undefined>
): AsyncGenerator<RasterImage, void, undefined> {
  yield first;
  for (let next = await rest.next(); !next.done; next = await rest.next()) {
    yield next.value;
  }
}

/**
 * Build a handout PDF from a slide deck.
 *
 * @param input - PDF bytes, or a path to a PDF or presentation file
 * @param options.tilingMode - Tiles per page or "auto" (default from config)
 * @param options.dpi - Rasterization DPI (default from config, capped at config.maxDpi)
 * @throws ConversionError if a presentation cannot be converted
 * @throws SourceDocumentError if the PDF cannot be read or rendered
 */
export async function createHandout(input: HandoutInput, options: HandoutOptions = {}): Promise<HandoutResult> {
  const config = options.config ?? DEFAULT_HANDOUT_CONFIG;
  const dpi = clampDpi(options.dpi ?? config.defaultDpi, config);
  const mode = options.tilingMode ?? config.defaultTilingMode;
  const metadata = { title: options.title, creationDate: options.creationDate };

  const pdf = await loadSourcePdf(input, options, config);
  const source = await openRasterSource(pdf, { dpi, maxSourceBytes: config.maxSourceBytes });

  try {
    const pages = source.pages();
    const first = await pages.next();

    if (first.done) {
      console.log("[handout] Source has no pages, producing an empty handout");
      const composed = await composeHandout([], null, config.layout, metadata);
      return {
        pdf: composed.pdf,
        sourcePageCount: 0,
        outputPageCount: composed.pageCount,
        dpi,
        grid: null,
        placements: composed.placements,
      };
    }

    // Planned once from the first page; later pages never change the grid
    const grid = planGrid({
      totalPages: source.pageCount,
      mode,
      firstImage: first.value,
      layout: config.layout,
    });
    const composed = await composeHandout(prepend(first.value, pages), grid, config.layout, metadata);

    console.log("[handout] Handout created", {
      sourcePages: source.pageCount,
      outputPages: composed.pageCount,
      tilesPerPage: grid.tilesPerPage,
      dpi,
    });

    return {
      pdf: composed.pdf,
      sourcePageCount: source.pageCount,
      outputPageCount: composed.pageCount,
      dpi,
      grid,
      placements: composed.placements,
    };
  } finally {
    source.close();
  }
}

/**
 * Build a handout and write it to `outputPath`. The file is only written
 * once the document is finalized.
 */
export async function writeHandout(
  inputPath: string,
  outputPath: string,
  options: HandoutOptions = {}
): Promise<HandoutResult> {
  const result = await createHandout({ path: inputPath }, options);
  await writeFile(outputPath, result.pdf);
  console.log("[handout] Saved", { outputPath, sizeBytes: result.pdf.length });
  return result;
}

export { HandoutDocument, composeHandout, placeTile, DEFAULT_HANDOUT_TITLE } from "./pageComposer";
export { planGrid, computeCellSize, fitScale } from "./layoutPlanner";
export {
  chooseTileCount,
  parseTilingMode,
  resolveGridShape,
  resolveTileCount,
  GRID_SHAPES,
  TILE_COUNTS,
} from "./tiling";
export * from "./errors";
export type {
  GridShape,
  GridSpec,
  LayoutConfig,
  RasterImage,
  RgbColor,
  TileCount,
  TilePlacement,
  TilingMode,
} from "./types";
