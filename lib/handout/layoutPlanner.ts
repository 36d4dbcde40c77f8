/**
 * Layout Planner
 *
 * Turns (page count, tiling mode, first image size) into the GridSpec shared
 * by every tile of a run. The scale is taken from the first image and reused
 * for all later pages, even when their pixel size differs.
 */

import { LayoutError } from "./errors";
import { isTileCount, resolveGridShape, resolveTileCount } from "./tiling";
import type { GridShape, GridSpec, LayoutConfig, TilingMode } from "./types";

/**
 * Cell size for a grid shape on the configured page.
 */
export function computeCellSize(
  shape: GridShape,
  layout: LayoutConfig
): { cellWidth: number; cellHeight: number } {
  const availableWidth = layout.pageWidthPt - 2 * layout.marginPt - (shape.columns - 1) * layout.gapPt;
  const availableHeight = layout.pageHeightPt - 2 * layout.marginPt - (shape.rows - 1) * layout.gapPt;

  return {
    cellWidth: availableWidth / shape.columns,
    cellHeight: availableHeight / shape.rows,
  };
}

/**
 * Uniform scale that fits an image into a cell while keeping its aspect ratio.
 */
export function fitScale(
  image: { width: number; height: number },
  cell: { cellWidth: number; cellHeight: number }
): number {
  return Math.min(cell.cellWidth / image.width, cell.cellHeight / image.height);
}

/**
 * Plan the grid for a run.
 *
 * @param params.totalPages - Number of source pages (must be >= 1)
 * @param params.mode - Requested tiling; "auto" is resolved here, once
 * @param params.firstImage - Pixel size of the first rasterized page
 * @param params.layout - Page size, margin and gap
 * @throws LayoutError if the inputs cannot be laid out
 */
export function planGrid(params: {
  totalPages: number;
  mode: TilingMode;
  firstImage: { width: number; height: number };
  layout: LayoutConfig;
}): GridSpec {
  const { totalPages, mode, firstImage, layout } = params;

  if (!Number.isInteger(totalPages) || totalPages < 1) {
    throw new LayoutError(`totalPages must be a positive integer (got ${totalPages})`);
  }
  if (!(firstImage.width > 0) || !(firstImage.height > 0)) {
    throw new LayoutError(
      `First image must have positive dimensions (got ${firstImage.width} x ${firstImage.height})`
    );
  }

  const tileCount = resolveTileCount(mode, firstImage);
  const shape = resolveGridShape(tileCount);
  const { cellWidth, cellHeight } = computeCellSize(shape, layout);

  if (cellWidth <= 0 || cellHeight <= 0) {
    throw new LayoutError(
      `Margins and gaps leave no room for a ${shape.columns}x${shape.rows} grid on a ${layout.pageWidthPt}x${layout.pageHeightPt} page`
    );
  }

  if (!isTileCount(tileCount)) {
    console.warn("[handout/layout] Unsupported tile count, using 2x2 grid", { requested: tileCount });
  }

  const scale = fitScale(firstImage, { cellWidth, cellHeight });

  const planned: GridSpec = {
    tileCount,
    columns: shape.columns,
    rows: shape.rows,
    tilesPerPage: shape.columns * shape.rows,
    cellWidth,
    cellHeight,
    scale,
    scaledWidth: firstImage.width * scale,
    scaledHeight: firstImage.height * scale,
    pageWidth: layout.pageWidthPt,
    pageHeight: layout.pageHeightPt,
    margin: layout.marginPt,
    gap: layout.gapPt,
  };

  console.log("[handout/layout] Grid planned", {
    mode,
    tileCount,
    grid: `${planned.columns}x${planned.rows}`,
    totalPages,
    outputPages: Math.ceil(totalPages / planned.tilesPerPage),
    imagePx: `${firstImage.width}x${firstImage.height}`,
    scaledPt: `${planned.scaledWidth.toFixed(1)}x${planned.scaledHeight.toFixed(1)}`,
  });

  return planned;
}
