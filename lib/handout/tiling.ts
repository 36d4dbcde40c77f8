/**
 * Tile count resolution.
 *
 * Maps a requested tiling mode to a grid shape. "auto" is decided from the
 * first rendered page only and the result holds for the whole run.
 */

import type { GridShape, TileCount, TilingMode } from "./types";

export const TILE_COUNTS: readonly TileCount[] = [1, 2, 4, 6, 9] as const;

export const GRID_SHAPES: Readonly<Record<TileCount, GridShape>> = {
  1: { columns: 1, rows: 1 },
  2: { columns: 1, rows: 2 },
  4: { columns: 2, rows: 2 },
  6: { columns: 2, rows: 3 },
  9: { columns: 3, rows: 3 },
};

/** Used for any explicit count without an entry in GRID_SHAPES. */
export const FALLBACK_TILE_COUNT: TileCount = 4;

export function isTileCount(value: unknown): value is TileCount {
  return typeof value === "number" && TILE_COUNTS.some((count) => count === value);
}

/**
 * Parse a tiling mode from user input ("auto", 4, "6").
 * Returns null if missing or invalid (does not throw). Positive integers
 * without a grid shape are kept; planning falls back for them.
 */
export function parseTilingMode(value: unknown): TilingMode | null {
  if (typeof value === "string") {
    const trimmed = value.trim().toLowerCase();
    if (trimmed === "auto") {
      return "auto";
    }
    if (!/^\d+$/.test(trimmed)) {
      return null;
    }
    value = Number(trimmed);
  }
  if (typeof value === "number" && Number.isInteger(value) && value >= 1) {
    return value;
  }
  return null;
}

/**
 * Grid shape for a tile count. Unsupported counts get the 2x2 grid.
 */
export function resolveGridShape(tileCount: number): GridShape {
  if (isTileCount(tileCount)) {
    return GRID_SHAPES[tileCount];
  }
  return GRID_SHAPES[FALLBACK_TILE_COUNT];
}

/**
 * Auto heuristic: landscape slides (wider than tall) go two per page,
 * everything else four per page.
 */
export function chooseTileCount(firstImageAspectRatio: number): TileCount {
  return firstImageAspectRatio > 1 ? 2 : 4;
}

/**
 * Resolve the tile count for a run from the mode and the first image.
 */
export function resolveTileCount(
  mode: TilingMode,
  firstImage: { width: number; height: number }
): number {
  if (mode === "auto") {
    return chooseTileCount(firstImage.width / firstImage.height);
  }
  return mode;
}
