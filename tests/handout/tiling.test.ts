/**
 * Tile count resolution tests
 *
 * Covers the fixed grid table, the 2x2 fallback for unsupported counts, the
 * auto heuristic and parsing of user-supplied tiling modes.
 */

import { describe, it, expect } from "vitest";
import {
  chooseTileCount,
  GRID_SHAPES,
  isTileCount,
  parseTilingMode,
  resolveGridShape,
  resolveTileCount,
  TILE_COUNTS,
} from "@/lib/handout/tiling";

describe("resolveGridShape", () => {
  it.each([
    [1, 1, 1],
    [2, 1, 2],
    [4, 2, 2],
    [6, 2, 3],
    [9, 3, 3],
  ])("should map %i tiles to %i column(s) x %i row(s)", (tiles, columns, rows) => {
    expect(resolveGridShape(tiles)).toEqual({ columns, rows });
  });

  it.each([0, 3, 5, 7, 8, 12, 16, -4, 2.5])("should fall back to 2x2 for unsupported count %s", (tiles) => {
    expect(resolveGridShape(tiles)).toEqual({ columns: 2, rows: 2 });
  });

  it("should have a grid whose cell count equals the tile count for every supported count", () => {
    for (const count of TILE_COUNTS) {
      const { columns, rows } = GRID_SHAPES[count];
      expect(columns * rows).toBe(count);
    }
  });
});

describe("isTileCount", () => {
  it("should accept only the enumerated counts", () => {
    expect(TILE_COUNTS.every(isTileCount)).toBe(true);
    expect(isTileCount(3)).toBe(false);
    expect(isTileCount("4")).toBe(false);
    expect(isTileCount(null)).toBe(false);
  });
});

describe("chooseTileCount", () => {
  it("should choose 2 per page for landscape slides", () => {
    expect(chooseTileCount(16 / 9)).toBe(2);
    expect(chooseTileCount(4 / 3)).toBe(2);
    expect(chooseTileCount(1.01)).toBe(2);
  });

  it("should choose 4 per page for portrait and square slides", () => {
    expect(chooseTileCount(9 / 16)).toBe(4);
    expect(chooseTileCount(1)).toBe(4);
  });
});

describe("resolveTileCount", () => {
  it("should resolve auto from the image aspect ratio", () => {
    expect(resolveTileCount("auto", { width: 1600, height: 900 })).toBe(2);
    expect(resolveTileCount("auto", { width: 900, height: 1600 })).toBe(4);
  });

  it("should pass explicit counts through unchanged, even unsupported ones", () => {
    expect(resolveTileCount(6, { width: 1600, height: 900 })).toBe(6);
    expect(resolveTileCount(3, { width: 1600, height: 900 })).toBe(3);
  });
});

describe("parseTilingMode", () => {
  it("should parse auto case-insensitively", () => {
    expect(parseTilingMode("auto")).toBe("auto");
    expect(parseTilingMode(" AUTO ")).toBe("auto");
  });

  it("should parse numbers and numeric strings", () => {
    expect(parseTilingMode(4)).toBe(4);
    expect(parseTilingMode("6")).toBe(6);
    expect(parseTilingMode("3")).toBe(3);
  });

  it("should return null for invalid values", () => {
    expect(parseTilingMode(undefined)).toBeNull();
    expect(parseTilingMode(null)).toBeNull();
    expect(parseTilingMode("")).toBeNull();
    expect(parseTilingMode("four")).toBeNull();
    expect(parseTilingMode("4.5")).toBeNull();
    expect(parseTilingMode("-2")).toBeNull();
    expect(parseTilingMode(0)).toBeNull();
    expect(parseTilingMode(2.5)).toBeNull();
    expect(parseTilingMode({})).toBeNull();
  });
});
