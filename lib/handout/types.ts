/**
 * Handout domain types.
 *
 * Units: raster sizes are integer pixels, everything on the output page is in
 * PDF points (1/72 inch) with the origin at the bottom-left corner.
 */

/** Tile counts with a fixed grid shape. */
export type TileCount = 1 | 2 | 4 | 6 | 9;

/**
 * Requested tiling. Explicit numbers outside {@link TileCount} are accepted and
 * fall back to the 2x2 grid when the layout is planned.
 */
export type TilingMode = "auto" | number;

export type GridShape = {
  columns: number;
  rows: number;
};

/** One rasterized source page. */
export type RasterImage = {
  /** Zero-based source page index */
  index: number;
  width: number;
  height: number;
  png: Uint8Array;
};

export type RgbColor = readonly [r: number, g: number, b: number];

/**
 * Page layout constants passed explicitly into the planner and composer.
 */
export type LayoutConfig = {
  pageWidthPt: number;
  pageHeightPt: number;
  marginPt: number;
  gapPt: number;
  borderColor: RgbColor;
  borderWidthPt: number;
};

/**
 * Derived once per run from the tiling mode and the first raster image.
 * Every tile of the run is drawn at `scaledWidth` x `scaledHeight`.
 */
export type GridSpec = {
  tileCount: number;
  columns: number;
  rows: number;
  tilesPerPage: number;
  cellWidth: number;
  cellHeight: number;
  scale: number;
  scaledWidth: number;
  scaledHeight: number;
  pageWidth: number;
  pageHeight: number;
  margin: number;
  gap: number;
};

/** Where one tile landed on an output page. */
export type TilePlacement = {
  sourceIndex: number;
  /** Zero-based output page */
  page: number;
  /** Zero-based slot within the page grid */
  slot: number;
  column: number;
  row: number;
  x: number;
  y: number;
  width: number;
  height: number;
};
