/**
 * Page Composer
 *
 * Places rasterized pages into the planned grid, one output page per
 * `tilesPerPage` images, and outlines each tile. pdf-lib uses a bottom-left
 * origin, so row 0 is the top row and its y is the largest.
 */

import { PDFDocument, rgb, type PDFPage } from "pdf-lib";
import { HandoutSealedError, LayoutError } from "./errors";
import type { GridSpec, LayoutConfig, RasterImage, TilePlacement } from "./types";

export const DEFAULT_HANDOUT_TITLE = "Slide handout";
const PRODUCER = "slide-handout";

export type HandoutMetadata = {
  title?: string;
  creationDate?: Date;
};

/**
 * Cell position of a slot within a page.
 * Returns the bottom-left corner of the tile, centered in its cell.
 */
export function placeTile(grid: GridSpec, slot: number): { column: number; row: number; x: number; y: number } {
  const column = slot % grid.columns;
  const row = Math.floor(slot / grid.columns);

  const x = grid.margin + column * (grid.cellWidth + grid.gap) + (grid.cellWidth - grid.scaledWidth) / 2;
  const y =
    grid.pageHeight -
    grid.margin -
    (row + 1) * grid.cellHeight -
    row * grid.gap +
    (grid.cellHeight - grid.scaledHeight) / 2;

  return { column, row, x, y };
}

/**
 * Append-only handout being built. Finalized exactly once.
 */
export class HandoutDocument {
  private currentPage: PDFPage | null = null;
  private slotOnPage = 0;
  private sealed = false;
  private readonly pagePlacements: TilePlacement[][] = [];

  private constructor(
    private readonly doc: PDFDocument,
    private readonly grid: GridSpec | null,
    private readonly layout: LayoutConfig
  ) {}

  /**
   * @param grid - Planned grid, or null for a source without pages
   */
  static async create(grid: GridSpec | null, layout: LayoutConfig, metadata: HandoutMetadata = {}): Promise<HandoutDocument> {
    const doc = await PDFDocument.create();
    doc.setTitle(metadata.title ?? DEFAULT_HANDOUT_TITLE);
    doc.setProducer(PRODUCER);
    doc.setCreator(PRODUCER);
    const now = metadata.creationDate ?? new Date();
    doc.setCreationDate(now);
    doc.setModificationDate(now);
    return new HandoutDocument(doc, grid, layout);
  }

  get pageCount(): number {
    return this.doc.getPageCount();
  }

  get isFinalized(): boolean {
    return this.sealed;
  }

  /** Placements made so far, grouped by output page. */
  get placements(): readonly (readonly TilePlacement[])[] {
    return this.pagePlacements;
  }

  /**
   * Draw the next image into the next free cell, starting a page when needed.
   */
  async addTile(image: RasterImage): Promise<TilePlacement> {
    if (this.sealed) {
      throw new HandoutSealedError();
    }
    if (!this.grid) {
      throw new LayoutError("Cannot add tiles to a handout without a planned grid.");
    }
    const grid = this.grid;

    if (!this.currentPage || this.slotOnPage === grid.tilesPerPage) {
      this.currentPage = this.doc.addPage([grid.pageWidth, grid.pageHeight]);
      this.slotOnPage = 0;
      this.pagePlacements.push([]);
    }

    const page = this.currentPage;
    const pageIndex = this.pagePlacements.length - 1;
    const slot = this.slotOnPage;
    const { column, row, x, y } = placeTile(grid, slot);
    const embedded = await this.doc.embedPng(image.png);

    page.drawImage(embedded, {
      x,
      y,
      width: grid.scaledWidth,
      height: grid.scaledHeight,
    });

    const [r, g, b] = this.layout.borderColor;
    page.drawRectangle({
      x,
      y,
      width: grid.scaledWidth,
      height: grid.scaledHeight,
      borderColor: rgb(r, g, b),
      borderWidth: this.layout.borderWidthPt,
    });

    const placement: TilePlacement = {
      sourceIndex: image.index,
      page: pageIndex,
      slot,
      column,
      row,
      x,
      y,
      width: grid.scaledWidth,
      height: grid.scaledHeight,
    };
    this.pagePlacements[pageIndex].push(placement);
    this.slotOnPage++;

    return placement;
  }

  /**
   * Seal the document and serialize it. No tiles can be added afterwards.
   */
  async finalize(): Promise<Uint8Array> {
    if (this.sealed) {
      throw new HandoutSealedError();
    }
    this.sealed = true;
    this.currentPage = null;
    // pdf-lib would otherwise insert a blank page into an empty document
    return this.doc.save({ addDefaultPage: false });
  }
}

export type ComposeResult = {
  pdf: Uint8Array;
  pageCount: number;
  placements: TilePlacement[][];
};

/**
 * Compose a handout from images in source order.
 *
 * @param images - Rasterized pages; consumed once, in order
 * @param grid - Planned grid, or null when there are no pages
 */
export async function composeHandout(
  images: Iterable<RasterImage> | AsyncIterable<RasterImage>,
  grid: GridSpec | null,
  layout: LayoutConfig,
  metadata: HandoutMetadata = {}
): Promise<ComposeResult> {
  const handout = await HandoutDocument.create(grid, layout, metadata);

  for await (const image of images) {
    const placement = await handout.addTile(image);
    if (placement.slot === 0) {
      console.log(`[handout/compose] Creating page ${placement.page + 1}`);
    }
  }

  const pdf = await handout.finalize();

  console.log("[handout/compose] Handout finalized", {
    pageCount: handout.pageCount,
    tiles: handout.placements.reduce((total, page) => total + page.length, 0),
    sizeBytes: pdf.length,
  });

  return {
    pdf,
    pageCount: handout.pageCount,
    placements: handout.placements.map((page) => [...page]),
  };
}
