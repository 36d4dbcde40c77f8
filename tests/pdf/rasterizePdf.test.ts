/**
 * Rasterizer tests
 *
 * Runs the real MuPDF engine against PDFs built in memory with pdf-lib.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { openRasterSource, rasterizePdf, validatePdfBytes } from "@/lib/pdf";
import { SourceDocumentError } from "@/lib/handout/errors";
import { LANDSCAPE_SLIDE, makePdf, PORTRAIT_SLIDE } from "../helpers/fixtures";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

describe("validatePdfBytes", () => {
  it("should accept a PDF header", () => {
    expect(() => validatePdfBytes(new TextEncoder().encode("%PDF-1.7\n%%EOF\n"), 1024)).not.toThrow();
  });

  it("should reject sources over the size limit", () => {
    const bytes = new Uint8Array(3 * 1024 * 1024);
    expect(() => validatePdfBytes(bytes, 2 * 1024 * 1024)).toThrow(
      "PDF file too large (3145728 bytes). Maximum size is 2MB."
    );
  });

  it("should reject buffers too small to be a PDF", () => {
    expect(() => validatePdfBytes(new TextEncoder().encode("%PDF-"), 1024)).toThrow(
      "PDF buffer is too small or invalid."
    );
  });

  it("should reject bytes without a PDF header", () => {
    expect(() => validatePdfBytes(new TextEncoder().encode("PK\u0003\u0004 this is a zip archive"), 1024)).toThrow(
      SourceDocumentError
    );
  });
});

describe("Rasterizer", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should render at 72 DPI to one pixel per point", async () => {
    const pdf = await makePdf([LANDSCAPE_SLIDE]);

    const [image] = await rasterizePdf(pdf, { dpi: 72 });

    expect(image.index).toBe(0);
    expect(image.width).toBe(720);
    expect(image.height).toBe(405);
    expect(Array.from(image.png.subarray(0, 8))).toEqual(PNG_SIGNATURE);
  });

  it("should scale pixel size with DPI", async () => {
    const pdf = await makePdf([LANDSCAPE_SLIDE]);

    const [image] = await rasterizePdf(pdf, { dpi: 144 });

    expect(image.width).toBe(1440);
    expect(image.height).toBe(810);
  });

  it("should return every page in source order with its own size", async () => {
    const pdf = await makePdf([LANDSCAPE_SLIDE, PORTRAIT_SLIDE, LANDSCAPE_SLIDE]);

    const images = await rasterizePdf(pdf, { dpi: 72 });

    expect(images.map((image) => image.index)).toEqual([0, 1, 2]);
    expect(images.map((image) => [image.width, image.height])).toEqual([
      [720, 405],
      [405, 720],
      [720, 405],
    ]);
  });

  it("should log progress every 10 pages", async () => {
    const pdf = await makePdf(Array.from({ length: 12 }, () => LANDSCAPE_SLIDE));

    const images = await rasterizePdf(pdf, { dpi: 18 });

    expect(images).toHaveLength(12);
    expect(console.log).toHaveBeenCalledWith("[handout/rasterize] Converted 10/12 pages");
    expect(console.log).toHaveBeenCalledWith("[handout/rasterize] Converted 12 pages");
  });

  it("should report the page count before rendering", async () => {
    const pdf = await makePdf([LANDSCAPE_SLIDE, LANDSCAPE_SLIDE]);
    const source = await openRasterSource(pdf, { dpi: 72 });

    try {
      expect(source.pageCount).toBe(2);
    } finally {
      source.close();
    }
  });

  it("should stop rendering once the source is closed", async () => {
    const pdf = await makePdf([LANDSCAPE_SLIDE, LANDSCAPE_SLIDE]);
    const source = await openRasterSource(pdf, { dpi: 36 });
    const pages = source.pages();

    const first = await pages.next();
    expect(first.done).toBe(false);

    source.close();
    source.close();
    await expect(pages.next()).rejects.toThrow("Source document was closed before rasterization finished.");
  });

  it("should return no images for a document without pages", async () => {
    const pdf = await makePdf([]);

    const images = await rasterizePdf(pdf, { dpi: 72 });

    expect(images).toEqual([]);
    expect(console.log).toHaveBeenCalledWith("[handout/rasterize] Converted 0 pages");
  });

  it("should reject a truncated deck instead of reading it as empty", async () => {
    const pdf = await makePdf([LANDSCAPE_SLIDE, LANDSCAPE_SLIDE, LANDSCAPE_SLIDE]);
    const truncated = pdf.slice(0, Math.floor(pdf.length * 0.6));

    const error = await rasterizePdf(truncated, { dpi: 72 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceDocumentError);
    expect(error).toHaveProperty("message", "PDF document is damaged and no pages could be recovered.");
  });

  it("should report a file with a PDF header but no readable objects", async () => {
    const bytes = new TextEncoder().encode("%PDF-1.7\nthis deck was overwritten with plain text\n");

    const error = await rasterizePdf(bytes, { dpi: 72 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceDocumentError);
    expect(error).toHaveProperty("message", expect.stringContaining("Failed to open PDF document"));
  });

  it("should refuse input that is not a PDF", async () => {
    const bytes = new TextEncoder().encode("<html><body>not a deck</body></html>");

    await expect(rasterizePdf(bytes, { dpi: 72 })).rejects.toThrow("Invalid PDF file format.");
  });

  it("should apply the configured size limit", async () => {
    const pdf = await makePdf([LANDSCAPE_SLIDE]);

    await expect(rasterizePdf(pdf, { dpi: 72, maxSourceBytes: 16 })).rejects.toBeInstanceOf(SourceDocumentError);
  });
});
