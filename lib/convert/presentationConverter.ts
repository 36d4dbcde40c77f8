/**
 * Presentation -> PDF conversion.
 *
 * The handout core only reads PDFs. Slide decks in presentation formats are
 * converted first through a PdfConverter; the default one drives LibreOffice
 * in headless mode. Any failure here aborts the run before rasterization.
 */

import { execFile } from "node:child_process";
import { access, mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import { DEFAULT_HANDOUT_CONFIG } from "@/lib/config/handout";
import { ConversionError } from "@/lib/handout/errors";
import { getErrorMessage } from "@/lib/utils/error";

export const PRESENTATION_EXTENSIONS: readonly string[] = [".ppt", ".pptx", ".odp"] as const;

export interface PdfConverter {
  /**
   * Convert a presentation file to PDF.
   * @returns Path of the written PDF
   * @throws ConversionError
   */
  convertToPdf(inputPath: string): Promise<string>;
  /** Delete a converted PDF once its bytes have been read. */
  release?(pdfPath: string): Promise<void>;
}

/** Runs an executable with an argument vector (no shell). */
export type CommandRunner = (
  file: string,
  args: readonly string[]
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], { encoding: "utf8" });
  return { stdout, stderr };
};

export function isPresentationFile(filePath: string): boolean {
  return PRESENTATION_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

export type LibreOfficeConverterOptions = {
  /** soffice executable; defaults to "soffice" on PATH */
  sofficePath?: string;
  /** Where converted PDFs are written; defaults to a fresh temp directory per call */
  outputDir?: string;
  run?: CommandRunner;
};

/**
 * Converts with `soffice --headless --convert-to pdf <input> --outdir <dir>`.
 * LibreOffice names the output after the input's stem.
 */
export class LibreOfficeConverter implements PdfConverter {
  private readonly sofficePath: string;
  private readonly outputDir: string | undefined;
  private readonly run: CommandRunner;
  /** Temp directories this converter created and may delete */
  private readonly tempDirs = new Set<string>();

  constructor(options: LibreOfficeConverterOptions = {}) {
    this.sofficePath = options.sofficePath ?? DEFAULT_HANDOUT_CONFIG.sofficePath;
    this.outputDir = options.outputDir;
    this.run = options.run ?? runCommand;
  }

  async convertToPdf(inputPath: string): Promise<string> {
    let outputDir = this.outputDir;
    if (outputDir === undefined) {
      outputDir = await mkdtemp(path.join(os.tmpdir(), "handout-convert-"));
      this.tempDirs.add(outputDir);
    }
    const outputPath = path.join(outputDir, `${path.parse(inputPath).name}.pdf`);
    const args = ["--headless", "--convert-to", "pdf", inputPath, "--outdir", outputDir];

    console.log("[handout/convert] Converting presentation to PDF", {
      inputPath,
      outputDir,
      soffice: this.sofficePath,
    });

    try {
      await this.run(this.sofficePath, args);
    } catch (error) {
      throw new ConversionError(`Presentation conversion failed: ${getErrorMessage(error)}`, inputPath, {
        cause: error,
      });
    }

    try {
      await access(outputPath);
    } catch (error) {
      throw new ConversionError(`Converter did not produce ${outputPath}`, inputPath, { cause: error });
    }

    console.log("[handout/convert] Conversion complete", { outputPath });
    return outputPath;
  }

  /**
   * Remove the temp directory holding `pdfPath`. PDFs written to a
   * configured outputDir are left in place.
   */
  async release(pdfPath: string): Promise<void> {
    const dir = path.dirname(pdfPath);
    if (!this.tempDirs.has(dir)) {
      return;
    }
    await rm(dir, { recursive: true, force: true });
    this.tempDirs.delete(dir);
    console.log("[handout/convert] Removed conversion directory", { dir });
  }
}
