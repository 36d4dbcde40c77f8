/**
 * Command-line front end for the handout pipeline.
 *
 * Kept separate from scripts/handout.ts so argument handling and exit codes
 * can be tested without spawning a process.
 */

import path from "node:path";
import { parseArgs } from "node:util";
import { DEFAULT_HANDOUT_CONFIG, type HandoutConfig } from "@/lib/config/handout";
import { parseTilingMode, writeHandout, type HandoutOptions, type HandoutResult } from "@/lib/handout";
import { describeError, getErrorMessage } from "@/lib/utils/error";

export const USAGE = `Usage: handout <input.pdf|input.pptx> [options]

Options:
  -o, --out <file>     Output PDF (default: <input>_handout.pdf beside the input)
  -t, --tiles <mode>   auto, 1, 2, 4, 6 or 9 (default: auto)
  -d, --dpi <n>        Rasterization DPI, capped at the configured maximum
      --title <text>   Document title stored in the PDF
  -h, --help           Show this help`;

export type CliOutput = {
  log(line: string): void;
  error(line: string): void;
};

export type HandoutCliDeps = {
  config?: HandoutConfig;
  output?: CliOutput;
  write?: (inputPath: string, outputPath: string, options: HandoutOptions) => Promise<HandoutResult>;
};

/**
 * Default output path: `<dir>/<stem>_handout.pdf`.
 */
export function defaultOutputPath(inputPath: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.join(dir, `${name}_handout.pdf`);
}

/**
 * Run the CLI with the given arguments (without the node/script prefix).
 * @returns Process exit code
 */
export async function runHandoutCli(argv: readonly string[], deps: HandoutCliDeps = {}): Promise<number> {
  const config = deps.config ?? DEFAULT_HANDOUT_CONFIG;
  const output = deps.output ?? { log: console.log, error: console.error };
  const write = deps.write ?? writeHandout;

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    output.error(getErrorMessage(error));
    output.error(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    output.log(USAGE);
    return 0;
  }

  const input = positionals[0];
  if (!input) {
    output.error("Missing input file.");
    output.error(USAGE);
    return 2;
  }

  let tilingMode = config.defaultTilingMode;
  if (values.tiles !== undefined) {
    const parsedMode = parseTilingMode(values.tiles);
    if (parsedMode === null) {
      output.error(`Invalid --tiles value "${values.tiles}": expected auto or a positive whole number.`);
      return 2;
    }
    tilingMode = parsedMode;
  }

  let dpi: number | undefined;
  if (values.dpi !== undefined) {
    dpi = values.dpi.trim() === "" ? Number.NaN : Number(values.dpi);
    if (!Number.isFinite(dpi) || dpi <= 0) {
      output.error(`Invalid --dpi value "${values.dpi}": expected a positive number.`);
      return 2;
    }
  }

  const outputPath = values.out ?? defaultOutputPath(input);

  try {
    const result = await write(input, outputPath, {
      tilingMode,
      dpi,
      title: values.title,
      config,
    });
    const grid = result.grid ? `${result.grid.columns}x${result.grid.rows}` : "none";
    output.log(
      `Created ${result.outputPageCount} page(s) from ${result.sourcePageCount} slide(s) ` +
        `[grid ${grid}, ${result.dpi} DPI] -> ${outputPath}`
    );
    return 0;
  } catch (error) {
    console.error("[handout/cli] Handout failed", { input, ...describeError(error) });
    output.error(`Error: ${getErrorMessage(error)}`);
    return 1;
  }
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      out: { type: "string", short: "o" },
      tiles: { type: "string", short: "t" },
      dpi: { type: "string", short: "d" },
      title: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}
