/**
 * Handout configuration.
 *
 * Layout constants are a plain value passed into the planner and composer.
 * Environment variables only override the defaults when the config is built;
 * nothing reads process.env after that.
 */

import type { LayoutConfig, TilingMode } from "@/lib/handout/types";
import { parseTilingMode } from "@/lib/handout/tiling";

/** Resolution of the PDF point unit. Zoom = dpi / REFERENCE_DPI. */
export const REFERENCE_DPI = 72;

export type HandoutConfig = {
  layout: LayoutConfig;
  defaultDpi: number;
  maxDpi: number;
  defaultTilingMode: TilingMode;
  maxSourceBytes: number;
  sofficePath: string;
};

export const DEFAULT_HANDOUT_CONFIG: HandoutConfig = Object.freeze({
  layout: Object.freeze({
    // US Letter (8.5" x 11")
    pageWidthPt: 612,
    pageHeightPt: 792,
    marginPt: 36,
    gapPt: 12,
    borderColor: [0.8, 0.8, 0.8] as const,
    borderWidthPt: 0.5,
  }),
  defaultDpi: 200,
  maxDpi: 300,
  defaultTilingMode: "auto",
  maxSourceBytes: 50 * 1024 * 1024,
  sofficePath: "soffice",
});

function parsePositiveInt(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    console.warn(`[config/handout] Ignoring ${name}: expected a positive integer`, { value: raw });
    return undefined;
  }
  return value;
}

/**
 * Build the handout config from defaults plus environment overrides.
 *
 * Recognized: HANDOUT_DEFAULT_DPI, HANDOUT_MAX_DPI, HANDOUT_DEFAULT_TILING,
 * HANDOUT_MAX_SOURCE_MB, SOFFICE_PATH.
 */
export function getHandoutConfig(env: NodeJS.ProcessEnv = process.env): HandoutConfig {
  const maxDpi = parsePositiveInt("HANDOUT_MAX_DPI", env.HANDOUT_MAX_DPI) ?? DEFAULT_HANDOUT_CONFIG.maxDpi;
  const defaultDpi = Math.min(
    parsePositiveInt("HANDOUT_DEFAULT_DPI", env.HANDOUT_DEFAULT_DPI) ?? DEFAULT_HANDOUT_CONFIG.defaultDpi,
    maxDpi
  );

  let defaultTilingMode = DEFAULT_HANDOUT_CONFIG.defaultTilingMode;
  if (env.HANDOUT_DEFAULT_TILING !== undefined && env.HANDOUT_DEFAULT_TILING.trim() !== "") {
    const parsed = parseTilingMode(env.HANDOUT_DEFAULT_TILING);
    if (parsed === null) {
      console.warn("[config/handout] Ignoring HANDOUT_DEFAULT_TILING: expected \"auto\" or a tile count", {
        value: env.HANDOUT_DEFAULT_TILING,
      });
    } else {
      defaultTilingMode = parsed;
    }
  }

  const maxSourceMb = parsePositiveInt("HANDOUT_MAX_SOURCE_MB", env.HANDOUT_MAX_SOURCE_MB);

  return {
    layout: DEFAULT_HANDOUT_CONFIG.layout,
    defaultDpi,
    maxDpi,
    defaultTilingMode,
    maxSourceBytes: maxSourceMb !== undefined ? maxSourceMb * 1024 * 1024 : DEFAULT_HANDOUT_CONFIG.maxSourceBytes,
    sofficePath: env.SOFFICE_PATH?.trim() || DEFAULT_HANDOUT_CONFIG.sofficePath,
  };
}

/**
 * Resolve a requested DPI: missing or non-numeric input uses the default,
 * fractional values are rounded, and the result is clamped to [1, maxDpi].
 */
export function clampDpi(
  value: unknown,
  config: Pick<HandoutConfig, "defaultDpi" | "maxDpi"> = DEFAULT_HANDOUT_CONFIG
): number {
  const numeric = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof numeric !== "number" || !Number.isFinite(numeric)) {
    if (value !== undefined && value !== null && value !== "") {
      console.warn("[config/handout] Ignoring non-numeric DPI, using default", {
        requested: value,
        dpi: config.defaultDpi,
      });
    }
    return config.defaultDpi;
  }
  const dpi = Math.min(Math.max(Math.round(numeric), 1), config.maxDpi);
  if (dpi !== numeric) {
    console.warn("[config/handout] DPI adjusted", { requested: numeric, dpi, maxDpi: config.maxDpi });
  }
  return dpi;
}

/** Linear zoom factor for rendering at `dpi`. */
export function dpiToZoom(dpi: number): number {
  return dpi / REFERENCE_DPI;
}
