/**
 * packages/core/src/layout/config.ts — Layout engine configuration.
 */

import type { WarnFn } from "../debug/warnings.js";
import { TesseraError } from "../errors.js";
import type { FontService } from "./fonts/types.js";

export type LayoutEngineConfig = Readonly<{
  /** Report degenerate layouts through `warn`. Default false. */
  devMode?: boolean;
  /** Warning sink. Default console.warn. */
  warn?: WarnFn;
  /** Hand out previous-frame boxes when a rebuilt box is equal. Default true. */
  retainBoxes?: boolean;
  /** Font service used when layout() is called without one. Default: embedded font. */
  fonts?: FontService;
}>;

export type ResolvedLayoutEngineConfig = Readonly<{
  devMode: boolean;
  warn: WarnFn | undefined;
  retainBoxes: boolean;
  fonts: FontService | undefined;
}>;

const DEFAULT_CONFIG: ResolvedLayoutEngineConfig = Object.freeze({
  devMode: false,
  warn: undefined,
  retainBoxes: true,
  fonts: undefined,
});

function invalidConfig(detail: string): never {
  throw new TesseraError("TESSERA_INVALID_CONFIG", detail);
}

function isFontService(value: unknown): value is FontService {
  if (typeof value !== "object" || value === null) return false;
  return (
    "shape" in value &&
    typeof value.shape === "function" &&
    "lineMetrics" in value &&
    typeof value.lineMetrics === "function"
  );
}

/** Apply defaults, validating every provided value. */
export function resolveLayoutEngineConfig(
  config: LayoutEngineConfig | undefined,
): ResolvedLayoutEngineConfig {
  if (!config) return DEFAULT_CONFIG;
  if (config.devMode !== undefined && typeof config.devMode !== "boolean") {
    invalidConfig("devMode must be a boolean");
  }
  if (config.retainBoxes !== undefined && typeof config.retainBoxes !== "boolean") {
    invalidConfig("retainBoxes must be a boolean");
  }
  if (config.warn !== undefined && typeof config.warn !== "function") {
    invalidConfig("warn must be a function");
  }
  if (config.fonts !== undefined && !isFontService(config.fonts)) {
    invalidConfig("fonts must implement shape() and lineMetrics()");
  }
  return Object.freeze({
    devMode: config.devMode ?? DEFAULT_CONFIG.devMode,
    warn: config.warn,
    retainBoxes: config.retainBoxes ?? DEFAULT_CONFIG.retainBoxes,
    fonts: config.fonts,
  });
}
