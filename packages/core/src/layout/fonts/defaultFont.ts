/**
 * packages/core/src/layout/fonts/defaultFont.ts — Process-wide default font.
 *
 * The embedded asset is read and parsed on first use and the collection is
 * kept for the rest of the process. A failed load is not cached: it throws
 * TESSERA_FONT_LOAD_FAILED, which callers are expected to treat as fatal.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { TesseraError } from "../../errors.js";
import { MetricFontCollection, parseMetricFontAsset } from "./metricFont.js";

export const DEFAULT_FONT_ASSET_PATH = fileURLToPath(
  new URL("../../../assets/default-font.json", import.meta.url),
);

let defaultCollection: MetricFontCollection | null = null;

function readAsset(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (err) {
    throw new TesseraError("TESSERA_FONT_LOAD_FAILED", `font asset: cannot read ${path}`, {
      cause: err,
    });
  }
}

export function loadFontCollection(path: string): MetricFontCollection {
  return new MetricFontCollection(parseMetricFontAsset(readAsset(path)));
}

export function getDefaultFontCollection(): MetricFontCollection {
  if (!defaultCollection) {
    defaultCollection = loadFontCollection(DEFAULT_FONT_ASSET_PATH);
  }
  return defaultCollection;
}

/** True once the default collection has been built. */
export function isDefaultFontLoaded(): boolean {
  return defaultCollection !== null;
}
