/**
 * packages/core/src/layout/fonts/metricFont.ts — Table-driven font collection.
 *
 * Why: The embedded default font ships as a metrics table (cmap ranges,
 * advances, vertical metrics) rather than a binary font file. Shaping is a
 * one-glyph-per-code-point mapping with per-glyph advances; no kerning or
 * ligatures.
 *
 * Asset format (JSON):
 *   {
 *     "family": string, "unitsPerEm": number,
 *     "ascender": number, "descender": number (<= 0), "lineGap": number,
 *     "defaultAdvance": number, "notdefAdvance": number,
 *     "cmap": [{ "first": cp, "last": cp, "glyph": firstGlyphIndex }],
 *     "advances": { "<codepoint>": advance }
 *   }
 * Glyph 0 is .notdef and is used for unmapped code points.
 */

import { TesseraError } from "../../errors.js";
import type { FontRef, FontService, LineMetrics, ShapedGlyph, ShapedText } from "./types.js";

export type CmapRange = Readonly<{ first: number; last: number; glyph: number }>;

export type MetricFontData = Readonly<{
  family: string;
  unitsPerEm: number;
  ascender: number;
  descender: number;
  lineGap: number;
  defaultAdvance: number;
  notdefAdvance: number;
  cmap: readonly CmapRange[];
  advances: ReadonlyMap<number, number>;
}>;

function fontLoadFailed(detail: string, cause?: unknown): never {
  throw new TesseraError("TESSERA_FONT_LOAD_FAILED", `font asset: ${detail}`, { cause });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(record: Record<string, unknown>, key: string, min?: number): number {
  const value = record[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    fontLoadFailed(`"${key}" must be a finite number`);
  }
  if (min !== undefined && value < min) fontLoadFailed(`"${key}" must be >= ${String(min)}`);
  return value;
}

function readCmap(raw: unknown): readonly CmapRange[] {
  if (!Array.isArray(raw) || raw.length === 0) fontLoadFailed(`"cmap" must be a non-empty array`);
  return Object.freeze(
    raw.map((entry: unknown, i) => {
      if (!isRecord(entry)) fontLoadFailed(`cmap[${i}] must be an object`);
      const first = readNumber(entry, "first", 0);
      const last = readNumber(entry, "last", first);
      const glyph = readNumber(entry, "glyph", 1);
      return Object.freeze({ first, last, glyph });
    }),
  );
}

function readAdvances(raw: unknown): ReadonlyMap<number, number> {
  const out = new Map<number, number>();
  if (raw === undefined) return out;
  if (!isRecord(raw)) fontLoadFailed(`"advances" must be an object`);
  for (const [key, value] of Object.entries(raw)) {
    const codepoint = Number(key);
    if (!Number.isInteger(codepoint) || codepoint < 0) fontLoadFailed(`advances key "${key}" is not a code point`);
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      fontLoadFailed(`advances["${key}"] must be a number >= 0`);
    }
    out.set(codepoint, value);
  }
  return out;
}

/** Validate an already-decoded asset. Throws TESSERA_FONT_LOAD_FAILED. */
export function parseMetricFontData(raw: unknown): MetricFontData {
  if (!isRecord(raw)) fontLoadFailed("root must be an object");
  const family = raw.family;
  if (typeof family !== "string" || family.length === 0) fontLoadFailed(`"family" must be a non-empty string`);
  const descender = readNumber(raw, "descender");
  if (descender > 0) fontLoadFailed(`"descender" must be <= 0`);
  return Object.freeze({
    family,
    unitsPerEm: readNumber(raw, "unitsPerEm", 1),
    ascender: readNumber(raw, "ascender", 0),
    descender,
    lineGap: readNumber(raw, "lineGap", 0),
    defaultAdvance: readNumber(raw, "defaultAdvance", 0),
    notdefAdvance: readNumber(raw, "notdefAdvance", 0),
    cmap: readCmap(raw.cmap),
    advances: readAdvances(raw.advances),
  });
}

/** Decode and validate asset text. Throws TESSERA_FONT_LOAD_FAILED. */
export function parseMetricFontAsset(source: string): MetricFontData {
  let decoded: unknown;
  try {
    decoded = JSON.parse(source);
  } catch (err) {
    fontLoadFailed("not valid JSON", err);
  }
  return parseMetricFontData(decoded);
}

let fontIdCounter = 0;

export class MetricFontCollection implements FontService {
  readonly font: FontRef;
  private readonly data: MetricFontData;

  constructor(data: MetricFontData) {
    this.data = data;
    this.font = Object.freeze({
      id: `${data.family}#${String(++fontIdCounter)}`,
      family: data.family,
      unitsPerEm: data.unitsPerEm,
    });
  }

  /** Glyph index for a code point; 0 (.notdef) when unmapped. */
  glyphIndex(codepoint: number): number {
    for (const range of this.data.cmap) {
      if (codepoint >= range.first && codepoint <= range.last) {
        return range.glyph + (codepoint - range.first);
      }
    }
    return 0;
  }

  private advanceUnits(codepoint: number, glyph: number): number {
    if (glyph === 0) return this.data.notdefAdvance;
    return this.data.advances.get(codepoint) ?? this.data.defaultAdvance;
  }

  private scale(units: number, textSize: number): number {
    return (units * textSize) / this.data.unitsPerEm;
  }

  shape(text: string, textSize: number): ShapedText {
    const glyphs: ShapedGlyph[] = [];
    let width = 0;
    let cluster = 0;
    for (const ch of text) {
      const codepoint = ch.codePointAt(0) ?? 0xfffd;
      const index = this.glyphIndex(codepoint);
      const advance = this.scale(this.advanceUnits(codepoint, index), textSize);
      glyphs.push(Object.freeze({ index, cluster, advance }));
      width += advance;
      cluster += ch.length;
    }
    return Object.freeze({ font: this.font, glyphs: Object.freeze(glyphs), width });
  }

  lineMetrics(textSize: number): LineMetrics {
    const d = this.data;
    const ascent = this.scale(d.ascender, textSize);
    const descent = this.scale(-d.descender, textSize);
    const lineGap = this.scale(d.lineGap, textSize);
    return Object.freeze({
      ascent,
      descent,
      lineGap,
      lineHeight: this.scale(d.ascender - d.descender + d.lineGap, textSize),
    });
  }
}
