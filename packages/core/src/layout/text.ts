/**
 * packages/core/src/layout/text.ts — Text shaping into units and line packing.
 *
 * Why: Inline layout works on a flat stream of units. Text is whitespace
 * collapsed, shaped once per contiguous run, then cut at space glyphs into
 * word units. Nested inline boxes are opaque units.
 *
 * Packing rules:
 *   - Greedy: a unit that would overflow the available width starts a new line.
 *   - A unit wider than the line sits alone on its own line; units never split.
 *   - Spaces are dropped at the start and end of a line and never stack.
 *   - With an available width of 0 each glyph is its own unit.
 */

import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import type { LayoutBox } from "./box.js";
import { outerHeight, outerWidth } from "./box.js";
import type { FontRef, FontService, ShapedGlyph } from "./fonts/types.js";

export type WordUnit = Readonly<{
  kind: "word";
  font: FontRef;
  glyphs: readonly ShapedGlyph[];
  width: number;
}>;

export type SpaceUnit = Readonly<{ kind: "space"; width: number }>;

export type BoxUnit = Readonly<{ kind: "box"; box: LayoutBox; width: number; height: number }>;

export type InlineUnit = WordUnit | SpaceUnit | BoxUnit;

export type PlacedUnit = Readonly<{ unit: WordUnit | BoxUnit; x: number }>;

export type Line = Readonly<{
  units: readonly PlacedUnit[];
  /** Top edge, relative to the inline content box. */
  y: number;
  width: number;
  height: number;
}>;

/** Collapse ASCII whitespace runs to one space. Non-breaking spaces are kept. */
export function collapseWhitespace(text: string): string {
  return text.replace(/[ \t\n\r\f]+/g, " ");
}

function sumAdvances(glyphs: readonly ShapedGlyph[]): number {
  let width = 0;
  for (const g of glyphs) width += g.advance;
  return width;
}

/** Shape one contiguous text run and cut it into word and space units. */
export function shapeTextUnits(fonts: FontService, text: string, textSize: number): InlineUnit[] {
  const collapsed = collapseWhitespace(text);
  if (collapsed.length === 0) return [];

  const token = perfMarkStart();
  const shaped = fonts.shape(collapsed, textSize);
  perfMarkEnd("shape", token);

  const units: InlineUnit[] = [];
  let word: ShapedGlyph[] = [];
  const flushWord = () => {
    if (word.length === 0) return;
    units.push(
      Object.freeze({ kind: "word", font: shaped.font, glyphs: Object.freeze(word), width: sumAdvances(word) }),
    );
    word = [];
  };

  for (const glyph of shaped.glyphs) {
    if (collapsed.charCodeAt(glyph.cluster) === 0x20) {
      flushWord();
      units.push(Object.freeze({ kind: "space", width: glyph.advance }));
    } else {
      word.push(glyph);
    }
  }
  flushWord();
  return units;
}

export function boxUnit(box: LayoutBox): BoxUnit {
  return Object.freeze({ kind: "box", box, width: outerWidth(box), height: outerHeight(box) });
}

/** Split every word into single-glyph words (zero-width degenerate case). */
export function splitToGlyphUnits(units: readonly InlineUnit[]): InlineUnit[] {
  const out: InlineUnit[] = [];
  for (const unit of units) {
    if (unit.kind !== "word" || unit.glyphs.length <= 1) {
      out.push(unit);
      continue;
    }
    for (const glyph of unit.glyphs) {
      out.push(
        Object.freeze({ kind: "word", font: unit.font, glyphs: Object.freeze([glyph]), width: glyph.advance }),
      );
    }
  }
  return out;
}

type LineDraft = { units: PlacedUnit[]; width: number; height: number };

/**
 * Greedy line packing.
 *
 * `lineHeight` is the minimum height of every line (the font's line height);
 * a taller box unit grows its line.
 */
export function packLines(
  units: readonly InlineUnit[],
  availableWidth: number,
  lineHeight: number,
): readonly Line[] {
  const stream = availableWidth <= 0 ? splitToGlyphUnits(units) : units;
  const drafts: LineDraft[] = [];
  let current: LineDraft | null = null;
  let pendingSpace: number | null = null;

  for (const unit of stream) {
    if (unit.kind === "space") {
      if (current !== null && current.units.length > 0 && pendingSpace === null) {
        pendingSpace = unit.width;
      }
      continue;
    }

    const lead = pendingSpace ?? 0;
    if (current === null || (current.units.length > 0 && current.width + lead + unit.width > availableWidth)) {
      current = { units: [], width: 0, height: lineHeight };
      drafts.push(current);
    }
    const x = current.units.length === 0 ? 0 : current.width + lead;
    current.units.push(Object.freeze({ unit, x }));
    current.width = x + unit.width;
    if (unit.kind === "box" && unit.height > current.height) current.height = unit.height;
    pendingSpace = null;
  }

  const lines: Line[] = [];
  let y = 0;
  for (const draft of drafts) {
    lines.push(
      Object.freeze({ units: Object.freeze(draft.units), y, width: draft.width, height: draft.height }),
    );
    y += draft.height;
  }
  return Object.freeze(lines);
}
