/**
 * packages/core/src/layout/inline.ts — Inline / text layout.
 *
 * Why: Flows text and nested inline boxes into wrapped lines.
 *
 * Output shape:
 *   - Only text: one box whose content is a TextRun with one fragment per line.
 *   - Text mixed with nested boxes: a children box. Per line, every
 *     contiguous stretch of text becomes its own text box and nested boxes
 *     keep their positions, so no two children overlap.
 *   - No content: a zero-size box holding an empty TextRun.
 *
 * Size is the union of the line extents. Inline boxes carry no margin.
 */

import type { Element, ElementChild } from "../dom/types.js";
import type { ResolvedAttributes } from "../style/types.js";
import type { Glyph, LayoutBox, PositionedChild, TextFragment, TextRun } from "./box.js";
import { type LayoutContext, marginOf, requireResolved } from "./context.js";
import type { LineMetrics } from "./fonts/types.js";
import { type Point, type Size, ZERO_SIDES, clampNonNegative, point, size } from "./geometry.js";
import {
  type InlineUnit,
  type Line,
  type PlacedUnit,
  type WordUnit,
  boxUnit,
  packLines,
  shapeTextUnits,
} from "./text.js";

function collectUnits(
  ctx: LayoutContext,
  attrs: ResolvedAttributes,
  children: readonly ElementChild[],
  available: Size,
): InlineUnit[] {
  const units: InlineUnit[] = [];
  // Adjacent text nodes form one run: "aaa" + "bbb" is the word "aaabbb".
  let pending = "";
  const flushText = () => {
    if (pending.length === 0) return;
    units.push(...shapeTextUnits(ctx.fonts, pending, attrs.textSize));
    pending = "";
  };
  for (const child of children) {
    if (child.kind === "text") {
      pending += child.text;
      continue;
    }
    flushText();
    const margin = marginOf(requireResolved(child));
    const childAvailable = size(
      clampNonNegative(available.w - margin.left - margin.right),
      clampNonNegative(available.h - margin.top - margin.bottom),
    );
    units.push(boxUnit(ctx.layoutElement(child, childAvailable)));
  }
  flushText();
  return units;
}

/**
 * Build one fragment from consecutive word units. Glyph offsets are measured
 * from `startX` on the line.
 */
function buildFragment(words: readonly PlacedUnit[], startX: number, origin: Point): TextFragment | null {
  const first = words[0];
  const last = words[words.length - 1];
  if (!first || !last) return null;
  const firstUnit = first.unit;
  if (firstUnit.kind !== "word") return null;
  const glyphs: Glyph[] = [];
  for (const placed of words) {
    if (placed.unit.kind !== "word") continue;
    let pen = placed.x - startX;
    for (const g of placed.unit.glyphs) {
      glyphs.push(Object.freeze({ index: g.index, offset: point(pen, 0) }));
      pen += g.advance;
    }
  }
  return Object.freeze({
    font: firstUnit.font,
    origin,
    width: last.x + last.unit.width - first.x,
    glyphs: Object.freeze(glyphs),
  });
}

function textRun(owner: Element, attrs: ResolvedAttributes, fragments: readonly TextFragment[]): TextRun {
  return Object.freeze({
    fragments: Object.freeze(fragments),
    textSize: attrs.textSize,
    textColor: attrs.textColor,
    owner,
  });
}

function isWord(placed: PlacedUnit): placed is PlacedUnit & { unit: WordUnit } {
  return placed.unit.kind === "word";
}

function textOnlyBox(
  owner: Element,
  attrs: ResolvedAttributes,
  lines: readonly Line[],
  metrics: LineMetrics,
  extent: Size,
): LayoutBox {
  const fragments: TextFragment[] = [];
  for (const line of lines) {
    const fragment = buildFragment(line.units, 0, point(0, line.y + metrics.ascent));
    if (fragment) fragments.push(fragment);
  }
  return Object.freeze({
    element: owner,
    attributes: attrs,
    size: extent,
    margin: ZERO_SIDES,
    content: Object.freeze({ kind: "text", run: textRun(owner, attrs, fragments) }),
  });
}

function mixedBox(
  owner: Element,
  attrs: ResolvedAttributes,
  lines: readonly Line[],
  metrics: LineMetrics,
  extent: Size,
): LayoutBox {
  const children: PositionedChild[] = [];
  const flushText = (segment: PlacedUnit[], lineY: number) => {
    const first = segment[0];
    if (!first) return;
    const fragment = buildFragment(segment, first.x, point(0, metrics.ascent));
    if (!fragment) return;
    const textBox: LayoutBox = Object.freeze({
      element: owner,
      attributes: attrs,
      size: size(fragment.width, metrics.lineHeight),
      margin: ZERO_SIDES,
      content: Object.freeze({ kind: "text", run: textRun(owner, attrs, [fragment]) }),
    });
    children.push(Object.freeze({ position: point(first.x, lineY), box: textBox }));
  };

  for (const line of lines) {
    let segment: PlacedUnit[] = [];
    for (const placed of line.units) {
      if (isWord(placed)) {
        segment.push(placed);
        continue;
      }
      flushText(segment, line.y);
      segment = [];
      if (placed.unit.kind === "box") {
        const box = placed.unit.box;
        children.push(
          Object.freeze({ position: point(placed.x + box.margin.left, line.y + box.margin.top), box }),
        );
      }
    }
    flushText(segment, line.y);
  }

  return Object.freeze({
    element: owner,
    attributes: attrs,
    size: extent,
    margin: ZERO_SIDES,
    content: Object.freeze({ kind: "children", children: Object.freeze(children) }),
  });
}

/**
 * Lay out `children` as inline content owned by `owner`. Used for inline
 * elements and for raw text sitting directly inside a block. Not retained.
 */
export function layoutInlineContent(
  ctx: LayoutContext,
  owner: Element,
  attrs: ResolvedAttributes,
  children: readonly ElementChild[],
  available: Size,
): LayoutBox {
  const units = collectUnits(ctx, attrs, children, available);
  const metrics = ctx.fonts.lineMetrics(attrs.textSize);
  const lines = packLines(units, available.w, metrics.lineHeight);

  let w = 0;
  let h = 0;
  for (const line of lines) {
    if (line.width > w) w = line.width;
    h += line.height;
  }
  const extent = size(w, h);

  const hasBoxes = units.some((u) => u.kind === "box");
  return hasBoxes
    ? mixedBox(owner, attrs, lines, metrics, extent)
    : textOnlyBox(owner, attrs, lines, metrics, extent);
}

export function layoutInline(
  ctx: LayoutContext,
  element: Element,
  attrs: ResolvedAttributes,
  available: Size,
): LayoutBox {
  return ctx.retain(element, layoutInlineContent(ctx, element, attrs, element.children, available));
}
