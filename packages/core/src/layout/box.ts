/**
 * packages/core/src/layout/box.ts — Layout output tree.
 *
 * Why: The box tree is what a renderer walks. Every box is frozen once built.
 * Boxes are compared by value (boxEquals) so a previous frame's subtree can
 * be handed out again when recomputation produced the same thing.
 *
 * Positions are relative to the parent box's origin. A text fragment's
 * `origin` is the start of its baseline inside the box; glyph offsets are
 * relative to that origin.
 */

import type { Element } from "../dom/types.js";
import { type Color, colorsEqual } from "../style/color.js";
import type { ResolvedAttributes } from "../style/types.js";
import type { FontRef } from "./fonts/types.js";
import {
  type Point,
  type SideOffsets,
  type Size,
  pointsEqual,
  sidesEqual,
  sizesEqual,
} from "./geometry.js";

export type Glyph = Readonly<{ index: number; offset: Point }>;

export type TextFragment = Readonly<{
  font: FontRef;
  origin: Point;
  width: number;
  glyphs: readonly Glyph[];
}>;

export type TextRun = Readonly<{
  fragments: readonly TextFragment[];
  textSize: number;
  textColor: Color;
  /** Element whose text content produced the run. */
  owner: Element;
}>;

export type PositionedChild = Readonly<{ position: Point; box: LayoutBox }>;

export type BoxContent =
  | Readonly<{ kind: "children"; children: readonly PositionedChild[] }>
  | Readonly<{ kind: "text"; run: TextRun }>;

export type LayoutBox = Readonly<{
  /** Element that produced the box. Text line boxes point at the owning element. */
  element: Element;
  /** Attributes the box was laid out with; renderers paint from these. */
  attributes: ResolvedAttributes;
  size: Size;
  margin: SideOffsets;
  content: BoxContent;
}>;

/** Outer extent (size plus margins). */
export function outerWidth(box: LayoutBox): number {
  return box.size.w + box.margin.left + box.margin.right;
}

export function outerHeight(box: LayoutBox): number {
  return box.size.h + box.margin.top + box.margin.bottom;
}

export function attributesEqual(a: ResolvedAttributes, b: ResolvedAttributes): boolean {
  if (a === b) return true;
  if (
    a.textSize !== b.textSize ||
    a.borderRadius !== b.borderRadius ||
    !colorsEqual(a.textColor, b.textColor) ||
    !colorsEqual(a.backgroundColor, b.backgroundColor) ||
    !colorsEqual(a.borderColor, b.borderColor) ||
    !sidesEqual(a.borderThickness, b.borderThickness)
  ) {
    return false;
  }
  const da = a.display;
  const db = b.display;
  if (da.kind === "inline" || db.kind === "inline") return da.kind === db.kind;
  return (
    da.direction === db.direction &&
    sidesEqual(da.margin, db.margin) &&
    sidesEqual(da.padding, db.padding) &&
    da.width === db.width &&
    da.height === db.height &&
    da.minWidth === db.minWidth &&
    da.minHeight === db.minHeight &&
    da.maxWidth === db.maxWidth &&
    da.maxHeight === db.maxHeight
  );
}

function fragmentsEqual(a: TextFragment, b: TextFragment): boolean {
  if (a === b) return true;
  if (a.font.id !== b.font.id || a.width !== b.width || !pointsEqual(a.origin, b.origin)) {
    return false;
  }
  if (a.glyphs.length !== b.glyphs.length) return false;
  for (let i = 0; i < a.glyphs.length; i++) {
    const ga = a.glyphs[i];
    const gb = b.glyphs[i];
    if (!ga || !gb || ga.index !== gb.index || !pointsEqual(ga.offset, gb.offset)) return false;
  }
  return true;
}

function textRunsEqual(a: TextRun, b: TextRun): boolean {
  if (a === b) return true;
  if (
    a.owner !== b.owner ||
    a.textSize !== b.textSize ||
    !colorsEqual(a.textColor, b.textColor) ||
    a.fragments.length !== b.fragments.length
  ) {
    return false;
  }
  for (let i = 0; i < a.fragments.length; i++) {
    const fa = a.fragments[i];
    const fb = b.fragments[i];
    if (!fa || !fb || !fragmentsEqual(fa, fb)) return false;
  }
  return true;
}

/**
 * Structural equality. Identical child objects short-circuit, so comparing a
 * tree whose subtrees were already reused costs one level per reused child.
 */
export function boxEquals(a: LayoutBox, b: LayoutBox): boolean {
  if (a === b) return true;
  if (
    a.element !== b.element ||
    !sizesEqual(a.size, b.size) ||
    !sidesEqual(a.margin, b.margin) ||
    !attributesEqual(a.attributes, b.attributes)
  ) {
    return false;
  }
  const ca = a.content;
  const cb = b.content;
  if (ca.kind === "text" || cb.kind === "text") {
    return ca.kind === "text" && cb.kind === "text" && textRunsEqual(ca.run, cb.run);
  }
  if (ca.children.length !== cb.children.length) return false;
  for (let i = 0; i < ca.children.length; i++) {
    const pa = ca.children[i];
    const pb = cb.children[i];
    if (!pa || !pb || !pointsEqual(pa.position, pb.position) || !boxEquals(pa.box, pb.box)) {
      return false;
    }
  }
  return true;
}
