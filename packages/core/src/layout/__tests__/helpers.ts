import type { ElementNode } from "../../dom/element.js";
import { resolveStyles } from "../../style/cascade.js";
import { createFixedFont } from "../../testing/fixedFont.js";
import type { LayoutBox, PositionedChild, TextRun } from "../box.js";
import { layout } from "../engine.js";
import { size } from "../geometry.js";

/** Cascade then lay out with the monospace test font (5 units per char at size 10). */
export function cascadeAndLayout(root: ElementNode, w: number, h: number): LayoutBox {
  resolveStyles(root);
  return layout(root, size(w, h), createFixedFont());
}

export function childrenOf(box: LayoutBox): readonly PositionedChild[] {
  if (box.content.kind !== "children") throw new Error(`expected children content on <${box.element.tag}>`);
  return box.content.children;
}

export function childAt(box: LayoutBox, index: number): PositionedChild {
  const child = childrenOf(box)[index];
  if (!child) throw new Error(`<${box.element.tag}> has no child ${String(index)}`);
  return child;
}

export function runOf(box: LayoutBox): TextRun {
  if (box.content.kind !== "text") throw new Error(`expected text content on <${box.element.tag}>`);
  return box.content.run;
}

export function glyphXs(run: TextRun, fragment: number): number[] {
  const frag = run.fragments[fragment];
  if (!frag) throw new Error(`no fragment ${String(fragment)}`);
  return frag.glyphs.map((g) => g.offset.x);
}
