/**
 * packages/core/src/layout/walk.ts — Box tree traversal for renderers and tools.
 *
 * Boxes store positions relative to their parent. These helpers accumulate
 * absolute origins the same way a renderer does.
 *
 * Hit-test tie-break: when several boxes contain the point, the LAST box in
 * depth-first pre-order wins (deepest, then later siblings).
 */

import { formatColor } from "../style/color.js";
import type { LayoutBox } from "./box.js";
import { type Point, type Rect, ZERO_POINT, contains } from "./geometry.js";

export type BoxVisit = Readonly<{
  box: LayoutBox;
  /** Absolute border-box rectangle. */
  rect: Rect;
  depth: number;
}>;

/** Depth-first pre-order traversal. Return false from `visit` to skip a subtree. */
export function walkBoxes(
  root: LayoutBox,
  visit: (entry: BoxVisit) => boolean | void,
  origin: Point = ZERO_POINT,
): void {
  const stack: BoxVisit[] = [
    { box: root, rect: { x: origin.x, y: origin.y, w: root.size.w, h: root.size.h }, depth: 0 },
  ];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) continue;
    if (visit(entry) === false) continue;
    const content = entry.box.content;
    if (content.kind !== "children") continue;
    for (let i = content.children.length - 1; i >= 0; i--) {
      const child = content.children[i];
      if (!child) continue;
      stack.push({
        box: child.box,
        rect: {
          x: entry.rect.x + child.position.x,
          y: entry.rect.y + child.position.y,
          w: child.box.size.w,
          h: child.box.size.h,
        },
        depth: entry.depth + 1,
      });
    }
  }
}

export function collectBoxes(root: LayoutBox): readonly BoxVisit[] {
  const out: BoxVisit[] = [];
  walkBoxes(root, (entry) => {
    out.push(entry);
  });
  return Object.freeze(out);
}

/** Box under (x, y), or null. */
export function hitTest(root: LayoutBox, x: number, y: number): BoxVisit | null {
  let hit: BoxVisit | null = null;
  walkBoxes(root, (entry) => {
    if (contains(entry.rect, x, y)) hit = entry;
  });
  return hit;
}

function describeEntry(entry: BoxVisit): string {
  const { box, rect } = entry;
  const display = box.attributes.display.kind;
  const head = `${display} <${box.element.tag}> ${String(box.size.w)}x${String(box.size.h)} @${String(rect.x)},${String(rect.y)}`;
  if (box.content.kind === "text") {
    const run = box.content.run;
    return `${head} text[${String(run.fragments.length)} lines, ${formatColor(run.textColor)}]`;
  }
  return head;
}

/** Indented one-line-per-box dump. */
export function describeBoxTree(root: LayoutBox): string {
  const lines: string[] = [];
  walkBoxes(root, (entry) => {
    lines.push(`${"  ".repeat(entry.depth)}${describeEntry(entry)}`);
  });
  return lines.join("\n");
}
