/**
 * packages/core/src/layout/block.ts — Block layout.
 *
 * Why: Stacks children along the block's direction with padding, margins and
 * explicit-or-auto sizing.
 *
 * Rules:
 *   - Explicit width/height are the box size (padding included) and are not
 *     clamped by min/max.
 *   - Auto sizes: sum of child outer extents on the main axis, max on the
 *     cross axis, plus padding; then clamped to [min, max] (min wins).
 *   - Each child starts where the previous child's trailing margin ends.
 *   - Children get the content box minus consumed main-axis space minus their
 *     own margins as available size, clamped at 0.
 *   - Raw text directly inside a block is laid out as anonymous inline
 *     content owned by the block.
 */

import type { Element, ElementChild, TextContent } from "../dom/types.js";
import type { BlockValues, ResolvedAttributes } from "../style/types.js";
import { type LayoutBox, type PositionedChild, outerHeight, outerWidth } from "./box.js";
import { type LayoutContext, marginOf, requireResolved } from "./context.js";
import { type Size, clampNonNegative, horizontal, point, size, vertical } from "./geometry.js";
import { layoutInlineContent } from "./inline.js";

type ChildGroup =
  | Readonly<{ kind: "element"; element: Element }>
  | Readonly<{ kind: "text"; texts: readonly TextContent[] }>;

/** Merge adjacent text children into one anonymous run. */
function groupChildren(children: readonly ElementChild[]): ChildGroup[] {
  const groups: ChildGroup[] = [];
  let texts: TextContent[] = [];
  for (const child of children) {
    if (child.kind === "text") {
      texts.push(child);
      continue;
    }
    if (texts.length > 0) {
      groups.push({ kind: "text", texts });
      texts = [];
    }
    groups.push({ kind: "element", element: child });
  }
  if (texts.length > 0) groups.push({ kind: "text", texts });
  return groups;
}

export function clampToRange(value: number, min: number | undefined, max: number | undefined): number {
  let out = value;
  if (max !== undefined && out > max) out = max;
  if (min !== undefined && out < min) out = min;
  return out;
}

function warnConflictingRange(ctx: LayoutContext, element: Element, block: BlockValues): void {
  if (!ctx.warnings.enabled) return;
  if (block.minWidth !== undefined && block.maxWidth !== undefined && block.minWidth > block.maxWidth) {
    ctx.warnings.report(
      "layout",
      `minMaxWidth:${element.tag}:${block.minWidth}:${block.maxWidth}`,
      `<${element.tag}> minWidth=${String(block.minWidth)} exceeds maxWidth=${String(block.maxWidth)}; minWidth wins.`,
    );
  }
  if (block.minHeight !== undefined && block.maxHeight !== undefined && block.minHeight > block.maxHeight) {
    ctx.warnings.report(
      "layout",
      `minMaxHeight:${element.tag}:${block.minHeight}:${block.maxHeight}`,
      `<${element.tag}> minHeight=${String(block.minHeight)} exceeds maxHeight=${String(block.maxHeight)}; minHeight wins.`,
    );
  }
}

export function layoutBlock(
  ctx: LayoutContext,
  element: Element,
  attrs: ResolvedAttributes,
  block: BlockValues,
  available: Size,
): LayoutBox {
  warnConflictingRange(ctx, element, block);

  const pad = block.padding;
  const isVertical = block.direction === "vertical";
  const innerW = clampNonNegative((block.width ?? available.w) - horizontal(pad));
  const innerH = clampNonNegative((block.height ?? available.h) - vertical(pad));

  const children: PositionedChild[] = [];
  // Space consumed along the main axis, from the content edge.
  let consumed = 0;
  let crossExtent = 0;

  for (const group of groupChildren(element.children)) {
    let box: LayoutBox;
    if (group.kind === "text") {
      const avail = isVertical
        ? size(innerW, clampNonNegative(innerH - consumed))
        : size(clampNonNegative(innerW - consumed), innerH);
      box = layoutInlineContent(ctx, element, attrs, group.texts, avail);
    } else {
      const margin = marginOf(requireResolved(group.element));
      const avail = isVertical
        ? size(
            clampNonNegative(innerW - horizontal(margin)),
            clampNonNegative(innerH - consumed - vertical(margin)),
          )
        : size(
            clampNonNegative(innerW - consumed - horizontal(margin)),
            clampNonNegative(innerH - vertical(margin)),
          );
      box = ctx.layoutElement(group.element, avail);
    }

    const m = box.margin;
    if (isVertical) {
      children.push(Object.freeze({ position: point(pad.left + m.left, pad.top + consumed + m.top), box }));
      consumed += outerHeight(box);
      crossExtent = Math.max(crossExtent, outerWidth(box));
    } else {
      children.push(Object.freeze({ position: point(pad.left + consumed + m.left, pad.top + m.top), box }));
      consumed += outerWidth(box);
      crossExtent = Math.max(crossExtent, outerHeight(box));
    }
  }

  const contentW = isVertical ? crossExtent : consumed;
  const contentH = isVertical ? consumed : crossExtent;
  const w = block.width ?? clampToRange(contentW + horizontal(pad), block.minWidth, block.maxWidth);
  const h = block.height ?? clampToRange(contentH + vertical(pad), block.minHeight, block.maxHeight);

  if (ctx.warnings.enabled && children.length > 0 && (w <= 0 || h <= 0)) {
    ctx.warnings.report(
      "layout",
      `zeroBlock:${element.tag}:${w}x${h}`,
      `<${element.tag}> resolved to ${String(w)}x${String(h)} with ${String(children.length)} children and may be invisible.`,
    );
  }

  return ctx.retain(
    element,
    Object.freeze({
      element,
      attributes: attrs,
      size: size(w, h),
      margin: block.margin,
      content: Object.freeze({ kind: "children", children: Object.freeze(children) }),
    }),
  );
}
