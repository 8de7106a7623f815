/**
 * packages/core/src/layout/context.ts — Per-pass layout context.
 *
 * Everything a layout algorithm needs is passed explicitly through this
 * record: the font service, dev warnings, recursive dispatch and retention.
 */

import type { DevWarnings } from "../debug/warnings.js";
import type { Element } from "../dom/types.js";
import { TesseraError } from "../errors.js";
import type { ResolvedAttributes } from "../style/types.js";
import type { LayoutBox } from "./box.js";
import type { FontService } from "./fonts/types.js";
import type { SideOffsets, Size } from "./geometry.js";
import { ZERO_SIDES } from "./geometry.js";

export type LayoutContext = Readonly<{
  fonts: FontService;
  warnings: DevWarnings;
  /** Dispatch on the element's own resolved display kind. */
  layoutElement(element: Element, available: Size): LayoutBox;
  /** Return the previous frame's box for `element` when equal to `box`, else `box`. */
  retain(element: Element, box: LayoutBox): LayoutBox;
}>;

export function requireResolved(element: Element): ResolvedAttributes {
  const resolved = element.resolved;
  if (resolved === undefined) {
    throw new TesseraError(
      "TESSERA_UNRESOLVED_ATTRIBUTES",
      `layout: <${element.tag}> has no resolved attributes. Run resolveStyles() on the tree before layout().`,
    );
  }
  return resolved;
}

/** Margin the element's box will carry. Inline boxes have none. */
export function marginOf(attrs: ResolvedAttributes): SideOffsets {
  return attrs.display.kind === "block" ? attrs.display.margin : ZERO_SIDES;
}
