/**
 * packages/core/src/style/attributes.ts — Attribute sets and their application.
 *
 * Why: Rules and sub-rules carry partial attribute sets. Applying a set
 * overwrites exactly the properties present in it, one field at a time, so a
 * later set only overrides what it names.
 *
 * Application order inside one set:
 *   1. display (inline -> block starts from default block values)
 *   2. block-only properties, when the working display is block
 *   3. the remaining visual properties
 */

import type { SideOffsets } from "../layout/geometry.js";
import { sides } from "../layout/geometry.js";
import type { Color } from "./color.js";
import {
  type BlockValues,
  DEFAULT_BLOCK_VALUES,
  type Direction,
  INLINE_VALUES,
  type ResolvedAttributes,
} from "./types.js";

/** Length that can be reset to "auto" (unset). */
export type LengthOrAuto = number | "auto";

/** Uniform length or explicit edges. */
export type EdgeValue = number | SideOffsets;

export type StyleAttributes = Readonly<{
  display?: "block" | "inline";
  direction?: Direction;
  margin?: EdgeValue;
  padding?: EdgeValue;
  width?: LengthOrAuto;
  height?: LengthOrAuto;
  minWidth?: LengthOrAuto;
  minHeight?: LengthOrAuto;
  maxWidth?: LengthOrAuto;
  maxHeight?: LengthOrAuto;
  textSize?: number;
  textColor?: Color;
  backgroundColor?: Color;
  borderRadius?: number;
  borderThickness?: EdgeValue;
  borderColor?: Color;
}>;

export type SizeProperty = "width" | "height" | "minWidth" | "minHeight" | "maxWidth" | "maxHeight";

export const SIZE_PROPERTIES: readonly SizeProperty[] = Object.freeze([
  "width",
  "height",
  "minWidth",
  "minHeight",
  "maxWidth",
  "maxHeight",
]);

export const BLOCK_ONLY_PROPERTIES: readonly (keyof StyleAttributes)[] = Object.freeze([
  "direction",
  "margin",
  "padding",
  ...SIZE_PROPERTIES,
]);

/** Mutable working value used while one element is being resolved. */
export type AttributeDraft = { -readonly [K in keyof ResolvedAttributes]: ResolvedAttributes[K] };

type BlockDraft = { -readonly [K in keyof BlockValues]: BlockValues[K] };

export function toSideOffsets(value: EdgeValue): SideOffsets {
  return typeof value === "number" ? sides(value) : Object.freeze({ ...value });
}

export function createDraft(base: ResolvedAttributes): AttributeDraft {
  return { ...base };
}

export function freezeDraft(draft: AttributeDraft): ResolvedAttributes {
  return Object.freeze({ ...draft });
}

/** Names of block-only properties present in `attrs`. */
export function presentBlockProperties(attrs: StyleAttributes): readonly (keyof StyleAttributes)[] {
  return BLOCK_ONLY_PROPERTIES.filter((prop) => attrs[prop] !== undefined);
}

function applyBlockValues(block: BlockValues, attrs: StyleAttributes): BlockValues {
  const next: BlockDraft = { ...block };
  if (attrs.direction !== undefined) next.direction = attrs.direction;
  if (attrs.margin !== undefined) next.margin = toSideOffsets(attrs.margin);
  if (attrs.padding !== undefined) next.padding = toSideOffsets(attrs.padding);
  for (const prop of SIZE_PROPERTIES) {
    const value = attrs[prop];
    if (value === undefined) continue;
    if (value === "auto") {
      delete next[prop];
    } else {
      next[prop] = value;
    }
  }
  return Object.freeze(next);
}

/**
 * Apply one attribute set onto the working value.
 *
 * Returns the block-only properties that were skipped because the working
 * display is inline (empty when nothing was skipped).
 */
export function applyAttributes(
  draft: AttributeDraft,
  attrs: StyleAttributes,
): readonly (keyof StyleAttributes)[] {
  if (attrs.display === "inline") {
    draft.display = INLINE_VALUES;
  } else if (attrs.display === "block" && draft.display.kind !== "block") {
    draft.display = DEFAULT_BLOCK_VALUES;
  }

  let skipped: readonly (keyof StyleAttributes)[] = [];
  const blockProps = presentBlockProperties(attrs);
  if (blockProps.length > 0) {
    if (draft.display.kind === "block") {
      draft.display = applyBlockValues(draft.display, attrs);
    } else {
      skipped = blockProps;
    }
  }

  if (attrs.textSize !== undefined) draft.textSize = attrs.textSize;
  if (attrs.textColor !== undefined) draft.textColor = attrs.textColor;
  if (attrs.backgroundColor !== undefined) draft.backgroundColor = attrs.backgroundColor;
  if (attrs.borderRadius !== undefined) draft.borderRadius = attrs.borderRadius;
  if (attrs.borderThickness !== undefined) {
    draft.borderThickness = toSideOffsets(attrs.borderThickness);
  }
  if (attrs.borderColor !== undefined) draft.borderColor = attrs.borderColor;

  return skipped;
}
