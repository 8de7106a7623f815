/**
 * packages/core/src/style/types.ts — Resolved attribute types.
 *
 * Why: ResolvedAttributes is the contract between the cascade and layout.
 * The cascade writes one frozen value per element per run; layout only reads.
 */

import type { SideOffsets } from "../layout/geometry.js";
import { ZERO_SIDES } from "../layout/geometry.js";
import { BLACK, type Color, TRANSPARENT } from "./color.js";

/** Axis along which a block stacks its children. */
export type Direction = "vertical" | "horizontal";

export type BlockValues = Readonly<{
  kind: "block";
  direction: Direction;
  margin: SideOffsets;
  padding: SideOffsets;
  width?: number;
  height?: number;
  minWidth?: number;
  minHeight?: number;
  maxWidth?: number;
  maxHeight?: number;
}>;

export type InlineValues = Readonly<{ kind: "inline" }>;

export type DisplayType = BlockValues | InlineValues;

export type ResolvedAttributes = Readonly<{
  display: DisplayType;
  textSize: number;
  textColor: Color;
  backgroundColor: Color;
  borderRadius: number;
  borderThickness: SideOffsets;
  borderColor: Color;
}>;

export const DEFAULT_TEXT_SIZE = 16;

export const DEFAULT_BLOCK_VALUES: BlockValues = Object.freeze({
  kind: "block",
  direction: "vertical",
  margin: ZERO_SIDES,
  padding: ZERO_SIDES,
});

export const INLINE_VALUES: InlineValues = Object.freeze({ kind: "inline" });

export const DEFAULT_RESOLVED_ATTRIBUTES: ResolvedAttributes = Object.freeze({
  display: DEFAULT_BLOCK_VALUES,
  textSize: DEFAULT_TEXT_SIZE,
  textColor: BLACK,
  backgroundColor: TRANSPARENT,
  borderRadius: 0,
  borderThickness: ZERO_SIDES,
  borderColor: TRANSPARENT,
});
