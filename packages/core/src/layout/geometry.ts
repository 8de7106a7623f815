/**
 * packages/core/src/layout/geometry.ts — Geometry primitives.
 *
 * All lengths are abstract, resolution-independent units (not pixels).
 */

/** Point relative to some origin (usually the parent box). */
export type Point = Readonly<{ x: number; y: number }>;

/** Width and height. */
export type Size = Readonly<{ w: number; h: number }>;

/** Four independent edge offsets. */
export type SideOffsets = Readonly<{ top: number; right: number; bottom: number; left: number }>;

/** Axis-aligned rectangle. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

export const ZERO_POINT: Point = Object.freeze({ x: 0, y: 0 });
export const ZERO_SIDES: SideOffsets = Object.freeze({ top: 0, right: 0, bottom: 0, left: 0 });

/**
 * Build edge offsets CSS-shorthand style:
 *   sides(4)           all edges
 *   sides(4, 8)        vertical, horizontal
 *   sides(1, 2, 3, 4)  top, right, bottom, left
 */
export function sides(all: number): SideOffsets;
export function sides(vertical: number, horizontal: number): SideOffsets;
export function sides(top: number, right: number, bottom: number, left: number): SideOffsets;
export function sides(a: number, b?: number, c?: number, d?: number): SideOffsets {
  if (b === undefined) return Object.freeze({ top: a, right: a, bottom: a, left: a });
  if (c === undefined || d === undefined) {
    return Object.freeze({ top: a, right: b, bottom: a, left: b });
  }
  return Object.freeze({ top: a, right: b, bottom: c, left: d });
}

export function point(x: number, y: number): Point {
  return Object.freeze({ x, y });
}

export function size(w: number, h: number): Size {
  return Object.freeze({ w, h });
}

export function horizontal(offsets: SideOffsets): number {
  return offsets.left + offsets.right;
}

export function vertical(offsets: SideOffsets): number {
  return offsets.top + offsets.bottom;
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a === b || (a.x === b.x && a.y === b.y);
}

export function sizesEqual(a: Size, b: Size): boolean {
  return a === b || (a.w === b.w && a.h === b.h);
}

export function sidesEqual(a: SideOffsets, b: SideOffsets): boolean {
  return (
    a === b || (a.top === b.top && a.right === b.right && a.bottom === b.bottom && a.left === b.left)
  );
}

/** Check if point is inside rect (exclusive of right/bottom edges). */
export function contains(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.w && y >= rect.y && y < rect.y + rect.h;
}

/** Clamp to a finite, non-negative length. NaN and negatives become 0; +Infinity is kept. */
export function clampNonNegative(value: number): number {
  if (Number.isNaN(value) || value <= 0) return 0;
  return value;
}
