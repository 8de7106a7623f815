/**
 * packages/core/src/style/color.ts — RGBA color values.
 */

/** Straight (non-premultiplied) RGBA. Channels 0..255, alpha 0..1. */
export type Color = Readonly<{ r: number; g: number; b: number; a: number }>;

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

function clampAlpha(value: number): number {
  if (!Number.isFinite(value)) return 1;
  return Math.min(1, Math.max(0, value));
}

export function rgba(r: number, g: number, b: number, a = 1): Color {
  return Object.freeze({ r: clampChannel(r), g: clampChannel(g), b: clampChannel(b), a: clampAlpha(a) });
}

export const BLACK: Color = rgba(0, 0, 0, 1);
export const WHITE: Color = rgba(255, 255, 255, 1);
export const TRANSPARENT: Color = rgba(0, 0, 0, 0);

export function colorsEqual(x: Color, y: Color): boolean {
  return x === y || (x.r === y.r && x.g === y.g && x.b === y.b && x.a === y.a);
}

export function isColor(value: unknown): value is Color {
  if (typeof value !== "object" || value === null) return false;
  return (
    "r" in value &&
    typeof value.r === "number" &&
    "g" in value &&
    typeof value.g === "number" &&
    "b" in value &&
    typeof value.b === "number" &&
    "a" in value &&
    typeof value.a === "number"
  );
}

/** `#rrggbb` or `#rrggbbaa` (alpha as a byte). */
export function formatColor(c: Color): string {
  const hex = (n: number) => n.toString(16).padStart(2, "0");
  const base = `#${hex(c.r)}${hex(c.g)}${hex(c.b)}`;
  return c.a >= 1 ? base : `${base}${hex(Math.round(c.a * 255))}`;
}
