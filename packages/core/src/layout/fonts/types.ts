/**
 * packages/core/src/layout/fonts/types.ts — Font service contract.
 *
 * Layout never parses font files itself. It asks a FontService to shape runs
 * of text and to report line metrics, both already scaled to the requested
 * text size.
 */

/** Opaque handle to one loaded font face. Compared by `id`. */
export type FontRef = Readonly<{ id: string; family: string; unitsPerEm: number }>;

export type ShapedGlyph = Readonly<{
  /** Glyph index inside the font. */
  index: number;
  /** UTF-16 offset of the source character in the shaped string. */
  cluster: number;
  /** Horizontal advance, scaled to the text size. */
  advance: number;
}>;

export type ShapedText = Readonly<{
  font: FontRef;
  glyphs: readonly ShapedGlyph[];
  /** Sum of advances. */
  width: number;
}>;

export type LineMetrics = Readonly<{
  ascent: number;
  /** Positive distance below the baseline. */
  descent: number;
  lineGap: number;
  /** ascent + descent + lineGap */
  lineHeight: number;
}>;

export interface FontService {
  shape(text: string, textSize: number): ShapedText;
  lineMetrics(textSize: number): LineMetrics;
}
