/**
 * packages/core/src/index.ts — Public API.
 *
 * Per-frame pipeline:
 *   resolveStyles(root);                       // cascade
 *   const box = engine.layout(root, size);     // layout
 */

export { TesseraError, type TesseraErrorCode, isTesseraError } from "./errors.js";

// Element tree
export type { Element, ElementChild, ElementView, TextContent } from "./dom/types.js";
export { isTextContent } from "./dom/types.js";
export { type ChildInput, type ElementProps, ElementNode, type NodeChild, h, text } from "./dom/element.js";

// Style
export { BLACK, type Color, TRANSPARENT, WHITE, colorsEqual, formatColor, rgba } from "./style/color.js";
export type { EdgeValue, LengthOrAuto, StyleAttributes } from "./style/attributes.js";
export { type Selector, describeSelector, matchSelector, sel } from "./style/selectors.js";
export { type StyleRule, type StyleRuleDefinition, type SubRule, defineStyleRule } from "./style/rule.js";
export {
  type BlockValues,
  DEFAULT_RESOLVED_ATTRIBUTES,
  DEFAULT_TEXT_SIZE,
  type Direction,
  type DisplayType,
  type InlineValues,
  type ResolvedAttributes,
} from "./style/types.js";
export { type CascadeOptions, resolveElement, resolveStyles } from "./style/cascade.js";

// Layout
export {
  type Point,
  type Rect,
  type SideOffsets,
  type Size,
  ZERO_SIDES,
  point,
  sides,
  size,
} from "./layout/geometry.js";
export {
  type BoxContent,
  type Glyph,
  type LayoutBox,
  type PositionedChild,
  type TextFragment,
  type TextRun,
  attributesEqual,
  boxEquals,
  outerHeight,
  outerWidth,
} from "./layout/box.js";
export type { FontRef, FontService, LineMetrics, ShapedGlyph, ShapedText } from "./layout/fonts/types.js";
export {
  MetricFontCollection,
  type MetricFontData,
  parseMetricFontAsset,
  parseMetricFontData,
} from "./layout/fonts/metricFont.js";
export { getDefaultFontCollection, loadFontCollection } from "./layout/fonts/defaultFont.js";
export type { LayoutEngineConfig } from "./layout/config.js";
export { type LayoutEngine, type LayoutStats, createLayoutEngine, layout } from "./layout/engine.js";
export { type BoxVisit, collectBoxes, describeBoxTree, hitTest, walkBoxes } from "./layout/walk.js";

// Diagnostics
export type { WarnFn } from "./debug/warnings.js";
export { type PerfPhase, type PerfSnapshot, perfReset, perfSnapshot } from "./perf/perf.js";
