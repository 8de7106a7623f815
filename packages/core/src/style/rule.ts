/**
 * packages/core/src/style/rule.ts — Style rule definitions.
 *
 * Why: A StyleRule is defined once, frozen, and shared by every element that
 * references it. Identity is by reference: two rules with the same content
 * are still different rules.
 *
 * defineStyleRule validates every value up front and throws
 * TesseraError("TESSERA_INVALID_STYLE") with a path-specific message, so the
 * cascade itself never sees malformed input.
 */

import { TesseraError } from "../errors.js";
import { isColor } from "./color.js";
import {
  type EdgeValue,
  SIZE_PROPERTIES,
  type StyleAttributes,
  toSideOffsets,
} from "./attributes.js";
import type { Selector } from "./selectors.js";

export type SubRule = Readonly<{
  selector: Selector;
  attributes: StyleAttributes;
}>;

export type StyleRule = Readonly<{
  name: string;
  attributes: StyleAttributes;
  subRules: readonly SubRule[];
}>;

export type StyleRuleDefinition = Readonly<{
  name?: string;
  attributes?: StyleAttributes;
  subRules?: readonly SubRule[];
}>;

let anonymousRuleCount = 0;

const DISPLAY_KINDS: readonly string[] = Object.freeze(["block", "inline"]);
const DIRECTIONS: readonly string[] = Object.freeze(["vertical", "horizontal"]);

function invalidStyle(detail: string): never {
  throw new TesseraError("TESSERA_INVALID_STYLE", detail);
}

function requireLength(path: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    invalidStyle(`${path} must be a finite number >= 0 (got ${String(value)})`);
  }
  return value;
}

function validateEdges(path: string, value: EdgeValue): void {
  if (typeof value === "number") {
    requireLength(path, value);
    return;
  }
  requireLength(`${path}.top`, value.top);
  requireLength(`${path}.right`, value.right);
  requireLength(`${path}.bottom`, value.bottom);
  requireLength(`${path}.left`, value.left);
}

function validateSelector(path: string, selector: Selector): void {
  switch (selector.kind) {
    case "any":
      return;
    case "tag":
      if (selector.tag.length === 0) invalidStyle(`${path}: tag must be non-empty`);
      return;
    case "attribute":
      if (selector.name.length === 0) invalidStyle(`${path}: attribute name must be non-empty`);
      return;
    case "nth":
      if (!Number.isInteger(selector.index) || selector.index < 0) {
        invalidStyle(`${path}: nth index must be an integer >= 0`);
      }
      return;
    case "parent":
    case "ancestor":
    case "not":
      validateSelector(`${path}.${selector.kind}`, selector.selector);
      return;
    case "all":
    case "some":
      selector.selectors.forEach((s, i) => validateSelector(`${path}.${selector.kind}[${i}]`, s));
      return;
    case "predicate":
      if (typeof selector.test !== "function") invalidStyle(`${path}: predicate must be a function`);
      return;
  }
}

/** Validate and normalize one attribute set (edges become frozen SideOffsets). */
export function normalizeAttributes(path: string, attrs: StyleAttributes): StyleAttributes {
  const out: { -readonly [K in keyof StyleAttributes]: StyleAttributes[K] } = { ...attrs };

  if (attrs.display !== undefined && !DISPLAY_KINDS.includes(attrs.display)) {
    invalidStyle(`${path}.display must be "block" or "inline" (got ${String(attrs.display)})`);
  }
  if (attrs.direction !== undefined && !DIRECTIONS.includes(attrs.direction)) {
    invalidStyle(`${path}.direction must be "vertical" or "horizontal" (got ${String(attrs.direction)})`);
  }

  for (const prop of SIZE_PROPERTIES) {
    const value = attrs[prop];
    if (typeof value === "number") requireLength(`${path}.${prop}`, value);
  }
  if (attrs.textSize !== undefined) requireLength(`${path}.textSize`, attrs.textSize);
  if (attrs.borderRadius !== undefined) requireLength(`${path}.borderRadius`, attrs.borderRadius);

  if (attrs.margin !== undefined) {
    validateEdges(`${path}.margin`, attrs.margin);
    out.margin = toSideOffsets(attrs.margin);
  }
  if (attrs.padding !== undefined) {
    validateEdges(`${path}.padding`, attrs.padding);
    out.padding = toSideOffsets(attrs.padding);
  }
  if (attrs.borderThickness !== undefined) {
    validateEdges(`${path}.borderThickness`, attrs.borderThickness);
    out.borderThickness = toSideOffsets(attrs.borderThickness);
  }

  for (const prop of ["textColor", "backgroundColor", "borderColor"] as const) {
    const value = attrs[prop];
    if (value !== undefined && !isColor(value)) invalidStyle(`${path}.${prop} must be a Color`);
  }

  return Object.freeze(out);
}

/**
 * Define a style rule.
 *
 * @example
 * const button = defineStyleRule({
 *   name: "button",
 *   attributes: { padding: 4, backgroundColor: rgba(30, 30, 30) },
 *   subRules: [{ selector: sel.attr("data-pressed"), attributes: { backgroundColor: BLACK } }],
 * });
 */
export function defineStyleRule(def: StyleRuleDefinition): StyleRule {
  const name = def.name ?? `anonymous-${String(++anonymousRuleCount)}`;
  const attributes = normalizeAttributes(`${name}.attributes`, def.attributes ?? {});
  const subRules = (def.subRules ?? []).map((sub, i) => {
    const path = `${name}.subRules[${i}]`;
    validateSelector(`${path}.selector`, sub.selector);
    return Object.freeze({
      selector: sub.selector,
      attributes: normalizeAttributes(`${path}.attributes`, sub.attributes),
    });
  });
  return Object.freeze({ name, attributes, subRules: Object.freeze(subRules) });
}
