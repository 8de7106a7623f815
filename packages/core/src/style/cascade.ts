/**
 * packages/core/src/style/cascade.ts — Cascade resolver.
 *
 * Why: Computes every element's ResolvedAttributes from inheritance, its base
 * rule and conditionally matched sub-rules, and publishes the result onto the
 * element for layout to read.
 *
 * Rules:
 *   - Root starts from defaults; every other element starts from fresh
 *     defaults and inherits only textSize and textColor from its parent.
 *   - Base attribute set first, then matching sub-rules in declaration order.
 *     Later sources override earlier ones per property.
 *   - Text content is not visited and receives no attributes.
 *
 * Full top-down recompute on every call; no caching.
 */

import {
  type DevWarnings,
  SILENT_WARNINGS,
  type WarningOptions,
  createDevWarnings,
} from "../debug/warnings.js";
import type { Element } from "../dom/types.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import {
  type AttributeDraft,
  type StyleAttributes,
  applyAttributes,
  createDraft,
  freezeDraft,
} from "./attributes.js";
import { matchSelector } from "./selectors.js";
import { DEFAULT_RESOLVED_ATTRIBUTES, type ResolvedAttributes } from "./types.js";

export type CascadeOptions = WarningOptions;

type Frame = Readonly<{ element: Element; parent: ResolvedAttributes | null }>;

function applyAndReport(
  element: Element,
  ruleName: string,
  source: string,
  draft: AttributeDraft,
  attrs: StyleAttributes,
  warnings: DevWarnings,
): void {
  const skipped = applyAttributes(draft, attrs);
  if (skipped.length === 0) return;
  warnings.report(
    "cascade",
    `inlineBlockProps:${ruleName}:${source}`,
    `<${element.tag}> style "${ruleName}" (${source}) sets ${skipped.join(", ")} but the element displays inline; ignored.`,
  );
}

/** Resolve one element against its parent's published value. */
export function resolveElement(
  element: Element,
  parent: ResolvedAttributes | null,
  warnings: DevWarnings = SILENT_WARNINGS,
): ResolvedAttributes {
  const draft = createDraft(DEFAULT_RESOLVED_ATTRIBUTES);
  if (parent !== null) {
    draft.textSize = parent.textSize;
    draft.textColor = parent.textColor;
  }

  const rule = element.style;
  if (rule !== undefined) {
    applyAndReport(element, rule.name, "base", draft, rule.attributes, warnings);
    for (let i = 0; i < rule.subRules.length; i++) {
      const sub = rule.subRules[i];
      if (!sub || !matchSelector(sub.selector, element)) continue;
      applyAndReport(element, rule.name, `subRules[${i}]`, draft, sub.attributes, warnings);
    }
  }

  return freezeDraft(draft);
}

/**
 * Resolve and publish attributes for `root` and all element descendants,
 * depth-first pre-order.
 */
export function resolveStyles(root: Element, options: CascadeOptions = {}): void {
  const token = perfMarkStart();
  const warnings = createDevWarnings(options);

  const stack: Frame[] = [{ element: root, parent: null }];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;
    const resolved = resolveElement(frame.element, frame.parent, warnings);
    frame.element.resolved = resolved;

    const children = frame.element.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child === undefined || child.kind !== "element") continue;
      stack.push({ element: child, parent: resolved });
    }
  }

  perfMarkEnd("cascade", token);
}
