/**
 * packages/core/src/dom/types.ts — Element tree contract.
 *
 * Why: The element tree is owned by the embedder. Cascade and layout only need
 * ordered children, an optional style rule, attribute lookup for selectors and
 * a slot to publish resolved attributes into.
 */

import type { StyleRule } from "../style/rule.js";
import type { ResolvedAttributes } from "../style/types.js";

/** Raw text content. Receives no attributes of its own. */
export type TextContent = Readonly<{ kind: "text"; text: string }>;

/** Read-only view handed to selector predicates. */
export interface ElementView {
  readonly tag: string;
  readonly parent: ElementView | null;
  getAttribute(name: string): string | undefined;
  /** Position among the parent's element children, 0-based; 0 for the root. */
  readonly elementIndex: number;
}

export interface Element extends ElementView {
  readonly kind: "element";
  readonly parent: Element | null;
  readonly children: readonly ElementChild[];
  readonly style: StyleRule | undefined;
  /** Written by the cascade, read by layout. */
  resolved: ResolvedAttributes | undefined;
}

export type ElementChild = Element | TextContent;

export function isTextContent(child: ElementChild): child is TextContent {
  return child.kind === "text";
}
