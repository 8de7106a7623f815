/**
 * packages/core/src/style/selectors.ts — Sub-rule selector predicates.
 *
 * Why: Sub-rules choose elements by structure. Common selector kinds are data
 * (tag, attribute, ancestry, combinators) so they can be inspected and
 * described; `predicate` is the escape hatch for arbitrary checks.
 *
 * Matching never mutates the element and only sees an ElementView.
 */

import type { ElementView } from "../dom/types.js";

export type Selector =
  | Readonly<{ kind: "any" }>
  | Readonly<{ kind: "tag"; tag: string }>
  | Readonly<{ kind: "attribute"; name: string; value?: string }>
  | Readonly<{ kind: "nth"; index: number }>
  | Readonly<{ kind: "parent"; selector: Selector }>
  | Readonly<{ kind: "ancestor"; selector: Selector }>
  | Readonly<{ kind: "not"; selector: Selector }>
  | Readonly<{ kind: "all"; selectors: readonly Selector[] }>
  | Readonly<{ kind: "some"; selectors: readonly Selector[] }>
  | Readonly<{ kind: "predicate"; label: string; test: (view: ElementView) => boolean }>;

export function matchSelector(selector: Selector, view: ElementView): boolean {
  switch (selector.kind) {
    case "any":
      return true;
    case "tag":
      return view.tag === selector.tag;
    case "attribute": {
      const value = view.getAttribute(selector.name);
      if (value === undefined) return false;
      return selector.value === undefined || value === selector.value;
    }
    case "nth":
      return view.elementIndex === selector.index;
    case "parent":
      return view.parent !== null && matchSelector(selector.selector, view.parent);
    case "ancestor": {
      let cursor = view.parent;
      while (cursor !== null) {
        if (matchSelector(selector.selector, cursor)) return true;
        cursor = cursor.parent;
      }
      return false;
    }
    case "not":
      return !matchSelector(selector.selector, view);
    case "all":
      return selector.selectors.every((s) => matchSelector(s, view));
    case "some":
      return selector.selectors.some((s) => matchSelector(s, view));
    case "predicate":
      return selector.test(view) === true;
  }
}

/** Short human-readable form for diagnostics, e.g. `tag(button) & [data-on]`. */
export function describeSelector(selector: Selector): string {
  switch (selector.kind) {
    case "any":
      return "*";
    case "tag":
      return `tag(${selector.tag})`;
    case "attribute":
      return selector.value === undefined
        ? `[${selector.name}]`
        : `[${selector.name}=${JSON.stringify(selector.value)}]`;
    case "nth":
      return `nth(${String(selector.index)})`;
    case "parent":
      return `parent(${describeSelector(selector.selector)})`;
    case "ancestor":
      return `ancestor(${describeSelector(selector.selector)})`;
    case "not":
      return `not(${describeSelector(selector.selector)})`;
    case "all":
      return selector.selectors.map(describeSelector).join(" & ");
    case "some":
      return selector.selectors.map(describeSelector).join(" | ");
    case "predicate":
      return `where(${selector.label})`;
  }
}

/** Selector constructors. */
export const sel = Object.freeze({
  any(): Selector {
    return Object.freeze({ kind: "any" });
  },
  tag(tag: string): Selector {
    return Object.freeze({ kind: "tag", tag });
  },
  attr(name: string, value?: string): Selector {
    return value === undefined
      ? Object.freeze({ kind: "attribute", name })
      : Object.freeze({ kind: "attribute", name, value });
  },
  nth(index: number): Selector {
    return Object.freeze({ kind: "nth", index });
  },
  first(): Selector {
    return Object.freeze({ kind: "nth", index: 0 });
  },
  parent(selector: Selector): Selector {
    return Object.freeze({ kind: "parent", selector });
  },
  ancestor(selector: Selector): Selector {
    return Object.freeze({ kind: "ancestor", selector });
  },
  not(selector: Selector): Selector {
    return Object.freeze({ kind: "not", selector });
  },
  all(...selectors: Selector[]): Selector {
    return Object.freeze({ kind: "all", selectors: Object.freeze(selectors) });
  },
  some(...selectors: Selector[]): Selector {
    return Object.freeze({ kind: "some", selectors: Object.freeze(selectors) });
  },
  where(label: string, test: (view: ElementView) => boolean): Selector {
    return Object.freeze({ kind: "predicate", label, test });
  },
});
