/**
 * packages/core/src/dom/element.ts — In-memory element tree.
 *
 * A minimal implementation of the Element contract for embedders without their
 * own tree, and for tests.
 */

import type { StyleRule } from "../style/rule.js";
import type { ResolvedAttributes } from "../style/types.js";
import type { Element, TextContent } from "./types.js";

export type NodeChild = ElementNode | TextContent;

/** Children accepted by builders; strings become text content. */
export type ChildInput = NodeChild | string;

export type ElementProps = Readonly<{
  style?: StyleRule;
  attributes?: Readonly<Record<string, string>>;
}>;

export function text(value: string): TextContent {
  return Object.freeze({ kind: "text", text: value });
}

function toChild(input: ChildInput): NodeChild {
  return typeof input === "string" ? text(input) : input;
}

export class ElementNode implements Element {
  readonly kind = "element" as const;
  readonly tag: string;
  style: StyleRule | undefined;
  resolved: ResolvedAttributes | undefined = undefined;

  private readonly attrs = new Map<string, string>();
  private parentNode: ElementNode | null = null;
  private childNodes: NodeChild[] = [];

  constructor(tag: string, props: ElementProps = {}) {
    this.tag = tag;
    this.style = props.style;
    if (props.attributes) {
      for (const [name, value] of Object.entries(props.attributes)) this.attrs.set(name, value);
    }
  }

  get parent(): ElementNode | null {
    return this.parentNode;
  }

  get children(): readonly NodeChild[] {
    return this.childNodes;
  }

  get elementIndex(): number {
    const parent = this.parentNode;
    if (!parent) return 0;
    let index = 0;
    for (const sibling of parent.childNodes) {
      if (sibling === this) return index;
      if (sibling instanceof ElementNode) index++;
    }
    return 0;
  }

  getAttribute(name: string): string | undefined {
    return this.attrs.get(name);
  }

  setAttribute(name: string, value: string): void {
    this.attrs.set(name, value);
  }

  removeAttribute(name: string): void {
    this.attrs.delete(name);
  }

  appendChild(input: ChildInput): NodeChild {
    const child = toChild(input);
    if (child instanceof ElementNode) child.detach();
    this.childNodes.push(child);
    if (child instanceof ElementNode) child.parentNode = this;
    return child;
  }

  removeChild(child: NodeChild): void {
    const index = this.childNodes.indexOf(child);
    if (index < 0) return;
    this.childNodes.splice(index, 1);
    if (child instanceof ElementNode) child.parentNode = null;
  }

  replaceChildren(...inputs: ChildInput[]): void {
    for (const child of this.childNodes) {
      if (child instanceof ElementNode) child.parentNode = null;
    }
    this.childNodes = [];
    for (const input of inputs) this.appendChild(input);
  }

  /** Remove this node from its parent, if any. */
  detach(): void {
    this.parentNode?.removeChild(this);
  }
}

/**
 * Element builder.
 *
 * @example
 * h("row", { style: rowStyle }, [h("cell", {}, ["hello"]), h("cell")])
 */
export function h(tag: string, props: ElementProps = {}, children: readonly ChildInput[] = []): ElementNode {
  const node = new ElementNode(tag, props);
  for (const child of children) node.appendChild(child);
  return node;
}
