/**
 * packages/core/src/layout/retain.ts — Cross-frame box reuse.
 *
 * Why: Renderers and caches downstream compare boxes by identity. When a pass
 * rebuilds an element's box and it equals the one handed out last frame, the
 * old object is returned instead, so unchanged subtrees keep their identity.
 *
 * Keyed by element (WeakMap), so dropped elements release their boxes.
 * Children are retained before their parent, which lets boxEquals stop at the
 * first identical child.
 */

import type { Element } from "../dom/types.js";
import { type LayoutBox, boxEquals } from "./box.js";

export type RetainStats = Readonly<{
  /** Element boxes produced during the last pass. */
  built: number;
  /** Of those, how many were replaced by the previous frame's box. */
  reused: number;
}>;

export class BoxRetainer {
  private readonly enabled: boolean;
  private boxes = new WeakMap<Element, LayoutBox>();
  private built = 0;
  private reused = 0;

  constructor(enabled: boolean) {
    this.enabled = enabled;
  }

  beginPass(): void {
    this.built = 0;
    this.reused = 0;
  }

  retain(element: Element, box: LayoutBox): LayoutBox {
    this.built++;
    if (!this.enabled) return box;
    const previous = this.boxes.get(element);
    if (previous !== undefined && boxEquals(previous, box)) {
      this.reused++;
      return previous;
    }
    this.boxes.set(element, box);
    return box;
  }

  stats(): RetainStats {
    return Object.freeze({ built: this.built, reused: this.reused });
  }

  clear(): void {
    this.boxes = new WeakMap();
  }
}
