/**
 * packages/core/src/layout/engine.ts — Layout driver.
 *
 * Why: Turns a cascaded element tree into a positioned box tree. Dispatch is
 * by each element's own resolved display kind; a parent never overrides it.
 *
 * The font service is an explicit argument. Without one, the engine falls
 * back to its configured service, then to the process-wide default font,
 * which is loaded on first use and kept.
 *
 * Fatal conditions (thrown as TesseraError):
 *   - an element without resolved attributes (cascade did not run)
 *   - the embedded default font failing to load
 */

import { createDevWarnings } from "../debug/warnings.js";
import type { Element } from "../dom/types.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import { layoutBlock } from "./block.js";
import type { LayoutBox } from "./box.js";
import { type LayoutEngineConfig, resolveLayoutEngineConfig } from "./config.js";
import { type LayoutContext, requireResolved } from "./context.js";
import { getDefaultFontCollection } from "./fonts/defaultFont.js";
import type { FontService } from "./fonts/types.js";
import { type Size, clampNonNegative, size } from "./geometry.js";
import { layoutInline } from "./inline.js";
import { BoxRetainer, type RetainStats } from "./retain.js";

export type LayoutStats = RetainStats;

export interface LayoutEngine {
  /** Lay out `root` within `availableSize`. The whole subtree must be cascaded. */
  layout(root: Element, availableSize: Size, fonts?: FontService): LayoutBox;
  /** Counters for the most recent layout() call. */
  stats(): LayoutStats;
  /** Forget all retained boxes; the next pass builds everything fresh. */
  clearRetainedBoxes(): void;
}

function layoutElement(ctx: LayoutContext, element: Element, available: Size): LayoutBox {
  const attrs = requireResolved(element);
  const display = attrs.display;
  return display.kind === "block"
    ? layoutBlock(ctx, element, attrs, display, available)
    : layoutInline(ctx, element, attrs, available);
}

export function createLayoutEngine(config?: LayoutEngineConfig): LayoutEngine {
  const resolved = resolveLayoutEngineConfig(config);
  const warnings = createDevWarnings({ devMode: resolved.devMode, warn: resolved.warn });
  const retainer = new BoxRetainer(resolved.retainBoxes);

  function sanitize(root: Element, available: Size): Size {
    const w = clampNonNegative(available.w);
    const h = clampNonNegative(available.h);
    if (w !== available.w || h !== available.h) {
      warnings.report(
        "layout",
        `availableSize:${String(available.w)}x${String(available.h)}`,
        `layout(<${root.tag}>) got available size ${String(available.w)}x${String(available.h)}; clamped to ${String(w)}x${String(h)}.`,
      );
    }
    return size(w, h);
  }

  return Object.freeze({
    layout(root: Element, availableSize: Size, fonts?: FontService): LayoutBox {
      const fontService = fonts ?? resolved.fonts ?? getDefaultFontCollection();
      const available = sanitize(root, availableSize);
      retainer.beginPass();
      const token = perfMarkStart();
      const ctx: LayoutContext = Object.freeze({
        fonts: fontService,
        warnings,
        layoutElement: (element: Element, avail: Size) => layoutElement(ctx, element, avail),
        retain: (element: Element, box: LayoutBox) => retainer.retain(element, box),
      });
      const box = ctx.layoutElement(root, available);
      perfMarkEnd("layout", token);
      return box;
    },
    stats(): LayoutStats {
      return retainer.stats();
    },
    clearRetainedBoxes(): void {
      retainer.clear();
    },
  });
}

/**
 * One-shot layout without cross-frame reuse.
 *
 * @example
 * resolveStyles(root);
 * const box = layout(root, { w: 800, h: 600 });
 */
export function layout(root: Element, availableSize: Size, fonts?: FontService): LayoutBox {
  return createLayoutEngine({ retainBoxes: false }).layout(root, availableSize, fonts);
}
