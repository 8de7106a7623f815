import { assert, describe, test } from "@tessera/testkit";
import { h } from "../../dom/element.js";
import { isTesseraError } from "../../errors.js";
import { resolveStyles } from "../../style/cascade.js";
import { defineStyleRule } from "../../style/rule.js";
import { createFixedFont } from "../../testing/fixedFont.js";
import { boxEquals } from "../box.js";
import type { LayoutEngineConfig } from "../config.js";
import { createLayoutEngine, layout } from "../engine.js";
import { size } from "../geometry.js";
import { childAt } from "./helpers.js";

const ROOT = defineStyleRule({ name: "root", attributes: { textSize: 10 } });

function sampleTree() {
  const a = h("a", {}, ["aa"]);
  const b = h("b", {}, ["bb"]);
  const root = h("root", { style: ROOT }, [a, b]);
  resolveStyles(root);
  return { root, a, b };
}

describe("layout engine - fatal conditions", () => {
  test("uncascaded root throws TESSERA_UNRESOLVED_ATTRIBUTES", () => {
    assert.throws(
      () => layout(h("root"), size(10, 10), createFixedFont()),
      (err: unknown) =>
        isTesseraError(err) &&
        err.code === "TESSERA_UNRESOLVED_ATTRIBUTES" &&
        err.message ===
          "layout: <root> has no resolved attributes. Run resolveStyles() on the tree before layout().",
    );
  });

  test("an element added after the cascade is reported by tag", () => {
    const { root } = sampleTree();
    root.appendChild(h("late"));
    assert.throws(
      () => layout(root, size(100, 100), createFixedFont()),
      (err: unknown) => isTesseraError(err) && err.message.startsWith("layout: <late> "),
    );
  });

  test("invalid configuration is rejected", () => {
    const cases: ReadonlyArray<[Record<string, unknown>, string]> = [
      [{ devMode: "yes" }, "devMode must be a boolean"],
      [{ retainBoxes: 1 }, "retainBoxes must be a boolean"],
      [{ warn: "console" }, "warn must be a function"],
      [{ fonts: { shape: () => null } }, "fonts must implement shape() and lineMetrics()"],
    ];
    for (const [config, message] of cases) {
      assert.throws(
        // Deliberately malformed input, as from untyped callers.
        () => createLayoutEngine(config as LayoutEngineConfig),
        (err: unknown) => isTesseraError(err) && err.code === "TESSERA_INVALID_CONFIG" && err.message === message,
      );
    }
  });
});

describe("layout engine - retention", () => {
  test("an unchanged tree returns the previous root box", () => {
    const { root } = sampleTree();
    const engine = createLayoutEngine();
    const fonts = createFixedFont();
    const first = engine.layout(root, size(100, 100), fonts);
    assert.deepEqual(engine.stats(), { built: 3, reused: 0 });
    const second = engine.layout(root, size(100, 100), fonts);
    assert.equal(second, first);
    assert.deepEqual(engine.stats(), { built: 3, reused: 3 });
  });

  test("a changed subtree is rebuilt while its siblings keep their identity", () => {
    const { root, b } = sampleTree();
    const engine = createLayoutEngine();
    const fonts = createFixedFont();
    const first = engine.layout(root, size(100, 100), fonts);

    b.replaceChildren("bbbb");
    resolveStyles(root);
    const second = engine.layout(root, size(100, 100), fonts);

    assert.notEqual(second, first);
    assert.equal(childAt(second, 0).box, childAt(first, 0).box);
    assert.notEqual(childAt(second, 1).box, childAt(first, 1).box);
    assert.deepEqual(childAt(second, 1).box.size, { w: 20, h: 10 });
    assert.deepEqual(engine.stats(), { built: 3, reused: 1 });
  });

  test("a different available size that changes nothing still reuses", () => {
    const { root } = sampleTree();
    const engine = createLayoutEngine();
    const fonts = createFixedFont();
    const first = engine.layout(root, size(100, 100), fonts);
    assert.equal(engine.layout(root, size(300, 50), fonts), first);
  });

  test("retainBoxes: false builds fresh but equal boxes", () => {
    const { root } = sampleTree();
    const engine = createLayoutEngine({ retainBoxes: false });
    const fonts = createFixedFont();
    const first = engine.layout(root, size(100, 100), fonts);
    const second = engine.layout(root, size(100, 100), fonts);
    assert.notEqual(second, first);
    assert.ok(boxEquals(first, second));
    assert.deepEqual(engine.stats(), { built: 3, reused: 0 });
  });

  test("clearRetainedBoxes drops previous frames", () => {
    const { root } = sampleTree();
    const engine = createLayoutEngine();
    const fonts = createFixedFont();
    const first = engine.layout(root, size(100, 100), fonts);
    engine.clearRetainedBoxes();
    const second = engine.layout(root, size(100, 100), fonts);
    assert.notEqual(second, first);
    assert.deepEqual(engine.stats(), { built: 3, reused: 0 });
  });
});

describe("layout engine - fonts and inputs", () => {
  test("the configured font service is used when none is passed", () => {
    const { root } = sampleTree();
    const fonts = createFixedFont();
    createLayoutEngine({ fonts }).layout(root, size(100, 100));
    assert.equal(fonts.shapeCalls(), 2);
  });

  test("an explicit font service overrides the configured one", () => {
    const { root } = sampleTree();
    const configured = createFixedFont();
    const explicit = createFixedFont({ advance: 1 });
    const box = createLayoutEngine({ fonts: configured }).layout(root, size(100, 100), explicit);
    assert.equal(configured.shapeCalls(), 0);
    assert.equal(childAt(box, 0).box.size.w, 20);
  });

  test("negative and NaN available sizes clamp to zero with a warning", () => {
    const warnings: string[] = [];
    const root = h("root");
    resolveStyles(root);
    const engine = createLayoutEngine({ devMode: true, warn: (m) => warnings.push(m) });
    const box = engine.layout(root, size(-5, Number.NaN), createFixedFont());
    engine.layout(root, size(-5, Number.NaN), createFixedFont());
    assert.deepEqual(box.size, { w: 0, h: 0 });
    assert.deepEqual(warnings, ["[tessera][layout] layout(<root>) got available size -5xNaN; clamped to 0x0."]);
  });

  test("warnings stay silent outside dev mode", () => {
    const warnings: string[] = [];
    const root = h("root");
    resolveStyles(root);
    createLayoutEngine({ warn: (m) => warnings.push(m) }).layout(root, size(-1, -1), createFixedFont());
    assert.deepEqual(warnings, []);
  });
});
