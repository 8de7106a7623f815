import { assert, describe, test } from "@tessera/testkit";
import { h } from "../../dom/element.js";
import { sides } from "../../layout/geometry.js";
import { BLACK, TRANSPARENT, rgba } from "../color.js";
import { resolveElement, resolveStyles } from "../cascade.js";
import { defineStyleRule } from "../rule.js";
import { sel } from "../selectors.js";
import type { ResolvedAttributes } from "../types.js";
import { DEFAULT_RESOLVED_ATTRIBUTES } from "../types.js";

const RED = rgba(255, 0, 0);
const BLUE = rgba(0, 0, 255);
const GREEN = rgba(0, 128, 0);

function mustResolved(value: ResolvedAttributes | undefined): ResolvedAttributes {
  if (!value) throw new Error("element was not resolved");
  return value;
}

describe("resolveStyles - inheritance", () => {
  test("root without a rule gets the defaults", () => {
    const root = h("root");
    resolveStyles(root);
    assert.deepEqual(root.resolved, DEFAULT_RESOLVED_ATTRIBUTES);
  });

  test("textSize and textColor inherit from the nearest ancestor", () => {
    const rootStyle = defineStyleRule({ name: "root", attributes: { textSize: 24, textColor: RED } });
    const leaf = h("leaf");
    const mid = h("mid", {}, [leaf]);
    const root = h("root", { style: rootStyle }, [mid]);
    resolveStyles(root);
    const resolved = mustResolved(leaf.resolved);
    assert.equal(resolved.textSize, 24);
    assert.deepEqual(resolved.textColor, RED);
  });

  test("own rule overrides inherited text values", () => {
    const rootStyle = defineStyleRule({ attributes: { textSize: 24, textColor: RED } });
    const childStyle = defineStyleRule({ attributes: { textSize: 12 } });
    const child = h("child", { style: childStyle });
    const root = h("root", { style: rootStyle }, [child]);
    resolveStyles(root);
    const resolved = mustResolved(child.resolved);
    assert.equal(resolved.textSize, 12);
    assert.deepEqual(resolved.textColor, RED);
  });

  test("display, background, border and padding do not inherit", () => {
    const rootStyle = defineStyleRule({
      attributes: {
        display: "block",
        direction: "horizontal",
        padding: 8,
        width: 300,
        backgroundColor: BLUE,
        borderColor: GREEN,
        borderThickness: 2,
        borderRadius: 4,
      },
    });
    const child = h("child");
    const root = h("root", { style: rootStyle }, [child]);
    resolveStyles(root);
    assert.deepEqual(child.resolved, DEFAULT_RESOLVED_ATTRIBUTES);
    const rootResolved = mustResolved(root.resolved);
    assert.equal(rootResolved.display.kind, "block");
    if (rootResolved.display.kind === "block") {
      assert.equal(rootResolved.display.direction, "horizontal");
      assert.equal(rootResolved.display.width, 300);
      assert.deepEqual(rootResolved.display.padding, sides(8));
    }
  });

  test("text content is skipped and elements after it are still visited", () => {
    const after = h("after");
    const root = h("root", {}, ["hello", after]);
    resolveStyles(root);
    assert.deepEqual(after.resolved, DEFAULT_RESOLVED_ATTRIBUTES);
  });
});

describe("resolveStyles - sub-rules", () => {
  test("a later matching sub-rule overrides only the properties it names", () => {
    const style = defineStyleRule({
      attributes: { textColor: RED, backgroundColor: BLUE, textSize: 10 },
      subRules: [
        { selector: sel.attr("data-a"), attributes: { textColor: GREEN, textSize: 20 } },
        { selector: sel.attr("data-b"), attributes: { textColor: BLACK } },
      ],
    });
    const el = h("el", { style, attributes: { "data-a": "", "data-b": "" } });
    resolveStyles(el);
    const resolved = mustResolved(el.resolved);
    assert.deepEqual(resolved.textColor, BLACK);
    assert.equal(resolved.textSize, 20);
    assert.deepEqual(resolved.backgroundColor, BLUE);
  });

  test("non-matching sub-rules leave the base set in place", () => {
    const style = defineStyleRule({
      attributes: { backgroundColor: BLUE },
      subRules: [{ selector: sel.tag("other"), attributes: { backgroundColor: RED } }],
    });
    const el = h("el", { style });
    resolveStyles(el);
    assert.deepEqual(mustResolved(el.resolved).backgroundColor, BLUE);
  });

  test("sub-rules can match on ancestry", () => {
    const style = defineStyleRule({
      subRules: [{ selector: sel.ancestor(sel.tag("toolbar")), attributes: { textSize: 11 } }],
    });
    const inside = h("item", { style });
    const outside = h("item", { style });
    const root = h("root", {}, [h("toolbar", {}, [h("group", {}, [inside])]), outside]);
    resolveStyles(root);
    assert.equal(mustResolved(inside.resolved).textSize, 11);
    assert.equal(mustResolved(outside.resolved).textSize, 16);
  });

  test("block sizes from the base survive a sub-rule that only changes padding", () => {
    const style = defineStyleRule({
      attributes: { width: 100, height: 40 },
      subRules: [{ selector: sel.any(), attributes: { padding: 2 } }],
    });
    const el = h("el", { style });
    resolveStyles(el);
    const display = mustResolved(el.resolved).display;
    assert.equal(display.kind, "block");
    if (display.kind === "block") {
      assert.equal(display.width, 100);
      assert.equal(display.height, 40);
      assert.deepEqual(display.padding, sides(2));
    }
  });

  test('"auto" clears an earlier explicit size', () => {
    const style = defineStyleRule({
      attributes: { width: 100 },
      subRules: [{ selector: sel.any(), attributes: { width: "auto" } }],
    });
    const el = h("el", { style });
    resolveStyles(el);
    const display = mustResolved(el.resolved).display;
    assert.equal(display.kind === "block" ? display.width : -1, undefined);
  });

  test("switching to inline drops block values; switching back starts from defaults", () => {
    const style = defineStyleRule({
      attributes: { width: 100 },
      subRules: [
        { selector: sel.attr("inline"), attributes: { display: "inline" } },
        { selector: sel.attr("reblock"), attributes: { display: "block" } },
      ],
    });
    const inline = h("el", { style, attributes: { inline: "" } });
    const reblock = h("el", { style, attributes: { inline: "", reblock: "" } });
    resolveStyles(h("root", {}, [inline, reblock]));
    assert.deepEqual(mustResolved(inline.resolved).display, { kind: "inline" });
    assert.deepEqual(mustResolved(reblock.resolved).display, DEFAULT_RESOLVED_ATTRIBUTES.display);
  });
});

describe("resolveStyles - publication", () => {
  test("each run publishes a new frozen value", () => {
    const el = h("el");
    resolveStyles(el);
    const first = el.resolved;
    resolveStyles(el);
    assert.notEqual(el.resolved, first);
    assert.deepEqual(el.resolved, first);
    assert.equal(Object.isFrozen(el.resolved), true);
  });

  test("changing a rule reference is reflected on the next run", () => {
    const el = h("el");
    resolveStyles(el);
    el.style = defineStyleRule({ attributes: { backgroundColor: GREEN } });
    resolveStyles(el);
    assert.deepEqual(mustResolved(el.resolved).backgroundColor, GREEN);
    el.style = undefined;
    resolveStyles(el);
    assert.deepEqual(mustResolved(el.resolved).backgroundColor, TRANSPARENT);
  });
});

describe("resolveElement", () => {
  test("computes from the parent value without publishing", () => {
    const style = defineStyleRule({ attributes: { display: "inline", width: 10 } });
    const el = h("chip", { style });
    const parent = { ...DEFAULT_RESOLVED_ATTRIBUTES, textSize: 30 };
    const resolved = resolveElement(el, parent);
    assert.equal(resolved.textSize, 30);
    assert.deepEqual(resolved.display, { kind: "inline" });
    assert.equal(el.resolved, undefined);
  });
});

describe("resolveStyles - dev warnings", () => {
  test("block-only properties on an inline element warn once", () => {
    const style = defineStyleRule({
      name: "chip",
      attributes: { display: "inline" },
      subRules: [{ selector: sel.any(), attributes: { width: 10, padding: 1 } }],
    });
    const warnings: string[] = [];
    const root = h("root", {}, [h("chip", { style }), h("chip", { style })]);
    resolveStyles(root, { devMode: true, warn: (m) => warnings.push(m) });
    assert.deepEqual(warnings, [
      '[tessera][cascade] <chip> style "chip" (subRules[0]) sets padding, width but the element displays inline; ignored.',
    ]);
  });

  test("no warnings outside dev mode", () => {
    const style = defineStyleRule({ attributes: { display: "inline", width: 10 } });
    const warnings: string[] = [];
    resolveStyles(h("chip", { style }), { warn: (m) => warnings.push(m) });
    assert.deepEqual(warnings, []);
  });
});
