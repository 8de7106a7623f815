import { assert, describe, test } from "@tessera/testkit";
import { ElementNode, h, text } from "../element.js";
import { isTextContent } from "../types.js";

describe("element tree", () => {
  test("h() builds children and converts strings to text content", () => {
    const root = h("root", { attributes: { id: "r" } }, ["hello", h("child")]);
    assert.equal(root.children.length, 2);
    assert.deepEqual(root.children[0], { kind: "text", text: "hello" });
    const child = root.children[1];
    assert.ok(child instanceof ElementNode);
    assert.equal(child.parent, root);
    assert.equal(root.getAttribute("id"), "r");
    assert.equal(root.parent, null);
  });

  test("attributes can be set and removed", () => {
    const el = h("el");
    assert.equal(el.getAttribute("role"), undefined);
    el.setAttribute("role", "button");
    assert.equal(el.getAttribute("role"), "button");
    el.removeAttribute("role");
    assert.equal(el.getAttribute("role"), undefined);
  });

  test("elementIndex counts element siblings only", () => {
    const a = h("a");
    const b = h("b");
    const root = h("root", {}, ["x", a, "y", b]);
    assert.equal(root.elementIndex, 0);
    assert.equal(a.elementIndex, 0);
    assert.equal(b.elementIndex, 1);
  });

  test("appending an attached element moves it", () => {
    const child = h("child");
    const first = h("first", {}, [child]);
    const second = h("second");
    second.appendChild(child);
    assert.deepEqual(first.children, []);
    assert.equal(second.children[0], child);
    assert.equal(child.parent, second);
  });

  test("removeChild and detach clear the parent link", () => {
    const a = h("a");
    const b = h("b");
    const root = h("root", {}, [a, b]);
    root.removeChild(a);
    assert.equal(a.parent, null);
    b.detach();
    assert.equal(b.parent, null);
    assert.deepEqual(root.children, []);
    root.removeChild(a);
    assert.deepEqual(root.children, []);
  });

  test("replaceChildren detaches the old children", () => {
    const old = h("old");
    const root = h("root", {}, [old]);
    const fresh = h("fresh");
    root.replaceChildren(fresh, "tail");
    assert.equal(old.parent, null);
    assert.equal(fresh.parent, root);
    assert.equal(root.children.length, 2);
    const tail = root.children[1];
    assert.ok(tail !== undefined && isTextContent(tail) && tail.text === "tail");
  });

  test("text() makes frozen text content", () => {
    const t = text("abc");
    assert.equal(isTextContent(t), true);
    assert.equal(Object.isFrozen(t), true);
  });
});
