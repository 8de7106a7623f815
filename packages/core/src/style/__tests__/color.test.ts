import { assert, describe, test } from "@tessera/testkit";
import { BLACK, TRANSPARENT, colorsEqual, formatColor, isColor, rgba } from "../color.js";

describe("colors", () => {
  test("rgba clamps and rounds channels", () => {
    assert.deepEqual(rgba(300, -4, 12.6, 2), { r: 255, g: 0, b: 13, a: 1 });
    assert.deepEqual(rgba(Number.NaN, 0, 0, Number.NaN), { r: 0, g: 0, b: 0, a: 1 });
  });

  test("formatColor", () => {
    assert.equal(formatColor(BLACK), "#000000");
    assert.equal(formatColor(TRANSPARENT), "#00000000");
    assert.equal(formatColor(rgba(18, 52, 86, 0.5)), "#12345680");
  });

  test("colorsEqual compares channels", () => {
    assert.equal(colorsEqual(rgba(1, 2, 3), rgba(1, 2, 3, 1)), true);
    assert.equal(colorsEqual(rgba(1, 2, 3), rgba(1, 2, 3, 0.5)), false);
  });

  test("isColor", () => {
    assert.equal(isColor(rgba(0, 0, 0)), true);
    assert.equal(isColor({ r: 0, g: 0, b: 0 }), false);
    assert.equal(isColor("#000"), false);
    assert.equal(isColor(null), false);
  });
});
