import test from "node:test";
import assert from "node:assert/strict";
import {
  colorToString,
  contrastRatio,
  flattenAlpha,
  isLargeText,
  parseCssColor,
} from "../src/core/color.js";

test("contrast ratio of black on white is 21:1", () => {
  const ratio = contrastRatio(
    { r: 0, g: 0, b: 0, a: 1 },
    { r: 255, g: 255, b: 255, a: 1 },
  );
  assert.ok(Math.abs(ratio - 21) < 0.0001);
});

test("contrast ratio is symmetric in its arguments", () => {
  const grey = { r: 119, g: 119, b: 119, a: 1 };
  const white = { r: 255, g: 255, b: 255, a: 1 };
  assert.equal(contrastRatio(grey, white), contrastRatio(white, grey));
});

test("#777 on white falls just short of 4.5:1", () => {
  const ratio = contrastRatio(
    { r: 119, g: 119, b: 119, a: 1 },
    { r: 255, g: 255, b: 255, a: 1 },
  );
  assert.equal(ratio.toFixed(2), "4.48");
  assert.ok(ratio < 4.5);
});

test("large text thresholds", () => {
  assert.equal(isLargeText(24, 400), true);
  assert.equal(isLargeText(18.5, 700), true);
  assert.equal(isLargeText(18, 700), false);
  assert.equal(isLargeText(20, 400), false);
  assert.equal(isLargeText(undefined, 700), false);
});

test("parses hex colors in all four lengths", () => {
  assert.deepEqual(parseCssColor("#fff"), { r: 255, g: 255, b: 255, a: 1 });
  assert.deepEqual(parseCssColor("#1E90FF"), { r: 30, g: 144, b: 255, a: 1 });
  assert.deepEqual(parseCssColor("#000f"), { r: 0, g: 0, b: 0, a: 1 });
  assert.deepEqual(parseCssColor("#00000000"), { r: 0, g: 0, b: 0, a: 0 });
  assert.equal(parseCssColor("#12"), undefined);
  assert.equal(parseCssColor("#ggg"), undefined);
});

test("parses rgb() and rgba() in comma and space syntax", () => {
  assert.deepEqual(parseCssColor("rgb(0, 128, 255)"), { r: 0, g: 128, b: 255, a: 1 });
  assert.deepEqual(parseCssColor("rgba(0, 0, 0, 0.5)"), { r: 0, g: 0, b: 0, a: 0.5 });
  assert.deepEqual(parseCssColor("rgb(0 0 0 / 50%)"), { r: 0, g: 0, b: 0, a: 0.5 });
  assert.deepEqual(parseCssColor("rgb(100%, 0%, 0%)"), { r: 255, g: 0, b: 0, a: 1 });
  assert.equal(parseCssColor("rgb(1, 2)"), undefined);
});

test("resolves named colors and transparent", () => {
  assert.deepEqual(parseCssColor("navy"), { r: 0, g: 0, b: 128, a: 1 });
  assert.deepEqual(parseCssColor("  White "), { r: 255, g: 255, b: 255, a: 1 });
  assert.deepEqual(parseCssColor("transparent"), { r: 0, g: 0, b: 0, a: 0 });
});

test("leaves values that need a cascade unresolved", () => {
  assert.equal(parseCssColor("var(--fg)"), undefined);
  assert.equal(parseCssColor("inherit"), undefined);
  assert.equal(parseCssColor("currentColor"), undefined);
  assert.equal(parseCssColor(""), undefined);
});

test("semi-transparent colors are flattened onto their backdrop", () => {
  assert.deepEqual(
    flattenAlpha({ r: 0, g: 0, b: 0, a: 0.5 }, { r: 255, g: 255, b: 255, a: 1 }),
    { r: 128, g: 128, b: 128, a: 1 },
  );
});

test("formats opaque colors as hex and translucent ones as rgba()", () => {
  assert.equal(colorToString({ r: 255, g: 0, b: 16, a: 1 }), "#ff0010");
  assert.equal(colorToString({ r: 0, g: 0, b: 0, a: 0.5 }), "rgba(0, 0, 0, 0.5)");
});

test("parses hsl() colors", () => {
  assert.deepEqual(parseCssColor("hsl(0, 0%, 93%)"), { r: 237, g: 237, b: 237, a: 1 });
  assert.deepEqual(parseCssColor("hsl(120, 100%, 25%)"), { r: 0, g: 128, b: 0, a: 1 });
});
