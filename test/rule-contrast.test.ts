import test from "node:test";
import assert from "node:assert/strict";
import { contrastEvaluator, parseFontSize } from "../src/rules/rule-contrast.js";
import { page, runRule } from "./helpers.js";

test("contrast: no inline colors means nothing to assess", () => {
  const result = runRule(contrastEvaluator, page("<p>Plain text</p>"));
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("contrast: grey on white fails for normal text", () => {
  const result = runRule(
    contrastEvaluator,
    page('<p style="color:#777777;background-color:#ffffff">Grey</p>'),
  );
  assert.equal(result.score, 0);
  assert.equal(result.issues.length, 1);
  assert.equal(result.issues[0].ruleId, "contrast/insufficient-contrast");
  assert.equal(result.issues[0].severity, "critical");
  assert.equal(
    result.issues[0].message,
    "Text contrast ratio 4.48:1 is below required 4.5:1 (#777777 on #ffffff).",
  );
});

test("contrast: the same pair passes as large text", () => {
  const sized = runRule(
    contrastEvaluator,
    page('<p style="color:#777777;background-color:#ffffff;font-size:24px">Grey</p>'),
  );
  assert.equal(sized.score, 100);

  // 14pt is 18.67px, large only when bold
  const bold = runRule(
    contrastEvaluator,
    page('<strong style="color:#777;background:#fff;font-size:14pt">Grey</strong>'),
  );
  assert.equal(bold.score, 100);

  const regular = runRule(
    contrastEvaluator,
    page('<span style="color:#777;background:#fff;font-size:14pt">Grey</span>'),
  );
  assert.equal(regular.score, 0);
});

test("contrast: score is the share of passing pairs", () => {
  const result = runRule(
    contrastEvaluator,
    page(
      '<div style="background-color:#ffffff">' +
        '<p style="color:#000000">Black</p>' +
        '<p style="color:#777777">Grey</p>' +
        "</div>",
    ),
  );
  assert.equal(result.score, 50);
  assert.equal(result.issues.length, 1);
});

test("contrast: the background is inherited from the nearest ancestor", () => {
  const result = runRule(
    contrastEvaluator,
    page('<div style="background-color:#000"><span style="color:#333">Dim</span></div>'),
  );
  assert.equal(result.score, 0);
  assert.match(result.issues[0].message, /^Text contrast ratio 1\.66:1 /);
});

test("contrast: transparent layers are looked through", () => {
  const result = runRule(
    contrastEvaluator,
    page(
      '<div style="background-color:navy"><p style="color:white;background-color:transparent">Light</p></div>',
    ),
  );
  assert.equal(result.score, 100);
});

test("contrast: text without a known background is skipped", () => {
  const result = runRule(contrastEvaluator, page('<p style="color:#777">Grey</p>'));
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("contrast: unresolvable colors are noted and skipped", () => {
  const result = runRule(
    contrastEvaluator,
    page('<p style="color: var(--fg); background-color: #fff">Themed</p>'),
  );
  assert.equal(result.score, 100);
  assert.equal(result.issues.length, 1);
  assert.equal(result.issues[0].severity, "info");
  assert.equal(
    result.issues[0].message,
    "Could not resolve text color 'var(--fg)'; contrast not checked.",
  );
});

test("contrast: an unresolvable text color without a background is not reported", () => {
  const result = runRule(contrastEvaluator, page('<p style="color:var(--x)">No pair</p>'));
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("contrast: a wrapper is judged only on the text it paints itself", () => {
  const result = runRule(
    contrastEvaluator,
    page(
      '<div style="background:#fff"><div style="color:#fff"><p style="color:#000">Readable</p></div></div>',
    ),
  );
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("contrast: hsl() colors are assessed", () => {
  const result = runRule(
    contrastEvaluator,
    page('<p style="color:hsl(0, 0%, 93%);background-color:#fff">Faint</p>'),
  );
  assert.equal(result.score, 0);
  assert.equal(result.issues.length, 1);
  assert.equal(
    result.issues[0].message,
    "Text contrast ratio 1.17:1 is below required 4.5:1 (#ededed on #ffffff).",
  );
});

test("contrast: a background image shorthand leaves the pair unassessed", () => {
  const result = runRule(
    contrastEvaluator,
    page('<p style="color:#777;background:url(hero.jpg)">Over an image</p>'),
  );
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("font sizes convert to pixels", () => {
  assert.equal(parseFontSize("18px"), 18);
  assert.equal(parseFontSize("18pt"), 24);
  assert.equal(parseFontSize("1.5em"), 24);
  assert.equal(parseFontSize("2rem"), 32);
  assert.equal(parseFontSize("16"), 16);
  assert.equal(parseFontSize("large"), undefined);
});
