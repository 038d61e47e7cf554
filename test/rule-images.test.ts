import test from "node:test";
import assert from "node:assert/strict";
import { imagesEvaluator } from "../src/rules/rule-images.js";
import { page, runRule } from "./helpers.js";

test("images: a page without images scores 100", () => {
  const result = runRule(imagesEvaluator, page("<p>Text only</p>"));
  assert.equal(result.category, "images");
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("images: missing alt is critical", () => {
  const result = runRule(imagesEvaluator, page('<img src="hero.png">'));
  assert.equal(result.score, 0);
  assert.equal(result.issues.length, 1);
  assert.equal(result.issues[0].ruleId, "images/missing-alt");
  assert.equal(result.issues[0].severity, "critical");
  assert.equal(result.issues[0].message, "Image missing alt attribute: hero.png");
  assert.deepEqual(result.issues[0].element, {
    tagName: "img",
    attribute: { name: "src", value: "hero.png" },
  });
});

test("images: score is the share of acceptable images", () => {
  const result = runRule(
    imagesEvaluator,
    page('<img src="a.png" alt="Team photo"><img src="b.png"><img src="rule.png" alt="">'),
  );
  assert.equal(result.score, 67);
  assert.equal(result.issues.length, 1);
});

test("images: empty alt on a purely decorative image passes", () => {
  const result = runRule(imagesEvaluator, page('<p><img src="rule.png" alt=""> Divider</p>'));
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("images: empty alt on the only content of a link is flagged", () => {
  const result = runRule(imagesEvaluator, page('<a href="/home"><img src="home.png" alt=""></a>'));
  assert.equal(result.score, 0);
  assert.equal(result.issues[0].ruleId, "images/empty-alt-on-content");
  assert.equal(result.issues[0].severity, "warning");
  assert.equal(
    result.issues[0].message,
    "Image has empty alt text but appears to convey content: home.png",
  );
});

test("images: empty alt inside a link that has its own text passes", () => {
  const result = runRule(
    imagesEvaluator,
    page('<a href="/home"><img src="home.png" alt=""> Home</a>'),
  );
  assert.equal(result.score, 100);
});

test("images: alt text over the length limit is a warning", () => {
  const tooLong = runRule(imagesEvaluator, page(`<img src="a.png" alt="${"a".repeat(126)}">`));
  assert.equal(tooLong.score, 0);
  assert.equal(tooLong.issues[0].ruleId, "images/alt-too-long");
  assert.equal(tooLong.issues[0].message, "Alt text is 126 characters (limit 125).");

  const atLimit = runRule(imagesEvaluator, page(`<img src="a.png" alt="${"a".repeat(125)}">`));
  assert.equal(atLimit.score, 100);
});

test("images: aria labelling and presentation roles stand in for alt", () => {
  const result = runRule(
    imagesEvaluator,
    page(
      '<img src="a.png" aria-label="Logo"><img src="b.png" role="presentation"><img src="c.png" aria-hidden="true">',
    ),
  );
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("images: an image without src is noted but still assessed", () => {
  const result = runRule(imagesEvaluator, page('<img alt="Chart">'));
  assert.equal(result.score, 100);
  assert.equal(result.issues.length, 1);
  assert.equal(result.issues[0].ruleId, "images/missing-src");
  assert.equal(result.issues[0].severity, "info");
});

test("images: missing alt without src reports an unknown source", () => {
  const result = runRule(imagesEvaluator, page("<img>"));
  assert.equal(result.score, 0);
  assert.deepEqual(
    result.issues.map((issue) => issue.message),
    [
      "Image has no src; it may be injected by script and cannot be assessed.",
      "Image missing alt attribute: unknown",
    ],
  );
});

test("images: issue ids are stable across runs", () => {
  const html = page('<img src="a.png"><img src="b.png">');
  const first = runRule(imagesEvaluator, html);
  const second = runRule(imagesEvaluator, html);
  assert.deepEqual(
    first.issues.map((issue) => issue.id),
    second.issues.map((issue) => issue.id),
  );
  assert.notEqual(first.issues[0].id, first.issues[1].id);
});
