import test from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_WEIGHTS } from "../src/config/schema.js";
import { AccessibilityEngine, evaluateDocument } from "../src/core/engine.js";
import { ConfigError, InputError } from "../src/core/errors.js";
import { CATEGORIES, type AccessibilityReport } from "../src/core/types.js";
import { parseHtml } from "../src/document/parse.js";
import { EVALUATORS } from "../src/rules/index.js";
import { toFlatRecord } from "../src/report/json.js";
import { page, readFixture } from "./helpers.js";

function weightedMean(report: AccessibilityReport): number {
  return Math.round(
    CATEGORIES.reduce(
      (sum, category) => sum + DEFAULT_WEIGHTS[category] * report.categories[category],
      0,
    ) / 100,
  );
}

test("engine: a page with one unlabelled image and no header or nav scores 81", () => {
  const report = evaluateDocument(parseHtml(readFixture("scenario-page.html")));

  assert.deepEqual(report.categories, {
    images: 0,
    headings: 100,
    links: 100,
    forms: 100,
    structure: 80,
    contrast: 100,
    keyboard: 100,
  });
  assert.equal(report.overallScore, 81);
  assert.deepEqual(
    report.issues.map((issue) => [issue.category, issue.severity, issue.message]),
    [
      ["images", "critical", "Image missing alt attribute: hero.png"],
      ["structure", "info", "No <header> element found"],
      ["structure", "info", "No <nav> element found"],
    ],
  );
});

test("engine: an empty body without lang scores 84", () => {
  const report = evaluateDocument(
    parseHtml("<html><head><title>Empty</title></head><body></body></html>"),
  );
  assert.equal(report.categories.structure, 20);
  for (const category of CATEGORIES.filter((entry) => entry !== "structure")) {
    assert.equal(report.categories[category], 100);
  }
  assert.equal(report.overallScore, 84);
  assert.equal(report.issues.length, 5);
  assert.ok(report.issues.every((issue) => issue.category === "structure"));
});

test("engine: an accessible page scores 100 with no issues", () => {
  const report = evaluateDocument(parseHtml(readFixture("accessible-page.html")));
  assert.equal(report.overallScore, 100);
  assert.deepEqual(report.issues, []);
});

test("engine: repeated generic link text lowers the links score", () => {
  const report = evaluateDocument(
    parseHtml(page('<a href="/a">click here</a><a href="/b">click here</a>')),
  );
  assert.equal(report.categories.links, 80);
});

test("engine: missing or empty documents are rejected", () => {
  const engine = new AccessibilityEngine();
  assert.throws(() => engine.evaluate(undefined), InputError);
  assert.throws(() => engine.evaluate(null), /Cannot evaluate a missing or empty document\./);
});

test("engine: invalid weights fail at construction", () => {
  assert.throws(
    () => new AccessibilityEngine({ weights: { ...DEFAULT_WEIGHTS, keyboard: 0 } }),
    ConfigError,
  );
});

test("engine: evaluation is deterministic", () => {
  const html = readFixture("scenario-page.html");
  const engine = new AccessibilityEngine();
  const first = engine.evaluate(parseHtml(html));
  const second = engine.evaluate(parseHtml(html));
  assert.deepEqual(first, second);
  assert.equal(JSON.stringify(toFlatRecord(first)), JSON.stringify(toFlatRecord(second)));
  assert.deepEqual(engine.evaluate(parseHtml(html)), evaluateDocument(parseHtml(html)));
});

test("engine: scores stay in range and obey the weighted mean", () => {
  const documents = [
    readFixture("scenario-page.html"),
    readFixture("accessible-page.html"),
    page('<img src="a.png"><a href="/"></a><input><div onclick="x()">x</div>'),
    "<p>bare</p>",
  ];
  for (const html of documents) {
    const report = evaluateDocument(parseHtml(html));
    assert.equal(report.overallScore, weightedMean(report));
    for (const category of CATEGORIES) {
      const score = report.categories[category];
      assert.ok(Number.isInteger(score) && score >= 0 && score <= 100);
    }
  }
});

test("engine: a failing evaluator degrades to a neutral, noted category", () => {
  const evaluators = EVALUATORS.map((evaluator) =>
    evaluator.category === "images"
      ? {
          ...evaluator,
          evaluate: () => {
            throw new Error("boom");
          },
        }
      : evaluator,
  );
  const report = new AccessibilityEngine({ evaluators }).evaluate(
    parseHtml(readFixture("scenario-page.html")),
  );

  assert.equal(report.categories.images, 100);
  assert.equal(report.overallScore, 96);
  assert.equal(report.issues[0].ruleId, "images/not-assessable");
  assert.equal(report.issues[0].severity, "info");
  assert.equal(
    report.issues[0].message,
    "Image text alternatives category not assessable for this page: boom",
  );
});

test("engine: custom weights change only the aggregation", () => {
  const html = readFixture("scenario-page.html");
  const report = new AccessibilityEngine({
    weights: {
      images: 50,
      headings: 0,
      links: 0,
      forms: 0,
      structure: 50,
      contrast: 0,
      keyboard: 0,
    },
  }).evaluate(parseHtml(html));
  assert.equal(report.categories.structure, 80);
  assert.equal(report.overallScore, 40);
});

test("engine: policies can be swapped per engine", () => {
  const html = page('<a href="/a">click here</a>');
  assert.equal(evaluateDocument(parseHtml(html)).categories.links, 90);
  const report = new AccessibilityEngine({
    policies: { isGenericLinkText: () => false },
  }).evaluate(parseHtml(html));
  assert.equal(report.categories.links, 100);
});
