import test from "node:test";
import assert from "node:assert/strict";
import { linksEvaluator } from "../src/rules/rule-links.js";
import { page, runRule } from "./helpers.js";

test("links: a page without links scores 100", () => {
  const result = runRule(linksEvaluator, page("<p>Nothing to follow</p>"));
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("links: anchors without href are not links", () => {
  const result = runRule(linksEvaluator, page('<a name="top"></a><a id="end"></a>'));
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("links: generic text is flagged once per link", () => {
  const result = runRule(
    linksEvaluator,
    page('<a href="/a">click here</a><a href="/b">Click here.</a>'),
  );
  assert.equal(result.score, 80);
  assert.deepEqual(
    result.issues.map((issue) => [issue.ruleId, issue.severity, issue.message]),
    [
      ["links/generic-text", "warning", "Non-descriptive link text: 'click here' for /a"],
      ["links/generic-text", "warning", "Non-descriptive link text: 'Click here.' for /b"],
    ],
  );
});

test("links: an empty link is critical", () => {
  const result = runRule(linksEvaluator, page('<a href="/x"></a>'));
  assert.equal(result.score, 90);
  assert.equal(result.issues[0].ruleId, "links/empty-text");
  assert.equal(result.issues[0].severity, "critical");
  assert.equal(result.issues[0].message, "Empty link text: /x");
});

test("links: the alt text of a linked image names the link", () => {
  const result = runRule(
    linksEvaluator,
    page('<a href="/home"><img src="h.png" alt="Home"></a>'),
  );
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("links: aria-label and aria-labelledby take precedence over text", () => {
  const result = runRule(
    linksEvaluator,
    page(
      '<h2 id="report">Annual report 2025</h2>' +
        '<a href="/report" aria-labelledby="report">Read more</a>' +
        '<a href="/press" aria-label="Press releases">more</a>',
    ),
  );
  assert.equal(result.score, 100);
  assert.deepEqual(result.issues, []);
});

test("links: the same text for different destinations is ambiguous", () => {
  const result = runRule(
    linksEvaluator,
    page(
      '<a href="/a">Pricing</a><a href="/b">Pricing</a><a href="/c">Docs</a><a href="/c">Docs</a>',
    ),
  );
  assert.equal(result.score, 80);
  assert.deepEqual(
    result.issues.map((issue) => issue.message),
    [
      "Link text 'Pricing' is used for 2 different destinations (/a)",
      "Link text 'Pricing' is used for 2 different destinations (/b)",
    ],
  );
});

test("links: deductions stop at the cap", () => {
  const body = Array.from({ length: 8 }, (_, index) => `<a href="/p${index}"></a>`).join("");
  const result = runRule(linksEvaluator, page(body));
  assert.equal(result.issues.length, 8);
  assert.equal(result.score, 40);
});

test("links: the generic-text policy can be replaced", () => {
  const html = page('<a href="/a">click here</a>');
  assert.equal(runRule(linksEvaluator, html).score, 90);
  const relaxed = runRule(linksEvaluator, html, {
    policies: { isGenericLinkText: () => false },
  });
  assert.equal(relaxed.score, 100);
});
