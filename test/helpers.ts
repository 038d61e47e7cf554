import { readFileSync } from "node:fs";
import { join } from "node:path";
import { DEFAULT_THRESHOLDS } from "../src/config/schema.js";
import type {
  CategoryEvaluator,
  CategoryResult,
  RulePolicies,
  Thresholds,
} from "../src/core/types.js";
import { parseHtml } from "../src/document/parse.js";
import { resolvePolicies } from "../src/rules/policy.js";

export function runRule(
  evaluator: CategoryEvaluator,
  html: string,
  overrides: { thresholds?: Thresholds; policies?: Partial<RulePolicies> } = {},
): CategoryResult {
  return evaluator.evaluate({
    document: parseHtml(html),
    thresholds: overrides.thresholds ?? DEFAULT_THRESHOLDS,
    policies: resolvePolicies(overrides.policies),
  });
}

export function page(body: string, head = "<title>Test page</title>", lang = "en"): string {
  return `<!DOCTYPE html><html lang="${lang}"><head>${head}</head><body>${body}</body></html>`;
}

export function readFixture(name: string): string {
  return readFileSync(join(process.cwd(), "test/fixtures", name), "utf8");
}
