import type { CategoryEvaluator, CategoryResult, EvaluationContext } from "../core/types.js";
import { findAll, textOf } from "../document/query.js";
import { checkEach, IssueCollector } from "./shared.js";

const HEADING_TAGS = ["h1", "h2", "h3", "h4", "h5", "h6"];

export const headingsEvaluator: CategoryEvaluator = {
  category: "headings",
  title: "Heading structure",
  description: "Checks for a single h1, skipped heading levels and empty headings.",
  evaluate: (ctx) => evaluateHeadings(ctx),
};

function evaluateHeadings(ctx: EvaluationContext): CategoryResult {
  const issues = new IssueCollector("headings");
  const t = ctx.thresholds.headings;
  const headings = findAll(ctx.document, ...HEADING_TAGS);

  if (headings.length === 0) {
    return issues.result(100);
  }

  let deduction = 0;
  const h1s = headings.filter((heading) => heading.tagName === "h1");

  if (h1s.length === 0) {
    deduction += t.missingH1;
    issues.add({
      ruleId: "missing-h1",
      severity: "critical",
      message: "No H1 heading found",
      fix: "Add a single h1 that names the page's main topic.",
    });
  } else if (h1s.length > 1) {
    deduction += t.multipleH1;
    issues.add({
      ruleId: "multiple-h1",
      severity: "warning",
      message: `Multiple H1 headings found (${h1s.length})`,
      element: h1s[1],
      fix: "Keep one h1 for the page title and demote the others to h2.",
    });
  }

  let previousLevel = 0;
  let skipDeduction = 0;
  checkEach(headings, issues, (heading) => {
    const level = Number(heading.tagName.slice(1));

    if (previousLevel > 0 && level > previousLevel + 1) {
      skipDeduction += t.levelSkip;
      issues.add({
        ruleId: "level-skip",
        severity: "warning",
        message: `Heading level skip from h${previousLevel} to h${level}`,
        element: heading,
        fix: `Use an h${previousLevel + 1} here, or restructure so levels descend one step at a time.`,
      });
    }
    previousLevel = level;

    if (textOf(heading) === "") {
      deduction += t.emptyHeading;
      issues.add({
        ruleId: "empty-heading",
        severity: "warning",
        message: `Empty <${heading.tagName}> heading`,
        element: heading,
        fix: "Give the heading visible text or remove it.",
      });
    }
  });

  deduction += Math.min(t.maxLevelSkip, skipDeduction);
  return issues.result(100 - deduction);
}
