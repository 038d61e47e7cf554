import type {
  CategoryEvaluator,
  CategoryResult,
  EvaluationContext,
  HtmlElement,
  Severity,
} from "../core/types.js";
import { attrText, findAll, hasRole, textOf } from "../document/query.js";
import { IssueCollector } from "./shared.js";

interface Landmark {
  tag: string;
  role: string;
  severity: Severity;
  deduction: (ctx: EvaluationContext) => number;
  fix: string;
}

const LANDMARKS: Landmark[] = [
  {
    tag: "header",
    role: "banner",
    severity: "info",
    deduction: (ctx) => ctx.thresholds.structure.missingBanner,
    fix: "Wrap the site header in a <header> element.",
  },
  {
    tag: "nav",
    role: "navigation",
    severity: "info",
    deduction: (ctx) => ctx.thresholds.structure.missingNavigation,
    fix: "Wrap primary navigation links in a <nav> element.",
  },
  {
    tag: "main",
    role: "main",
    severity: "warning",
    deduction: (ctx) => ctx.thresholds.structure.missingMain,
    fix: "Wrap the page's primary content in a single <main> element.",
  },
  {
    tag: "footer",
    role: "contentinfo",
    severity: "info",
    deduction: (ctx) => ctx.thresholds.structure.missingContentInfo,
    fix: "Wrap the site footer in a <footer> element.",
  },
];

export const structureEvaluator: CategoryEvaluator = {
  category: "structure",
  title: "Page structure",
  description: "Checks landmarks, the document language and the page title.",
  evaluate: (ctx) => evaluateStructure(ctx),
};

function evaluateStructure(ctx: EvaluationContext): CategoryResult {
  const issues = new IssueCollector("structure");
  const t = ctx.thresholds.structure;
  const { document } = ctx;
  let deduction = 0;

  const root = document.root;
  if (!attrText(root, "lang")) {
    deduction += t.missingLang;
    issues.add({
      ruleId: "missing-lang",
      severity: "critical",
      message: "Page language is not declared on <html>",
      element: root,
      fix: 'Add a lang attribute, e.g. <html lang="en">.',
    });
  }

  const title = findAll(document, "title")[0];
  if (!title || textOf(title) === "") {
    deduction += t.missingTitle;
    issues.add({
      ruleId: "missing-title",
      severity: "warning",
      message: "Page has no <title>",
      fix: "Add a descriptive <title> to the document head.",
    });
  }

  for (const landmark of LANDMARKS) {
    const found = landmarkElements(ctx, landmark);
    if (found.length === 0) {
      deduction += landmark.deduction(ctx);
      issues.add({
        ruleId: `missing-${landmark.role}`,
        severity: landmark.severity,
        message: `No <${landmark.tag}> element found`,
        fix: landmark.fix,
      });
      continue;
    }

    if (landmark.role === "main" && found.length > 1) {
      deduction += t.multipleMain;
      issues.add({
        ruleId: "multiple-main",
        severity: "warning",
        message: `Multiple main landmarks found (${found.length})`,
        element: found[1],
        fix: "Keep one visible main landmark per page.",
      });
    }
  }

  return issues.result(100 - deduction);
}

function landmarkElements(ctx: EvaluationContext, landmark: Landmark): HtmlElement[] {
  return ctx.document.elements.filter(
    (element) =>
      (element.tagName === landmark.tag || hasRole(element, landmark.role)) &&
      element.attributes.get("hidden") === undefined,
  );
}
