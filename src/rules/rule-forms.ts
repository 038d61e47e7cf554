import type {
  CategoryEvaluator,
  CategoryResult,
  EvaluationContext,
  HtmlElement,
} from "../core/types.js";
import { ancestors, attr, attrText, findAll, findById } from "../document/query.js";
import { checkEach, IssueCollector, ratioScore } from "./shared.js";

// These carry their own accessible name (value, alt) or are not user-facing.
const EXCLUDED_INPUT_TYPES = new Set(["hidden", "submit", "reset", "button", "image"]);

export const formsEvaluator: CategoryEvaluator = {
  category: "forms",
  title: "Form labels",
  description: "Checks that every form control has an associated label.",
  evaluate: (ctx) => evaluateForms(ctx),
};

function evaluateForms(ctx: EvaluationContext): CategoryResult {
  const issues = new IssueCollector("forms");
  const labels = findAll(ctx.document, "label");

  const labelTargets = new Set<string>();
  const orphans: Array<{ label: HtmlElement; target: string }> = [];
  for (const label of labels) {
    const target = attrText(label, "for");
    if (!target) {
      continue;
    }
    labelTargets.add(target);
    if (!findById(ctx.document, target)) {
      orphans.push({ label, target });
    }
  }

  const controls = findAll(ctx.document, "input", "select", "textarea").filter(isLabellableControl);

  // A page with nothing to label stays clean.
  if (controls.length > 0) {
    for (const { label, target } of orphans) {
      issues.add({
        ruleId: "orphan-label",
        severity: "info",
        message: `Label references missing control id '${target}'`,
        element: label,
        fix: "Point the label's for attribute at the id of the control it describes.",
      });
    }
  }

  const verdicts = checkEach(controls, issues, (control) => {
    if (isLabelled(ctx, control, labelTargets)) {
      return true;
    }

    const placeholder = attrText(control, "placeholder");
    issues.add({
      ruleId: "missing-label",
      severity: "critical",
      message: `Form control missing label: ${attrText(control, "name") ?? "unnamed"} ${
        control.tagName === "input" ? (attrText(control, "type") ?? "text") : control.tagName
      }`,
      element: control,
      fix: placeholder
        ? `Add a <label> for this control; the placeholder "${placeholder}" disappears on input and is not a label.`
        : "Add a <label for> matching the control's id, wrap the control in a <label>, or set aria-label.",
    });
    return false;
  });

  const labelled = verdicts.filter(Boolean).length;
  return issues.result(ratioScore(labelled, verdicts.length));
}

function isLabellableControl(control: HtmlElement): boolean {
  if (control.tagName !== "input") {
    return true;
  }
  const type = (attr(control, "type") ?? "text").trim().toLowerCase();
  return !EXCLUDED_INPUT_TYPES.has(type);
}

function isLabelled(
  ctx: EvaluationContext,
  control: HtmlElement,
  labelTargets: Set<string>,
): boolean {
  const id = attrText(control, "id");
  if (id && labelTargets.has(id)) {
    return true;
  }

  if (ancestors(ctx.document, control).some((ancestor) => ancestor.tagName === "label")) {
    return true;
  }

  if (attrText(control, "aria-label")) {
    return true;
  }

  const labelledBy = attrText(control, "aria-labelledby");
  return Boolean(
    labelledBy && labelledBy.split(/\s+/).some((ref) => findById(ctx.document, ref)),
  );
}
