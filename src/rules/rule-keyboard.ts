import type {
  CategoryEvaluator,
  CategoryResult,
  EvaluationContext,
  HtmlElement,
} from "../core/types.js";
import { attr, hasAttr, hasRole, inlineStyle } from "../document/query.js";
import { removesOutline } from "./policy.js";
import { checkEach, IssueCollector } from "./shared.js";

const NATIVE_CONTROLS = new Set(["button", "select", "textarea"]);

const INTERACTIVE_ROLES = [
  "button",
  "link",
  "checkbox",
  "radio",
  "switch",
  "tab",
  "menuitem",
  "menuitemcheckbox",
  "menuitemradio",
  "option",
  "textbox",
  "combobox",
  "slider",
  "spinbutton",
  "searchbox",
  "treeitem",
];

export const keyboardEvaluator: CategoryEvaluator = {
  category: "keyboard",
  title: "Keyboard access",
  description:
    "Checks tab order, focusability of custom widgets and visible focus signals.",
  evaluate: (ctx) => evaluateKeyboard(ctx),
};

export function isNativelyFocusable(element: HtmlElement): boolean {
  if (element.tagName === "a") {
    return hasAttr(element, "href");
  }
  if (element.tagName === "input") {
    return (attr(element, "type") ?? "").trim().toLowerCase() !== "hidden";
  }
  return NATIVE_CONTROLS.has(element.tagName);
}

function isCustomWidget(element: HtmlElement): boolean {
  return (
    !isNativelyFocusable(element) &&
    (hasAttr(element, "onclick") || hasRole(element, ...INTERACTIVE_ROLES))
  );
}

function evaluateKeyboard(ctx: EvaluationContext): CategoryResult {
  const issues = new IssueCollector("keyboard");
  const t = ctx.thresholds.keyboard;
  const interactive = ctx.document.elements.filter(
    (element) => isNativelyFocusable(element) || isCustomWidget(element),
  );

  const deductions = checkEach(interactive, issues, (element) => {
    let deduction = 0;
    const tabindexRaw = attr(element, "tabindex");
    const tabindex = tabindexRaw === undefined ? undefined : Number.parseInt(tabindexRaw, 10);
    const custom = isCustomWidget(element);

    if (tabindex !== undefined && tabindex < 0) {
      deduction += t.negativeTabindex;
      issues.add({
        ruleId: "negative-tabindex",
        severity: "warning",
        message: `Interactive <${element.tagName}> removed from tab order (tabindex="${tabindexRaw}")`,
        element,
        fix: 'Remove tabindex="-1" so keyboard users can reach this control.',
      });
    } else if (tabindex !== undefined && tabindex > 0) {
      deduction += t.positiveTabindex;
      issues.add({
        ruleId: "positive-tabindex",
        severity: "warning",
        message: `Positive tabindex="${tabindexRaw}" overrides the natural tab order`,
        element,
        fix: 'Use tabindex="0" and order the markup to match the visual order.',
      });
    } else if (custom && (tabindex === undefined || Number.isNaN(tabindex))) {
      deduction += t.unfocusableWidget;
      issues.add({
        ruleId: "unfocusable-widget",
        severity: "critical",
        message: `<${element.tagName}> handles clicks but cannot receive keyboard focus`,
        element,
        fix: 'Use a <button> or <a href>, or add tabindex="0" and key handlers for Enter and Space.',
      });
    }

    const outlineRemoved = Array.from(inlineStyle(element)).some(([property, value]) =>
      removesOutline(property, value),
    );
    if (outlineRemoved) {
      deduction += t.outlineRemoved;
      issues.add({
        ruleId: "outline-removed",
        severity: "warning",
        message: `Focus outline removed inline on <${element.tagName}>`,
        element,
        fix: "Keep the outline or replace it with a visible :focus-visible style.",
      });
    } else if (custom && !ctx.policies.hasFocusAffordance(element, ctx.document)) {
      // Static markup cannot prove a focus style is missing; report without deducting.
      issues.add({
        ruleId: "no-focus-style",
        severity: "warning",
        message: `No visible focus style detected for custom widget <${element.tagName}>`,
        element,
        fix: "Provide a :focus-visible style so keyboard users can see where focus is.",
      });
    }

    return deduction;
  });

  const total = deductions.reduce((sum, value) => sum + value, 0);
  return issues.result(100 - total);
}
