import { colorToString, contrastRatio, parseCssColor, type Rgba } from "../core/color.js";
import type {
  CategoryEvaluator,
  CategoryResult,
  EvaluationContext,
  HtmlElement,
} from "../core/types.js";
import { ancestors, inlineStyle, normalizeWhitespace } from "../document/query.js";
import { checkEach, IssueCollector, ratioScore } from "./shared.js";

// Text of these is never painted.
const NON_RENDERED_TAGS = new Set(["script", "style", "template", "noscript", "head", "title"]);

export const contrastEvaluator: CategoryEvaluator = {
  category: "contrast",
  title: "Color contrast",
  description:
    "Checks inline text/background color pairs against 4.5:1 (normal) and 3:1 (large text).",
  evaluate: (ctx) => evaluateContrast(ctx),
};

type Verdict = "pass" | "fail" | "skipped";

function evaluateContrast(ctx: EvaluationContext): CategoryResult {
  const issues = new IssueCollector("contrast");
  const candidates = ctx.document.elements.filter(
    (element) =>
      !NON_RENDERED_TAGS.has(element.tagName) &&
      inlineStyle(element).has("color") &&
      paintedText(element) !== "",
  );

  const verdicts = checkEach(candidates, issues, (element): Verdict => {
    const background = resolveBackground(ctx, element, issues);
    if (!background) {
      return "skipped";
    }

    const declared = inlineStyle(element).get("color") ?? "";
    const foreground = parseCssColor(declared);
    if (!foreground) {
      issues.add({
        ruleId: "unparseable-color",
        severity: "info",
        message: `Could not resolve text color '${declared}'; contrast not checked.`,
        element,
      });
      return "skipped";
    }

    const { fontSizePx, fontWeight } = fontMetrics(ctx, element);
    const large = ctx.policies.isLargeText(fontSizePx, fontWeight);
    const threshold = large
      ? ctx.thresholds.contrast.largeText
      : ctx.thresholds.contrast.normalText;
    const ratio = contrastRatio(foreground, background);

    if (ratio >= threshold) {
      return "pass";
    }

    issues.add({
      ruleId: "insufficient-contrast",
      severity: "critical",
      message: `Text contrast ratio ${ratio.toFixed(2)}:1 is below required ${threshold.toFixed(
        1,
      )}:1 (${colorToString(foreground)} on ${colorToString(background)}).`,
      element,
      fix: large
        ? "Darken or lighten the text or background until the pair reaches 3:1."
        : "Darken or lighten the text or background until the pair reaches 4.5:1, or enlarge the text.",
    });
    return "fail";
  });

  const assessed = verdicts.filter((verdict) => verdict !== "skipped");
  const passing = assessed.filter((verdict) => verdict === "pass").length;
  return issues.result(ratioScore(passing, assessed.length));
}

/**
 * Text painted in the element's own color. Descendants that declare a
 * color of their own are candidates in their own right.
 */
function paintedText(element: HtmlElement): string {
  const parts = [element.ownText];
  for (const child of element.children) {
    if (NON_RENDERED_TAGS.has(child.tagName) || inlineStyle(child).has("color")) {
      continue;
    }
    parts.push(paintedText(child));
  }
  return normalizeWhitespace(parts.join(" "));
}

/**
 * Nearest explicit background on the element or an ancestor. Fully
 * transparent layers are looked through.
 */
function resolveBackground(
  ctx: EvaluationContext,
  element: HtmlElement,
  issues: IssueCollector,
): Rgba | undefined {
  for (const layer of [element, ...ancestors(ctx.document, element)]) {
    const style = inlineStyle(layer);
    const declared = style.get("background-color") ?? style.get("background");
    if (declared === undefined) {
      continue;
    }

    const color = parseCssColor(declared);
    if (!color) {
      if (style.has("background-color")) {
        issues.add({
          ruleId: "unparseable-color",
          severity: "info",
          message: `Could not resolve background color '${declared}'; contrast not checked.`,
          element: layer,
        });
      }
      // Shorthand with an image or gradient: the painted color is unknown.
      return undefined;
    }

    if (color.a === 0) {
      continue;
    }
    return color;
  }

  return undefined;
}

function fontMetrics(
  ctx: EvaluationContext,
  element: HtmlElement,
): { fontSizePx?: number; fontWeight?: number } {
  let fontSizePx: number | undefined;
  let fontWeight: number | undefined;

  for (const layer of [element, ...ancestors(ctx.document, element)]) {
    const style = inlineStyle(layer);
    if (fontSizePx === undefined) {
      const size = style.get("font-size");
      fontSizePx = size === undefined ? undefined : parseFontSize(size);
    }
    if (fontWeight === undefined) {
      const weight = style.get("font-weight");
      fontWeight = weight === undefined ? undefined : parseFontWeight(weight);
    }
    if (fontWeight === undefined && (layer.tagName === "b" || layer.tagName === "strong")) {
      fontWeight = 700;
    }
  }

  return { fontSizePx, fontWeight };
}

export function parseFontSize(value: string): number | undefined {
  const match = /^(\d*\.?\d+)(px|pt|em|rem)?$/i.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const amount = Number(match[1]);
  switch ((match[2] ?? "px").toLowerCase()) {
    case "pt":
      return (amount * 4) / 3;
    case "em":
    case "rem":
      return amount * 16;
    default:
      return amount;
  }
}

function parseFontWeight(value: string): number | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "bold" || normalized === "bolder") {
    return 700;
  }
  if (normalized === "normal" || normalized === "lighter") {
    return 400;
  }
  const numeric = Number(normalized);
  return Number.isFinite(numeric) ? numeric : undefined;
}
