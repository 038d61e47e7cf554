import type {
  CategoryEvaluator,
  CategoryResult,
  EvaluationContext,
  HtmlElement,
} from "../core/types.js";
import { attr, attrText, findAll, hasRole, normalizeWhitespace } from "../document/query.js";
import { checkEach, IssueCollector, ratioScore } from "./shared.js";

export const imagesEvaluator: CategoryEvaluator = {
  category: "images",
  title: "Image text alternatives",
  description: "Checks alt text presence, decorative use of empty alt and alt length.",
  evaluate: (ctx) => evaluateImages(ctx),
};

function evaluateImages(ctx: EvaluationContext): CategoryResult {
  const issues = new IssueCollector("images");
  const images = findAll(ctx.document, "img");

  const verdicts = checkEach(images, issues, (image) => {
    if (!attrText(image, "src") && !attrText(image, "srcset")) {
      issues.add({
        ruleId: "missing-src",
        severity: "info",
        message: "Image has no src; it may be injected by script and cannot be assessed.",
        element: image,
      });
    }
    return checkImage(ctx, issues, image);
  });

  const acceptable = verdicts.filter(Boolean).length;
  return issues.result(ratioScore(acceptable, verdicts.length));
}

function checkImage(
  ctx: EvaluationContext,
  issues: IssueCollector,
  image: HtmlElement,
): boolean {
  const alt = attr(image, "alt");
  const ariaLabel = attrText(image, "aria-label") ?? attrText(image, "aria-labelledby");

  if (alt === undefined) {
    if (ariaLabel || hasRole(image, "presentation", "none") || attr(image, "aria-hidden") === "true") {
      return true;
    }
    issues.add({
      ruleId: "missing-alt",
      severity: "critical",
      message: `Image missing alt attribute: ${attrText(image, "src") ?? "unknown"}`,
      element: image,
      fix: 'Add alt text describing the image, or alt="" if it is purely decorative.',
    });
    return false;
  }

  const text = normalizeWhitespace(alt);
  if (text === "") {
    if (ariaLabel || !ctx.policies.isMeaningfulImage(image, ctx.document)) {
      return true;
    }
    issues.add({
      ruleId: "empty-alt-on-content",
      severity: "warning",
      message: `Image has empty alt text but appears to convey content: ${
        attrText(image, "src") ?? "unknown"
      }`,
      element: image,
      fix: "Describe the image's purpose in its alt text, e.g. the destination of the link it sits in.",
    });
    return false;
  }

  const limit = ctx.thresholds.images.maxAltLength;
  if (text.length > limit) {
    issues.add({
      ruleId: "alt-too-long",
      severity: "warning",
      message: `Alt text is ${text.length} characters (limit ${limit}).`,
      element: image,
      fix: "Shorten the alt text; move long descriptions into surrounding text or a caption.",
    });
    return false;
  }

  return true;
}
