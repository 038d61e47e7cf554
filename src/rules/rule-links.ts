import type {
  CategoryEvaluator,
  CategoryResult,
  EvaluationContext,
  HtmlElement,
} from "../core/types.js";
import { attr, attrText, descendants, findAll, findById, textOf } from "../document/query.js";
import { checkEach, IssueCollector } from "./shared.js";

export const linksEvaluator: CategoryEvaluator = {
  category: "links",
  title: "Descriptive links",
  description: "Checks for empty, generic and ambiguous link text.",
  evaluate: (ctx) => evaluateLinks(ctx),
};

interface LinkInfo {
  element: HtmlElement;
  name: string;
  href: string;
}

function evaluateLinks(ctx: EvaluationContext): CategoryResult {
  const issues = new IssueCollector("links");
  const t = ctx.thresholds.links;
  const anchors = findAll(ctx.document, "a").filter((anchor) => attr(anchor, "href") !== undefined);

  const links = checkEach(anchors, issues, (anchor): LinkInfo => ({
    element: anchor,
    name: accessibleName(ctx, anchor),
    href: (attr(anchor, "href") ?? "").trim(),
  }));

  const destinationsByName = new Map<string, Set<string>>();
  for (const link of links) {
    const key = link.name.toLowerCase();
    if (!key) {
      continue;
    }
    const set = destinationsByName.get(key) ?? new Set<string>();
    set.add(link.href);
    destinationsByName.set(key, set);
  }

  let flagged = 0;
  for (const link of links) {
    const href = link.href || "unknown";

    if (!link.name) {
      flagged += 1;
      issues.add({
        ruleId: "empty-text",
        severity: "critical",
        message: `Empty link text: ${href}`,
        element: link.element,
        fix: "Add link text, an aria-label, or alt text on the linked image.",
      });
      continue;
    }

    if (ctx.policies.isGenericLinkText(link.name, ctx.thresholds)) {
      flagged += 1;
      issues.add({
        ruleId: "generic-text",
        severity: "warning",
        message: `Non-descriptive link text: '${link.name}' for ${href}`,
        element: link.element,
        fix: "Replace the text with a description of the destination.",
      });
      continue;
    }

    const destinations = destinationsByName.get(link.name.toLowerCase());
    if (destinations && destinations.size > 1) {
      flagged += 1;
      issues.add({
        ruleId: "ambiguous-text",
        severity: "warning",
        message: `Link text '${link.name}' is used for ${destinations.size} different destinations (${href})`,
        element: link.element,
        fix: "Make each link's text unique to its destination.",
      });
    }
  }

  return issues.result(100 - Math.min(t.maxDeduction, flagged * t.flaggedLink));
}

function accessibleName(ctx: EvaluationContext, anchor: HtmlElement): string {
  const labelledBy = attrText(anchor, "aria-labelledby");
  if (labelledBy) {
    const text = labelledBy
      .split(/\s+/)
      .map((id) => findById(ctx.document, id))
      .map((element) => (element ? textOf(element) : ""))
      .filter(Boolean)
      .join(" ");
    if (text) {
      return text;
    }
  }

  const ariaLabel = attrText(anchor, "aria-label");
  if (ariaLabel) {
    return ariaLabel;
  }

  const text = textOf(anchor);
  if (text) {
    return text;
  }

  const imageAlt = descendants(anchor)
    .filter((element) => element.tagName === "img")
    .map((image) => attrText(image, "alt"))
    .filter((alt): alt is string => Boolean(alt))
    .join(" ");
  if (imageAlt) {
    return imageAlt;
  }

  return attrText(anchor, "title") ?? "";
}
