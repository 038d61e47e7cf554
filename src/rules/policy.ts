import { isLargeText } from "../core/color.js";
import type { HtmlDocument, HtmlElement, RulePolicies, Thresholds } from "../core/types.js";
import {
  ancestors,
  attrText,
  classNames,
  descendants,
  findAll,
  inlineStyle,
  textOf,
} from "../document/query.js";

export function isGenericLinkText(name: string, thresholds: Thresholds): boolean {
  const normalized = name
    .toLowerCase()
    .replace(/[\s.!?:;,»›>→…]+$/u, "")
    .trim();
  return thresholds.links.genericTexts.includes(normalized);
}

/**
 * An empty alt is only right for decoration. Treat the image as content when
 * it is the sole content of a link or button, or carries a title.
 */
export function isMeaningfulImage(image: HtmlElement, document: HtmlDocument): boolean {
  if (attrText(image, "title")) {
    return true;
  }

  const control = ancestors(document, image).find(
    (ancestor) => ancestor.tagName === "a" || ancestor.tagName === "button",
  );
  if (!control) {
    return false;
  }

  const otherImages = descendants(control).filter(
    (element) => element.tagName === "img" && element !== image,
  );
  return textOf(control) === "" && !attrText(control, "aria-label") && otherImages.every(
    (other) => !attrText(other, "alt"),
  );
}

const FOCUS_SIGNAL = /focus|outline/i;

export function hasFocusAffordance(element: HtmlElement, document: HtmlDocument): boolean {
  for (const [property, value] of inlineStyle(element)) {
    if (FOCUS_SIGNAL.test(property) && !removesOutline(property, value)) {
      return true;
    }
  }

  if (classNames(element).some((name) => FOCUS_SIGNAL.test(name))) {
    return true;
  }

  return findAll(document, "style").some((block) => block.text.includes(":focus"));
}

export function removesOutline(property: string, value: string): boolean {
  return (
    (property === "outline" || property === "outline-style" || property === "outline-width") &&
    /^(none|0(px)?)$/i.test(value.trim())
  );
}

export const DEFAULT_POLICIES: RulePolicies = {
  isGenericLinkText,
  isMeaningfulImage,
  hasFocusAffordance,
  isLargeText,
};

export function resolvePolicies(overrides?: Partial<RulePolicies>): RulePolicies {
  return { ...DEFAULT_POLICIES, ...overrides };
}
