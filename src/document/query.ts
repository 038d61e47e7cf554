import type { ElementRef, HtmlDocument, HtmlElement } from "../core/types.js";

const IDENTIFYING_ATTRIBUTES = ["id", "name", "src", "href", "for", "type", "class"];

export function findAll(document: HtmlDocument, ...tagNames: string[]): HtmlElement[] {
  const wanted = new Set(tagNames);
  return document.elements.filter((element) => wanted.has(element.tagName));
}

export function attr(element: HtmlElement, name: string): string | undefined {
  return element.attributes.get(name);
}

export function hasAttr(element: HtmlElement, name: string): boolean {
  return element.attributes.has(name);
}

/** Non-empty trimmed attribute value, or undefined. */
export function attrText(element: HtmlElement, name: string): string | undefined {
  const value = element.attributes.get(name)?.trim();
  return value ? value : undefined;
}

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function textOf(element: HtmlElement): string {
  return normalizeWhitespace(element.text);
}

export function parentOf(
  document: HtmlDocument,
  element: HtmlElement,
): HtmlElement | undefined {
  return element.parentIndex === undefined
    ? undefined
    : document.elements[element.parentIndex];
}

/** Nearest first. */
export function ancestors(document: HtmlDocument, element: HtmlElement): HtmlElement[] {
  const out: HtmlElement[] = [];
  let current = parentOf(document, element);
  while (current) {
    out.push(current);
    current = parentOf(document, current);
  }
  return out;
}

export function descendants(element: HtmlElement): HtmlElement[] {
  return element.children.flatMap((child) => [child, ...descendants(child)]);
}

export function findById(document: HtmlDocument, id: string): HtmlElement | undefined {
  return document.elements.find((element) => element.attributes.get("id") === id);
}

export function roles(element: HtmlElement): string[] {
  return (element.attributes.get("role") ?? "")
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean);
}

export function hasRole(element: HtmlElement, ...wanted: string[]): boolean {
  const own = roles(element);
  return wanted.some((role) => own.includes(role));
}

export function classNames(element: HtmlElement): string[] {
  return (element.attributes.get("class") ?? "").split(/\s+/).filter(Boolean);
}

/** Inline `style` declarations, property names lowercased. Last one wins. */
export function inlineStyle(element: HtmlElement): Map<string, string> {
  const declarations = new Map<string, string>();
  const style = element.attributes.get("style");
  if (!style) {
    return declarations;
  }

  for (const declaration of style.split(";")) {
    const colon = declaration.indexOf(":");
    if (colon <= 0) {
      continue;
    }
    const property = declaration.slice(0, colon).trim().toLowerCase();
    const value = declaration
      .slice(colon + 1)
      .replace(/!important\s*$/i, "")
      .trim();
    if (property && value) {
      declarations.set(property, value);
    }
  }

  return declarations;
}

export function describeElement(element: HtmlElement): ElementRef {
  for (const name of IDENTIFYING_ATTRIBUTES) {
    const value = attrText(element, name);
    if (value) {
      return { tagName: element.tagName, attribute: { name, value } };
    }
  }
  return { tagName: element.tagName };
}

export function formatElementRef(ref: ElementRef | undefined): string {
  if (!ref) {
    return "";
  }
  if (!ref.attribute) {
    return ref.tagName;
  }
  return `${ref.tagName}[${ref.attribute.name}="${ref.attribute.value}"]`;
}
