import { InputError } from "../core/errors.js";
import type { HtmlDocument, HtmlElement, RawNode } from "../core/types.js";

// Their text is never rendered, so it does not flow up into ancestors.
const OPAQUE_TEXT_TAGS = new Set(["script", "style", "template", "noscript"]);

interface MutableElement {
  index: number;
  tagName: string;
  attributes: ReadonlyMap<string, string>;
  children: HtmlElement[];
  text: string;
  ownText: string;
  parentIndex?: number;
}

/**
 * Builds the immutable tag tree the evaluators read. Accepts the plain
 * node shape so that any HTML parser can feed the engine.
 */
export function createDocument(root: RawNode | null | undefined): HtmlDocument {
  if (!root || typeof root !== "object" || typeof root.tagName !== "string") {
    throw new InputError("Document is missing or has no root element.");
  }

  const elements: HtmlElement[] = [];
  const rootElement = buildElement(root, elements, undefined);

  return Object.freeze({
    root: rootElement,
    elements: Object.freeze(elements),
  });
}

function buildElement(
  raw: RawNode,
  elements: HtmlElement[],
  parentIndex: number | undefined,
): HtmlElement {
  const tagName = raw.tagName.trim().toLowerCase();
  if (!tagName) {
    throw new InputError("Encountered an element without a tag name.");
  }

  const element: MutableElement = {
    index: elements.length,
    tagName,
    attributes: normalizeAttributes(raw.attributes),
    children: [],
    text: "",
    ownText: "",
    parentIndex,
  };
  // Reserve the slot before descending so indices follow document order.
  elements.push(element);

  const textParts: string[] = [];
  const ownParts: string[] = [];
  for (const child of raw.children ?? []) {
    if (typeof child === "string") {
      textParts.push(child);
      ownParts.push(child);
      continue;
    }

    const built = buildElement(child, elements, element.index);
    element.children.push(built);
    if (!OPAQUE_TEXT_TAGS.has(built.tagName)) {
      textParts.push(built.text);
    }
  }

  element.text = textParts.join("");
  element.ownText = ownParts.join("");
  Object.freeze(element.children);
  return Object.freeze(element);
}

function normalizeAttributes(
  attributes: Record<string, string> | undefined,
): ReadonlyMap<string, string> {
  const map = new Map<string, string>();
  for (const [name, value] of Object.entries(attributes ?? {})) {
    if (typeof value !== "string") {
      continue;
    }
    const key = name.trim().toLowerCase();
    if (key && !map.has(key)) {
      map.set(key, value);
    }
  }
  return map;
}
