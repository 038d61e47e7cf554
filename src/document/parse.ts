import { JSDOM } from "jsdom";
import { InputError } from "../core/errors.js";
import type { HtmlDocument, RawNode } from "../core/types.js";
import { createDocument } from "./model.js";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

/**
 * Parses static markup into the engine's tag tree. Scripts are never run
 * and no subresources are fetched.
 */
export function parseHtml(markup: string): HtmlDocument {
  if (typeof markup !== "string" || markup.trim() === "") {
    throw new InputError("Document markup is empty.");
  }

  const dom = new JSDOM(markup);
  const root = dom.window.document.documentElement;

  try {
    return createDocument(toRawNode(root));
  } finally {
    dom.window.close();
  }
}

function toRawNode(element: Element): RawNode {
  const attributes: Record<string, string> = {};
  for (const attribute of Array.from(element.attributes)) {
    attributes[attribute.name] = attribute.value;
  }

  const children: Array<RawNode | string> = [];
  for (const child of Array.from(element.childNodes)) {
    if (child.nodeType === TEXT_NODE) {
      children.push(child.textContent ?? "");
      continue;
    }
    if (child.nodeType === ELEMENT_NODE && isElement(child)) {
      children.push(toRawNode(child));
    }
  }

  return {
    tagName: element.localName,
    attributes,
    children,
  };
}

function isElement(node: Node): node is Element {
  return "localName" in node && "attributes" in node;
}
