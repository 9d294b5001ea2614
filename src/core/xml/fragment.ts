/**
 * Documentation Fragment Model
 *
 * Parses XML documentation comments into an immutable element tree. The
 * annotation extractors only ever read names, attributes and text, so the
 * xmldom document is converted once and dropped.
 *
 * @module
 */

import { DOMParser } from "@xmldom/xmldom";
import { ErrorCode, XmlParseError } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("xml");

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

// =============================================================================
// Types
// =============================================================================

export interface DocText {
  readonly kind: "text";
  readonly value: string;
}

export interface DocElement {
  readonly kind: "element";
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly DocNode[];
}

export type DocNode = DocElement | DocText;

// =============================================================================
// Parsing
// =============================================================================

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isTextLike(node: Node): boolean {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

function convertElement(element: Element): DocElement {
  const attributes: Record<string, string> = {};
  for (let i = 0; i < element.attributes.length; i++) {
    const attr = element.attributes.item(i);
    if (attr) attributes[attr.name] = attr.value;
  }

  const children: DocNode[] = [];
  for (let i = 0; i < element.childNodes.length; i++) {
    const child = element.childNodes.item(i);
    if (!child) continue;
    if (isElement(child)) {
      children.push(convertElement(child));
    } else if (isTextLike(child)) {
      children.push(Object.freeze({ kind: "text" as const, value: child.nodeValue ?? "" }));
    }
  }

  return Object.freeze({
    kind: "element" as const,
    name: element.tagName,
    attributes: Object.freeze(attributes),
    children: Object.freeze(children),
  });
}

/**
 * Parse an XML documentation fragment.
 *
 * @example
 * ```typescript
 * const parsed = parseFragment("<parent><example><value>42</value></example></parent>");
 * if (parsed.ok) console.log(parsed.value.name); // "parent"
 * ```
 */
export function parseFragment(xml: string): Result<DocElement, XmlParseError> {
  if (xml.trim().length === 0) {
    return err(new XmlParseError("Documentation fragment is empty", ErrorCode.XML_EMPTY_INPUT));
  }

  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: (msg: string) => logger.debug({ msg }, "XML parser warning"),
      error: (msg: string) => problems.push(msg),
      fatalError: (msg: string) => problems.push(msg),
    },
  });

  let document: Document;
  try {
    document = parser.parseFromString(xml, "text/xml");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new XmlParseError(`Invalid documentation fragment: ${message}`));
  }

  if (problems.length > 0) {
    return err(
      new XmlParseError(`Invalid documentation fragment: ${problems[0]}`, ErrorCode.XML_PARSE_FAILED, {
        problems,
      })
    );
  }

  const root = document.documentElement;
  if (!root) {
    return err(new XmlParseError("Documentation fragment has no root element"));
  }

  return ok(convertElement(root));
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Direct child elements, optionally filtered by (case-sensitive) name
 */
export function childElements(element: DocElement, name?: string): DocElement[] {
  const result: DocElement[] = [];
  for (const child of element.children) {
    if (child.kind === "element" && (name === undefined || child.name === name)) {
      result.push(child);
    }
  }
  return result;
}

export function firstChildElement(element: DocElement, name: string): DocElement | undefined {
  return childElements(element, name)[0];
}

/**
 * All descendant elements with the given name, in document order
 */
export function descendantElements(element: DocElement, name: string): DocElement[] {
  const result: DocElement[] = [];
  const visit = (node: DocElement): void => {
    for (const child of childElements(node)) {
      if (child.name === name) result.push(child);
      visit(child);
    }
  };
  visit(element);
  return result;
}

export function getAttribute(element: DocElement, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(element.attributes, name)
    ? element.attributes[name]
    : undefined;
}

/**
 * Concatenated text of all descendant text nodes, like the DOM's textContent
 */
export function textContent(node: DocNode): string {
  if (node.kind === "text") return node.value;
  return node.children.map(textContent).join("");
}
