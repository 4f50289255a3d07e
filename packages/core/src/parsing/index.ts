import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ParseError } from "../errors";
import type { ParsedResponse } from "../types";

const ATTRIBUTE_PREFIX = "@_";
const TEXT_NODE = "#text";

/**
 * Decodes a newline-delimited `KEY=value` body.
 *
 * Each non-empty line is split on its first `=` only, so values may contain
 * `=` themselves. No unescaping is applied.
 *
 * @param body - The raw response body
 * @returns Flat field mapping
 *
 * @example
 * ```typescript
 * parseKeyValueBody("status=APPROVED\ntxid=42\n"); // { status: "APPROVED", txid: "42" }
 * ```
 */
export function parseKeyValueBody(body: string): ParsedResponse {
  const response: ParsedResponse = {};

  for (const rawLine of body.split("\n")) {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (line.trim() === "") {
      continue;
    }

    const separator = line.indexOf("=");
    if (separator === -1) {
      response[line] = "";
    } else {
      response[line.slice(0, separator)] = line.slice(separator + 1);
    }
  }

  return response;
}

export interface XmlAttributeParserOptions {
  /**
   * Elements whose text content is added to the mapping under their own
   * name, wherever they occur in the document. Entities are decoded and CDATA
   * sections are joined into the text.
   */
  textElements?: readonly string[];
}

/**
 * Decodes an XML body into the attributes of its root element, plus the text
 * of any configured text elements.
 *
 * @param body - The raw response body
 * @param options - Elements to extract as text
 * @returns Flat field mapping
 * @throws ParseError if the body is not well-formed XML or has no root element
 */
export function parseXmlAttributes(
  body: string,
  options: XmlAttributeParserOptions = {},
): ParsedResponse {
  const textElements = options.textElements ?? [];

  const validation = XMLValidator.validate(body);
  if (validation !== true) {
    throw new ParseError(
      `Malformed XML response: ${validation.err.msg} (line ${validation.err.line})`,
      body,
    );
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
  });

  const document: unknown = parser.parse(body);
  const root = findRootElement(document);
  if (root === undefined) {
    throw new ParseError("XML response has no root element", body);
  }

  const response: ParsedResponse = {};
  if (isRecord(root)) {
    for (const [key, value] of Object.entries(root)) {
      if (key.startsWith(ATTRIBUTE_PREFIX) && typeof value === "string") {
        response[key.slice(ATTRIBUTE_PREFIX.length)] = value;
      }
    }
  }

  for (const name of textElements) {
    const text = findElementText(document, name);
    if (text !== undefined) {
      response[name] = text;
    }
  }

  return response;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function findRootElement(document: unknown): unknown {
  if (!isRecord(document)) {
    return undefined;
  }
  const rootName = Object.keys(document).find(key => key !== TEXT_NODE && !key.startsWith(ATTRIBUTE_PREFIX));
  return rootName === undefined ? undefined : document[rootName];
}

/**
 * Depth-first search for the first element with the given name.
 */
function findElementText(node: unknown, name: string): string | undefined {
  if (Array.isArray(node)) {
    for (const item of node) {
      const text = findElementText(item, name);
      if (text !== undefined) return text;
    }
    return undefined;
  }

  if (!isRecord(node)) {
    return undefined;
  }

  if (name in node) {
    return elementText(node[name]);
  }

  for (const [key, child] of Object.entries(node)) {
    if (key.startsWith(ATTRIBUTE_PREFIX) || key === TEXT_NODE) continue;
    const text = findElementText(child, name);
    if (text !== undefined) return text;
  }
  return undefined;
}

function elementText(element: unknown): string {
  if (Array.isArray(element)) {
    return elementText(element[0]);
  }
  if (typeof element === "string") {
    return element;
  }
  if (typeof element === "number" || typeof element === "boolean") {
    return String(element);
  }
  if (isRecord(element)) {
    const text = element[TEXT_NODE];
    return typeof text === "string" ? text : "";
  }
  return "";
}
