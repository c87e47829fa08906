/**
 * SVG decoder.
 *
 * Parses the source with @xmldom/xmldom and reads the supported elements
 * (`rect`, `text`, `path`, `linearGradient`/`stop`) from the root `<svg>`.
 * Gradients are also read from a `<defs>` child of the root. Anything else
 * is ignored and reported through `onWarning`.
 */

import { type Document, DOMParser, type Element, type Node } from "@xmldom/xmldom";
import { DecodeError } from "#src/errors";
import { parseDecimal } from "#src/helpers/format";
import type {
  SvgGradient,
  SvgPath,
  SvgRecord,
  SvgRect,
  SvgStop,
  SvgText,
  WarningHandler,
} from "./types";

export const SVG_NAMESPACE = "http://www.w3.org/2000/svg";

// DOM node types
const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

export interface DecodeOptions {
  onWarning?: WarningHandler;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/**
 * Elements count as SVG when they are in the SVG namespace or in none.
 */
function isSvgElement(element: Element, localName?: string): boolean {
  const ns = element.namespaceURI;

  if (ns && ns !== SVG_NAMESPACE) {
    return false;
  }

  return localName === undefined || element.localName === localName;
}

function childElements(parent: Element): Element[] {
  const result: Element[] = [];

  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes.item(i);

    if (node && isElement(node)) {
      result.push(node);
    }
  }

  return result;
}

/**
 * Character data directly inside an element; nested elements are skipped.
 */
function directText(element: Element): string {
  let text = "";

  for (let i = 0; i < element.childNodes.length; i++) {
    const node = element.childNodes.item(i);

    if (node && (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE)) {
      text += node.nodeValue ?? "";
    }
  }

  return text;
}

// xmldom's getAttribute returns "" for a missing attribute
function attribute(element: Element, name: string): string | undefined {
  return element.getAttributeNode(name)?.value;
}

/**
 * Read a numeric attribute. Absent or blank is 0; anything that is not a
 * plain decimal fails the decode.
 */
function numberAttribute(element: Element, name: string): number {
  const raw = attribute(element, name);

  if (raw === undefined || raw.trim() === "") {
    return 0;
  }

  const value = parseDecimal(raw);

  if (value === undefined) {
    throw new DecodeError(`attribute ${name}="${raw}" on <${element.localName}> is not a number`);
  }

  return value;
}

function decodeRect(element: Element): SvgRect {
  return {
    x: numberAttribute(element, "x"),
    y: numberAttribute(element, "y"),
    width: numberAttribute(element, "width"),
    height: numberAttribute(element, "height"),
    stroke: attribute(element, "stroke"),
  };
}

function decodeText(element: Element): SvgText {
  return {
    x: numberAttribute(element, "x"),
    y: numberAttribute(element, "y"),
    content: directText(element),
  };
}

function decodePath(element: Element): SvgPath {
  return { d: attribute(element, "d") ?? "" };
}

function decodeGradient(element: Element): SvgGradient {
  const stops: SvgStop[] = childElements(element)
    .filter(child => isSvgElement(child, "stop"))
    .map(stop => ({
      offset: attribute(stop, "offset"),
      color: attribute(stop, "stop-color"),
    }));

  return {
    id: attribute(element, "id"),
    x1: numberAttribute(element, "x1"),
    y1: numberAttribute(element, "y1"),
    x2: numberAttribute(element, "x2"),
    y2: numberAttribute(element, "y2"),
    stops,
  };
}

/**
 * First line of an xmldom message, without its level prefix or locator.
 */
function parserMessage(message: string): string {
  const [firstLine = ""] = message.split("\n");

  return firstLine
    .replace(/^\[xmldom \w+\]\s*/, "")
    .replace(/\s*@#\[line:[^\]]*\]$/, "")
    .trim();
}

/**
 * Parse XML, failing on the first error xmldom reports.
 *
 * Errors are recorded rather than thrown from the handler: xmldom catches
 * exceptions raised inside its own callbacks. Fatal errors abort the parse
 * with a ParseError, which is replaced by the recorded message.
 */
function parseXml(source: string): Document {
  let firstError: string | undefined;

  const parser = new DOMParser({
    onError: (level, message) => {
      if (level !== "warning" && firstError === undefined) {
        firstError = parserMessage(message);
      }
    },
  });

  let document: Document;

  try {
    document = parser.parseFromString(source, "image/svg+xml");
  } catch (error) {
    const message = error instanceof Error ? parserMessage(error.message) : String(error);

    throw new DecodeError(firstError ?? message, error);
  }

  if (firstError !== undefined) {
    throw new DecodeError(firstError);
  }

  return document;
}

/**
 * Decode an SVG document into an {@link SvgRecord}.
 *
 * @throws {DecodeError} for malformed XML, a root other than `<svg>`, or a
 *   numeric attribute that is not a plain decimal
 */
export function decodeSvg(source: string, options: DecodeOptions = {}): SvgRecord {
  const warn = (message: string) => options.onWarning?.(message);
  const root = parseXml(source).documentElement;

  if (!root) {
    throw new DecodeError("document has no root element");
  }

  if (!isSvgElement(root, "svg")) {
    throw new DecodeError(`expected root element <svg>, found <${root.tagName}>`);
  }

  const record: SvgRecord = {
    width: attribute(root, "width"),
    height: attribute(root, "height"),
    rects: [],
    texts: [],
    paths: [],
    gradients: [],
  };

  for (const element of childElements(root)) {
    if (!isSvgElement(element)) {
      warn(`Ignoring element <${element.tagName}> outside the SVG namespace`);
      continue;
    }

    switch (element.localName) {
      case "rect":
        record.rects.push(decodeRect(element));
        break;
      case "text":
        record.texts.push(decodeText(element));
        break;
      case "path":
        record.paths.push(decodePath(element));
        break;
      case "linearGradient":
        record.gradients.push(decodeGradient(element));
        break;
      case "defs":
        for (const definition of childElements(element)) {
          if (isSvgElement(definition, "linearGradient")) {
            record.gradients.push(decodeGradient(definition));
          } else {
            warn(`Ignoring unsupported definition <${definition.tagName}>`);
          }
        }
        break;
      default:
        warn(`Ignoring unsupported element <${element.tagName}>`);
    }
  }

  return record;
}
