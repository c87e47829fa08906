/**
 * Test utilities for svgpdf
 */

import { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";

/**
 * Decode bytes one character per byte, so string indexes equal byte offsets.
 */
export function decodeLatin1(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("latin1");
}

/**
 * Serialize a PDF object and return its syntax as a string.
 */
export function toPdfSyntax(obj: PdfObject): string {
  const writer = new ByteWriter({ initialSize: 256 });

  obj.toBytes(writer);

  return decodeLatin1(writer.toBytes());
}

/**
 * Minimal SVG document for tests.
 *
 * @example
 * ```ts
 * svg(`<rect x="0" y="0" width="10" height="10"/>`, { width: "400", height: "150" })
 * ```
 */
export function svg(body: string, attributes: Record<string, string> = {}): string {
  const attrs = Object.entries(attributes)
    .map(([name, value]) => ` ${name}="${value}"`)
    .join("");

  return `<svg xmlns="http://www.w3.org/2000/svg"${attrs}>${body}</svg>`;
}

/**
 * Lines of a decoded PDF, split on LF or CRLF.
 */
export function pdfLines(text: string): string[] {
  return text.split(/\r?\n/);
}
