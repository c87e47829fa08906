/**
 * Cross-reference table and trailer writing.
 */

import type { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

/**
 * Represents an entry in the xref table.
 */
export interface XRefWriteEntry {
  objectNumber: number;
  generation: number;
  type: "inuse" | "free";
  /** For inuse: byte offset of "N G obj". For free: next free object number. */
  offset: number;
}

export interface XRefWriteOptions {
  /** Byte offset of the `xref` keyword */
  xrefOffset: number;

  /** Highest object number + 1 (/Size) */
  size: number;

  /** One entry per object number, starting at 0 */
  entries: XRefWriteEntry[];

  /** Root catalog reference */
  root: PdfRef;

  /** Info dictionary reference (optional) */
  info?: PdfRef;
}

/**
 * Object 0: head of the free list, always `0000000000 65535 f`.
 */
export const FREE_LIST_HEAD: XRefWriteEntry = {
  objectNumber: 0,
  generation: 65535,
  type: "free",
  offset: 0,
};

/**
 * Format a single xref entry (exactly 20 bytes).
 *
 * Format: "OOOOOOOOOO GGGGG n\r\n" or "OOOOOOOOOO GGGGG f\r\n"
 */
export function formatXRefEntry(entry: XRefWriteEntry): string {
  const offset = entry.offset.toString().padStart(10, "0");
  const generation = entry.generation.toString().padStart(5, "0");
  const marker = entry.type === "free" ? "f" : "n";

  return `${offset} ${generation} ${marker}\r\n`;
}

/**
 * @throws {Error} unless the entries cover object numbers 0..size-1 in order
 */
function assertContiguous(entries: XRefWriteEntry[], size: number): void {
  if (entries.length !== size) {
    throw new Error(`XRef table has ${entries.length} entries but /Size is ${size}`);
  }

  entries.forEach((entry, index) => {
    if (entry.objectNumber !== index) {
      throw new Error(`XRef entry ${index} is for object ${entry.objectNumber}`);
    }
  });
}

/**
 * Write a single-subsection xref table with its trailer.
 *
 * Format:
 * ```
 * xref
 * 0 6
 * 0000000000 65535 f
 * 0000000015 00000 n
 * ...
 * trailer
 * <<
 * /Size 6
 * /Root 1 0 R
 * >>
 * startxref
 * 512
 * %%EOF
 * ```
 */
export function writeXRefTable(writer: ByteWriter, options: XRefWriteOptions): void {
  assertContiguous(options.entries, options.size);

  writer.writeLine("xref");
  writer.writeLine(`0 ${options.size}`);

  for (const entry of options.entries) {
    writer.writeAscii(formatXRefEntry(entry));
  }

  writer.writeLine("trailer");
  buildTrailerDict(options).toBytes(writer);
  writer.writeAscii("\n");

  writer.writeLine("startxref");
  writer.writeLine(`${options.xrefOffset}`);
  writer.writeLine("%%EOF");
}

function buildTrailerDict(options: XRefWriteOptions): PdfDict {
  const entries: [string, PdfObject][] = [
    ["Size", PdfNumber.of(options.size)],
    ["Root", options.root],
  ];

  if (options.info) {
    entries.push(["Info", options.info]);
  }

  return new PdfDict(entries);
}
