/**
 * PDF object serialization.
 *
 * The byte-level syntax lives in each object's toBytes(); this module adds
 * the indirect-object framing.
 */

import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

/**
 * Write an indirect object definition.
 *
 * Format: "N G obj\n[object]\nendobj\n"
 */
export function writeIndirectObject(writer: ByteWriter, ref: PdfRef, obj: PdfObject): void {
  writer.writeLine(`${ref.objectNumber} ${ref.generation} obj`);
  obj.toBytes(writer);
  writer.writeAscii("\n");
  writer.writeLine("endobj");
}
