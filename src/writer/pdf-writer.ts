/**
 * PDF file writer.
 *
 * Writes the header, every object of the table in order, the xref table
 * and the trailer into one ByteWriter. Offsets are read from the writer's
 * running position just before each object is written.
 */

import type { ObjectTable } from "#src/document/object-table";
import { BINARY_MARKER } from "#src/helpers/chars";
import { ByteWriter } from "#src/io/byte-writer";
import { writeIndirectObject } from "./serializer";
import { FREE_LIST_HEAD, writeXRefTable, type XRefWriteEntry } from "./xref-writer";

export interface WriteOptions {
  /** PDF version string (default: "1.4") */
  version?: string;
}

export interface WriteResult {
  /** The written PDF bytes */
  bytes: Uint8Array;

  /** Byte offset of the `xref` keyword */
  xrefOffset: number;

  /** Cross-reference entries as written, free-list head first */
  entries: XRefWriteEntry[];
}

/**
 * Serialize a complete object table as a PDF file.
 */
export function writePdf(table: ObjectTable, options: WriteOptions = {}): WriteResult {
  const writer = new ByteWriter();

  writer.writeLine(`%PDF-${options.version ?? "1.4"}`);
  writer.writeBytes(BINARY_MARKER);
  writer.writeAscii("\n");

  const entries: XRefWriteEntry[] = [FREE_LIST_HEAD];

  for (const { ref, object } of table.entries) {
    entries.push({
      objectNumber: ref.objectNumber,
      generation: ref.generation,
      type: "inuse",
      offset: writer.position,
    });

    writeIndirectObject(writer, ref, object);
  }

  const xrefOffset = writer.position;

  writeXRefTable(writer, {
    entries,
    size: table.size,
    xrefOffset,
    root: table.root,
    info: table.info,
  });

  return {
    bytes: writer.toBytes(),
    xrefOffset,
    entries,
  };
}
