import type { ByteWriter } from "#src/io/byte-writer";
import { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF dictionary object.
 *
 * In PDF: `<< /Type /Page /MediaBox [0 0 595 842] >>`
 *
 * Keys are PdfName; insertion order is preserved and is the order the
 * entries are written, one per line.
 */
export class PdfDict implements PdfPrimitive {
  get type(): "dict" | "stream" {
    return "dict";
  }

  private entries = new Map<PdfName, PdfObject>();

  constructor(entries?: Iterable<[PdfName | string, PdfObject]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  set(key: PdfName | string, value: PdfObject): void {
    this.entries.set(typeof key === "string" ? PdfName.of(key) : key, value);
  }

  static of(entries: Record<string, PdfObject>): PdfDict {
    return new PdfDict(Object.entries(entries));
  }

  /**
   * Write `key value` lines, without the surrounding `<<` `>>`.
   */
  protected writeEntries(writer: ByteWriter, skip?: PdfName): void {
    for (const [key, value] of this.entries) {
      if (key === skip) {
        continue;
      }

      key.toBytes(writer);
      writer.writeAscii(" ");
      value.toBytes(writer);
      writer.writeAscii("\n");
    }
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("<<\n");
    this.writeEntries(writer);
    writer.writeAscii(">>");
  }
}
