import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF array object.
 *
 * In PDF: `[0 0 595 842]`, `[4 0 R 6 0 R]`
 */
export class PdfArray implements PdfPrimitive {
  get type(): "array" {
    return "array";
  }

  private readonly items: PdfObject[];

  constructor(items: PdfObject[] = []) {
    this.items = [...items];
  }

  static of(...items: PdfObject[]): PdfArray {
    return new PdfArray(items);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("[");

    this.items.forEach((item, index) => {
      if (index > 0) {
        writer.writeAscii(" ");
      }

      item.toBytes(writer);
    });

    writer.writeAscii("]");
  }
}
