import { CHAR_PARENTHESIS_CLOSE, CHAR_PARENTHESIS_OPEN } from "#src/helpers/chars";
import { escapeLiteralString } from "#src/helpers/strings";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF literal string object.
 *
 * In PDF: `(svgpdf)`, `(a \(nested\) title)`
 *
 * `fromString` encodes as UTF-8.
 */
export class PdfString implements PdfPrimitive {
  get type(): "string" {
    return "string";
  }

  constructor(readonly bytes: Uint8Array) {}

  static fromString(str: string): PdfString {
    return new PdfString(new TextEncoder().encode(str));
  }

  toBytes(writer: ByteWriter): void {
    writer.writeByte(CHAR_PARENTHESIS_OPEN);
    writer.writeBytes(escapeLiteralString(this.bytes));
    writer.writeByte(CHAR_PARENTHESIS_CLOSE);
  }
}
