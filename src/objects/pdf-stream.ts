import type { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";

/**
 * PDF stream object (dictionary + uncompressed data).
 *
 * In PDF:
 * ```
 * <<
 * /Length 42
 * >>
 * stream
 * ...data...
 * endstream
 * ```
 */
export class PdfStream extends PdfDict {
  override get type(): "stream" {
    return "stream";
  }

  private readonly _data: Uint8Array;

  constructor(
    entries?: Iterable<[PdfName | string, PdfObject]>,
    data: Uint8Array = new Uint8Array(0),
  ) {
    super(entries);

    this._data = data;
  }

  /**
   * /Length is always written first and always equals the data's byte
   * length; a /Length entry set on the dictionary is ignored.
   */
  override toBytes(writer: ByteWriter): void {
    writer.writeAscii("<<\n");
    writer.writeAscii(`/Length ${this._data.length}\n`);
    this.writeEntries(writer, PdfName.Length);
    writer.writeAscii(">>");

    writer.writeAscii("\nstream\n");
    writer.writeBytes(this._data);
    writer.writeAscii("\nendstream");
  }
}
