import { CHAR_HASH, DELIMITERS, WHITESPACE } from "#src/helpers/chars";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

// Whitespace, delimiters and `#` are written as #XX (ISO 32000-1, 7.3.5)
const NAME_NEEDS_ESCAPE = new Set([...WHITESPACE, ...DELIMITERS, CHAR_HASH]);

const encoder = new TextEncoder();

function escapeName(name: string): string {
  let result = "";

  for (const byte of encoder.encode(name)) {
    if (byte < 33 || byte > 126 || NAME_NEEDS_ESCAPE.has(byte)) {
      result += `#${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    } else {
      result += String.fromCharCode(byte);
    }
  }

  return result;
}

/**
 * PDF name object (interned).
 *
 * In PDF: `/Type`, `/Page`, `/F1`
 *
 * The leading `/` is not part of the value.
 */
export class PdfName implements PdfPrimitive {
  get type(): "name" {
    return "name";
  }

  private static cache = new Map<string, PdfName>();

  private constructor(readonly value: string) {}

  static of(name: string): PdfName {
    let cached = PdfName.cache.get(name);

    if (!cached) {
      cached = new PdfName(name);

      PdfName.cache.set(name, cached);
    }

    return cached;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(`/${escapeName(this.value)}`);
  }

  // Names used by the document structure
  static readonly Type = PdfName.of("Type");
  static readonly Catalog = PdfName.of("Catalog");
  static readonly Pages = PdfName.of("Pages");
  static readonly Page = PdfName.of("Page");
  static readonly Font = PdfName.of("Font");
  static readonly Outlines = PdfName.of("Outlines");
  static readonly Count = PdfName.of("Count");
  static readonly Kids = PdfName.of("Kids");
  static readonly Parent = PdfName.of("Parent");
  static readonly MediaBox = PdfName.of("MediaBox");
  static readonly Resources = PdfName.of("Resources");
  static readonly Contents = PdfName.of("Contents");
  static readonly Length = PdfName.of("Length");
}
