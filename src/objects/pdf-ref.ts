import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * PDF indirect reference (interned).
 *
 * In PDF: `1 0 R`, `4 0 R`
 *
 * `PdfRef.of(1) === PdfRef.of(1, 0)`, so references can be used as map keys.
 */
export class PdfRef implements PdfPrimitive {
  get type(): "ref" {
    return "ref";
  }

  private static cache = new Map<string, PdfRef>();

  private constructor(
    readonly objectNumber: number,
    readonly generation: number,
  ) {}

  static of(objectNumber: number, generation = 0): PdfRef {
    const key = `${objectNumber} ${generation}`;

    let cached = PdfRef.cache.get(key);

    if (!cached) {
      cached = new PdfRef(objectNumber, generation);

      PdfRef.cache.set(key, cached);
    }

    return cached;
  }

  toString(): string {
    return `${this.objectNumber} ${this.generation} R`;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.toString());
  }
}
