/**
 * Interface for PDF objects that serialize themselves.
 *
 * Each concrete class writes its own byte representation, so the writer
 * never switches on object type.
 */

import type { ByteWriter } from "#src/io/byte-writer";

export interface PdfPrimitive {
  /**
   * The type discriminator for this object.
   */
  readonly type: string;

  /**
   * Write this object's PDF syntax to the given writer.
   *
   * Called recursively for nested arrays, dictionaries and streams.
   */
  toBytes(writer: ByteWriter): void;
}
