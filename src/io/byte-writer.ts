/**
 * Growable byte buffer used by the PDF writer.
 *
 * `position` is the running byte counter: the writer reads it before each
 * object and before the `xref` keyword, so offsets are never re-measured
 * from joined text.
 */

import { LF } from "#src/helpers/chars";

export interface ByteWriterOptions {
  /** Initial buffer size in bytes. Default: 16384 */
  initialSize?: number;
}

export class ByteWriter {
  private buffer: Uint8Array;
  private offset = 0;

  constructor(options: ByteWriterOptions = {}) {
    this.buffer = new Uint8Array(Math.max(1, options.initialSize ?? 16384));
  }

  /**
   * Ensure capacity for `needed` more bytes, doubling the buffer as required.
   */
  private grow(needed: number): void {
    const requiredSize = this.offset + needed;

    if (requiredSize <= this.buffer.length) {
      return;
    }

    let newSize = this.buffer.length;

    while (newSize < requiredSize) {
      newSize *= 2;
    }

    const newBuffer = new Uint8Array(newSize);
    newBuffer.set(this.buffer.subarray(0, this.offset));
    this.buffer = newBuffer;
  }

  /** Number of bytes written so far */
  get position(): number {
    return this.offset;
  }

  writeByte(b: number): void {
    this.grow(1);
    this.buffer[this.offset++] = b;
  }

  writeBytes(data: Uint8Array): void {
    this.grow(data.length);
    this.buffer.set(data, this.offset);
    this.offset += data.length;
  }

  /**
   * Write a string one byte per character.
   * Only for PDF syntax (keywords, names, numbers) known to be ASCII.
   */
  writeAscii(str: string): void {
    this.grow(str.length);

    for (let i = 0; i < str.length; i++) {
      this.buffer[this.offset++] = str.charCodeAt(i);
    }
  }

  /** Write an ASCII string followed by a line feed */
  writeLine(str: string): void {
    this.writeAscii(str);
    this.writeByte(LF);
  }

  /**
   * Copy of the written bytes. The writer may keep being used afterwards.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}
