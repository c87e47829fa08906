/**
 * PDF literal string escaping.
 *
 * Only `\`, `(` and `)` are significant inside a literal string; every
 * other character passes through unchanged.
 */

import { CHAR_BACKSLASH, CHAR_PARENTHESIS_CLOSE, CHAR_PARENTHESIS_OPEN } from "./chars";

/**
 * Escape text for a `( ... ) Tj` operand.
 *
 * Backslashes are escaped first so the backslashes added for parentheses
 * are not doubled.
 *
 * @example
 * ```ts
 * escapePdfText("Hi(there)") // "Hi\\(there\\)"
 * ```
 */
export function escapePdfText(text: string): string {
  return text.replaceAll("\\", "\\\\").replaceAll("(", "\\(").replaceAll(")", "\\)");
}

/**
 * Byte-level variant of {@link escapePdfText}, used when serializing
 * `PdfString` objects.
 */
export function escapeLiteralString(bytes: Uint8Array): Uint8Array {
  let escapeCount = 0;

  for (const byte of bytes) {
    if (
      byte === CHAR_BACKSLASH ||
      byte === CHAR_PARENTHESIS_OPEN ||
      byte === CHAR_PARENTHESIS_CLOSE
    ) {
      escapeCount++;
    }
  }

  if (escapeCount === 0) {
    return bytes;
  }

  const result = new Uint8Array(bytes.length + escapeCount);
  let j = 0;

  for (const byte of bytes) {
    if (
      byte === CHAR_BACKSLASH ||
      byte === CHAR_PARENTHESIS_OPEN ||
      byte === CHAR_PARENTHESIS_CLOSE
    ) {
      result[j++] = CHAR_BACKSLASH;
    }

    result[j++] = byte;
  }

  return result;
}
