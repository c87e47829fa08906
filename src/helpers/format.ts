/**
 * Number formatting and parsing for PDF output.
 */

/**
 * Format a number as a PDF object value.
 *
 * Integers are written without a decimal point; reals keep at most five
 * decimal places with trailing zeros removed.
 */
export function formatPdfNumber(value: number): string {
  if (Number.isInteger(value)) {
    return value.toString();
  }

  let str = value.toFixed(5);

  str = str.replace(/\.?0+$/, "");

  if (str === "" || str === "-" || str === "-0") {
    return "0";
  }

  return str;
}

/**
 * Format a content-stream operand with a fixed number of decimals.
 *
 * Content streams always use two decimals, e.g. `148.75 842.00 m`.
 * Large values are written with all their integer digits, never as `1e+30`.
 *
 * @throws {RangeError} for NaN and infinities
 */
export function formatOperand(value: number, digits = 2): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot write ${value} as a content-stream operand`);
  }

  // toFixed switches to exponent notation from 1e21; such doubles have no fraction
  if (Math.abs(value) >= 1e21) {
    const integer = BigInt(value).toString();

    return digits > 0 ? `${integer}.${"0".repeat(digits)}` : integer;
  }

  const str = value.toFixed(digits);

  // toFixed keeps the sign of tiny negatives ("-0.00")
  return /^-0\.?0*$/.test(str) ? str.slice(1) : str;
}

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a plain decimal string such as `"400"`, `"12.5"` or `"-3e2"`.
 *
 * Surrounding whitespace is ignored. Units, hex and empty strings are
 * rejected with `undefined`.
 */
export function parseDecimal(value: string): number | undefined {
  const trimmed = value.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }

  const parsed = Number(trimmed);

  return Number.isFinite(parsed) ? parsed : undefined;
}
