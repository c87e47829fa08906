/**
 * Content-stream operator builders.
 *
 * Each function returns one operator line. Path and text operands use two
 * decimals; color components use the compact PDF number form.
 */

import { colorToArray, type RGB } from "./colors";
import { formatOperand, formatPdfNumber } from "./format";

export type Operator = string;

// Path construction

export function moveTo(x: number, y: number): Operator {
  return `${formatOperand(x)} ${formatOperand(y)} m`;
}

export function lineTo(x: number, y: number): Operator {
  return `${formatOperand(x)} ${formatOperand(y)} l`;
}

export function closePath(): Operator {
  return "h";
}

export function rectangle(x: number, y: number, width: number, height: number): Operator {
  return `${formatOperand(x)} ${formatOperand(y)} ${formatOperand(width)} ${formatOperand(height)} re`;
}

// Painting

export function setStrokingRGB(color: RGB): Operator {
  return `${colorToArray(color).map(formatPdfNumber).join(" ")} RG`;
}

export function stroke(): Operator {
  return "S";
}

// Text

export function beginText(): Operator {
  return "BT";
}

export function setFont(resourceName: string, size: number): Operator {
  return `/${resourceName} ${formatOperand(size)} Tf`;
}

export function moveText(x: number, y: number): Operator {
  return `${formatOperand(x)} ${formatOperand(y)} Td`;
}

/**
 * `Tj` with an already-escaped literal string operand.
 */
export function showText(escaped: string): Operator {
  return `(${escaped}) Tj`;
}

export function endText(): Operator {
  return "ET";
}
