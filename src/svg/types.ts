/**
 * Structured records produced by the SVG decoder.
 *
 * Numeric attributes are already parsed; an absent attribute is 0.
 */

export interface SvgRect {
  x: number;
  y: number;
  width: number;
  height: number;
  /** Declared stroke color. Decoded but not used: outlines are always black. */
  stroke?: string;
}

export interface SvgText {
  x: number;
  y: number;
  /** Character data directly inside the element, untrimmed */
  content: string;
}

export interface SvgPath {
  /** Path data, kept as an opaque string */
  d: string;
}

export interface SvgStop {
  offset?: string;
  color?: string;
}

export interface SvgGradient {
  id?: string;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  stops: SvgStop[];
}

/**
 * One decoded `<svg>` document. Each list is in document order.
 */
export interface SvgRecord {
  /** Root `width` attribute as written, if present */
  width?: string;
  /** Root `height` attribute as written, if present */
  height?: string;
  rects: SvgRect[];
  texts: SvgText[];
  paths: SvgPath[];
  gradients: SvgGradient[];
}

/**
 * Receives non-fatal diagnostics (ignored elements, fallbacks).
 */
export type WarningHandler = (message: string) => void;
