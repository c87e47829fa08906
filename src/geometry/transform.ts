/**
 * SVG → PDF coordinate mapping.
 *
 * SVG puts the origin at the top-left with Y growing down; PDF puts it at
 * the bottom-left with Y growing up. Points are scaled into page space and
 * then flipped. Every function here is pure.
 */

import { parseDecimal } from "#src/helpers/format";
import type { PageSize } from "#src/helpers/page-size";

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface ScaleFactors {
  scaleX: number;
  scaleY: number;
}

/**
 * A rectangle in PDF space: `origin` is the top-left corner after the flip,
 * so the rectangle extends right by `width` and down by `height`.
 */
export interface PdfRect {
  origin: Point;
  width: number;
  height: number;
}

/** Size assumed for an SVG that declares no usable width/height */
export const DEFAULT_SVG_SIZE: Readonly<Size> = { width: 400, height: 150 };

/**
 * Named transforms applied after scaling and flipping.
 * Names other than "rotate" are accepted and leave the point unchanged.
 */
export type TransformName = "rotate" | "none";

export interface ResolvedSvgSize {
  size: Size;
  /** Declared dimensions were present but could not be used */
  rejected: boolean;
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

function positiveDecimal(value: string | undefined): number | undefined {
  const parsed = value === undefined ? undefined : parseDecimal(value);

  return parsed !== undefined && parsed > 0 ? parsed : undefined;
}

/**
 * Resolve the SVG user-space size from the root's declared attributes.
 *
 * The declared pair is used only when both dimensions are positive
 * decimals. Anything else falls back to {@link DEFAULT_SVG_SIZE} for both;
 * `rejected` is set unless neither dimension was declared.
 */
export function resolveSvgSize(declared: { width?: string; height?: string }): ResolvedSvgSize {
  const width = positiveDecimal(declared.width);
  const height = positiveDecimal(declared.height);

  if (width !== undefined && height !== undefined) {
    return { size: { width, height }, rejected: false };
  }

  return {
    size: { ...DEFAULT_SVG_SIZE },
    rejected: !(isBlank(declared.width) && isBlank(declared.height)),
  };
}

/**
 * Scale factors that stretch the SVG canvas over the whole page.
 */
export function computeScale(page: PageSize, svg: Size): ScaleFactors {
  return {
    scaleX: page.width / svg.width,
    scaleY: page.height / svg.height,
  };
}

/**
 * Map an SVG point to PDF space: `(x * scaleX, pageHeight - y * scaleY)`.
 */
export function toPdfPoint(point: Point, scale: ScaleFactors, page: PageSize): Point {
  return {
    x: point.x * scale.scaleX,
    y: page.height - point.y * scale.scaleY,
  };
}

/**
 * Map an SVG rectangle (top-left corner plus size) to PDF space.
 */
export function toPdfRect(
  rect: Point & Size,
  scale: ScaleFactors,
  page: PageSize,
): PdfRect {
  return {
    origin: toPdfPoint(rect, scale, page),
    width: rect.width * scale.scaleX,
    height: rect.height * scale.scaleY,
  };
}

/**
 * Apply a named transform to an already scaled and flipped point.
 *
 * "rotate" approximates a quarter turn by swapping the axes and reflecting
 * X through the page width: `(x, y) → (y, pageWidth - x)`.
 */
export function applyTransform(
  point: Point,
  transform: TransformName | (string & {}) | undefined,
  page: PageSize,
): Point {
  if (transform === "rotate") {
    return { x: point.y, y: page.width - point.x };
  }

  return { x: point.x, y: point.y };
}
