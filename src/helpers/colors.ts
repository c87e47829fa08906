/**
 * RGB colors for stroke operators.
 */

/**
 * RGB color with components in the 0-1 range.
 */
export interface RGB {
  type: "RGB";
  red: number;
  green: number;
  blue: number;
}

/**
 * Create an RGB color.
 *
 * @example
 * ```typescript
 * const red = rgb(1, 0, 0);
 * ```
 */
export function rgb(r: number, g: number, b: number): RGB {
  return { type: "RGB", red: r, green: g, blue: b };
}

/** Outline color for rectangles */
export const BLACK = rgb(0, 0, 0);

/** Flat color marking where a gradient was defined */
export const GRADIENT_PLACEHOLDER = rgb(0, 0, 1);

/**
 * Components in operator order, clamped to 0-1.
 */
export function colorToArray(color: RGB): [number, number, number] {
  const clamp = (value: number) => Math.min(1, Math.max(0, value));

  return [clamp(color.red), clamp(color.green), clamp(color.blue)];
}
