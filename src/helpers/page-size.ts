/**
 * Page size constants.
 */

/** Width and height in points (1 point = 1/72 inch) */
export interface PageSize {
  readonly width: number;
  readonly height: number;
}

/**
 * A4 rounded to whole points (210mm × 297mm at 72 DPI).
 *
 * Every generated page uses this size; it is not configurable.
 */
export const A4_PAGE: PageSize = { width: 595, height: 842 };
