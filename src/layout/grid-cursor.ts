/**
 * Grid layout bookkeeping.
 *
 * The cursor advances one cell per placed element. It records where a grid
 * layout would put the element; drawing coordinates come only from the
 * geometry transform and never read the cursor.
 */

import type { Point } from "#src/geometry/transform";

export interface GridCursorOptions {
  /** Width available for columns, in points */
  pageWidth: number;
  /** Horizontal step per column (default: 150) */
  columnWidth?: number;
  /** Vertical step per row (default: 50) */
  rowHeight?: number;
  /** Configured column count */
  maxColumns: number;
  /** Configured row count */
  maxRows: number;
}

export class GridCursor {
  readonly pageWidth: number;
  readonly columnWidth: number;
  readonly rowHeight: number;
  readonly maxColumns: number;
  readonly maxRows: number;

  private x = 0;
  private y = 0;

  constructor(options: GridCursorOptions) {
    this.pageWidth = options.pageWidth;
    this.columnWidth = options.columnWidth ?? 150;
    this.rowHeight = options.rowHeight ?? 50;
    this.maxColumns = options.maxColumns;
    this.maxRows = options.maxRows;
  }

  get position(): Point {
    return { x: this.x, y: this.y };
  }

  /** Zero-based column of the cursor */
  get column(): number {
    return Math.round(this.x / this.columnWidth);
  }

  /** Zero-based row of the cursor */
  get row(): number {
    return Math.round(this.y / this.rowHeight);
  }

  /**
   * Whether the cursor is inside the configured `maxColumns` × `maxRows` grid.
   */
  get withinGrid(): boolean {
    return this.column < this.maxColumns && this.row < this.maxRows;
  }

  /**
   * Move one column right, wrapping to the next row when another column
   * would not fit within the page width.
   */
  advanceColumn(): void {
    this.x += this.columnWidth;

    if (this.x + this.columnWidth > this.pageWidth) {
      this.advanceRow();
    }
  }

  /** Start a new row at the left edge */
  advanceRow(): void {
    this.y += this.rowHeight;
    this.x = 0;
  }
}
