/**
 * In-memory document built from SVG primitives.
 *
 * Lifecycle: `empty` → `has-pages` (after the first addPage) → `finalized`
 * (after save). Drawing needs a page; nothing can change once finalized.
 */

import { DocumentFinalizedError, NoActivePageError } from "#src/errors";
import {
  applyTransform,
  computeScale,
  DEFAULT_SVG_SIZE,
  type ScaleFactors,
  type Size,
  toPdfPoint,
  toPdfRect,
  type TransformName,
} from "#src/geometry/transform";
import { A4_PAGE, type PageSize } from "#src/helpers/page-size";
import { GridCursor } from "#src/layout/grid-cursor";
import type { SvgGradient, SvgPath, SvgRect, SvgText, WarningHandler } from "#src/svg/types";
import { writePdf } from "#src/writer/pdf-writer";
import { buildObjectTable } from "./object-table";
import { Page } from "./page";

export type DocumentState = "empty" | "has-pages" | "finalized";

/** Font every text operator selects; it is never embedded */
export const REFERENCE_FONT = { resourceName: "F1", baseFont: "Helvetica" } as const;

/** Applied to every text anchor after scaling and flipping */
export const TEXT_TRANSFORM: TransformName = "rotate";

export const PRODUCER = "svgpdf";

export interface DocumentOptions {
  /** Grid column count (layout bookkeeping only) */
  columns: number;
  /** Grid row count (layout bookkeeping only) */
  rows: number;
  /** Requested font name. Display only: text always uses the reference font. */
  fontName: string;
  /** Font size in points */
  fontSize: number;
  /** Written to the Info dictionary when set */
  title?: string;
  onWarning?: WarningHandler;
}

export class SvgPdfDocument {
  readonly pageSize: PageSize = A4_PAGE;
  readonly fontName: string;
  readonly fontSize: number;
  readonly title: string | undefined;
  readonly cursor: GridCursor;

  /** Warnings collected while building */
  readonly warnings: string[] = [];

  private readonly pageList: Page[] = [];
  private scaleFactors: ScaleFactors;
  private finalized = false;
  private gridOverflowReported = false;
  private readonly onWarning: WarningHandler | undefined;

  constructor(options: DocumentOptions) {
    this.fontName = options.fontName;
    this.fontSize = options.fontSize;
    this.title = options.title;
    this.onWarning = options.onWarning;
    this.scaleFactors = computeScale(this.pageSize, DEFAULT_SVG_SIZE);
    this.cursor = new GridCursor({
      pageWidth: this.pageSize.width,
      maxColumns: options.columns,
      maxRows: options.rows,
    });

    if (options.fontName !== REFERENCE_FONT.baseFont) {
      this.warn(
        `Font "${options.fontName}" is not embedded; text is drawn in ${REFERENCE_FONT.baseFont}`,
      );
    }
  }

  get state(): DocumentState {
    if (this.finalized) {
      return "finalized";
    }

    return this.pageList.length === 0 ? "empty" : "has-pages";
  }

  get pages(): readonly Page[] {
    return this.pageList;
  }

  get pageCount(): number {
    return this.pageList.length;
  }

  get scale(): ScaleFactors {
    return { ...this.scaleFactors };
  }

  private warn(message: string): void {
    this.warnings.push(message);
    this.onWarning?.(message);
  }

  private assertMutable(operation: string): void {
    if (this.finalized) {
      throw new DocumentFinalizedError(operation);
    }
  }

  /**
   * The page elements are drawn on: the most recently added one.
   */
  private activePage(operation: string): Page {
    this.assertMutable(operation);

    const page = this.pageList.at(-1);

    if (!page) {
      throw new NoActivePageError(operation);
    }

    return page;
  }

  /**
   * Advance the grid cursor for a placed element. Drawing never reads it.
   */
  private placeInGrid(): void {
    this.cursor.advanceColumn();

    if (!this.cursor.withinGrid && !this.gridOverflowReported) {
      this.gridOverflowReported = true;
      this.warn(
        `Layout grid of ${this.cursor.maxColumns}×${this.cursor.maxRows} cells is full; ` +
          "later elements are placed outside it",
      );
    }
  }

  /**
   * Set the SVG canvas size the scale factors are derived from.
   */
  setSvgSize(size: Size): void {
    this.assertMutable("set the SVG size");
    this.scaleFactors = computeScale(this.pageSize, size);
  }

  addPage(): Page {
    this.assertMutable("add a page");

    const page = new Page(this.pageList.length + 1);
    this.pageList.push(page);

    return page;
  }

  /**
   * Stroke the outline of an SVG rectangle. The declared stroke color is
   * not used.
   */
  drawRectangle(rect: SvgRect): void {
    const page = this.activePage("draw a rectangle");

    this.placeInGrid();
    page.content.strokeRectangle(toPdfRect(rect, this.scaleFactors, this.pageSize));
  }

  /**
   * Show SVG text at its scaled, flipped and rotated anchor, in the
   * document's font size.
   */
  drawText(text: SvgText): void {
    const page = this.activePage("draw text");

    this.placeInGrid();

    const anchor = applyTransform(
      toPdfPoint(text, this.scaleFactors, this.pageSize),
      TEXT_TRANSFORM,
      this.pageSize,
    );

    page.content.showText(anchor, text.content, {
      resourceName: REFERENCE_FONT.resourceName,
      size: this.fontSize,
    });
  }

  /**
   * Mark a gradient with the fixed placeholder box.
   */
  drawGradient(gradient: SvgGradient): void {
    const page = this.activePage("draw a gradient");

    if (gradient.stops.length === 0) {
      this.warn(`Gradient ${gradient.id ? `"${gradient.id}" ` : ""}has no stops`);
    }

    page.content.strokeGradientPlaceholder();
  }

  /**
   * Accept a path. Path data is not rendered, so nothing is emitted.
   */
  drawPath(_path: SvgPath): void {
    this.activePage("draw a path");
  }

  /**
   * Stop accepting changes. Idempotent.
   */
  finalize(): void {
    this.finalized = true;
  }

  /**
   * Finalize the document and serialize it to PDF bytes.
   */
  save(): Uint8Array {
    this.finalize();

    const table = buildObjectTable({
      pageSize: this.pageSize,
      contents: this.pageList.map(page => page.content.toBytes()),
      fontResourceName: REFERENCE_FONT.resourceName,
      baseFont: REFERENCE_FONT.baseFont,
      producer: PRODUCER,
      title: this.title,
    });

    return writePdf(table).bytes;
  }
}
