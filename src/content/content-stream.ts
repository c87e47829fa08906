/**
 * Content stream builder.
 *
 * Accumulates operator lines for one page. The builder is append-only;
 * the serialized stream is the lines joined with LF.
 */

import type { PdfRect, Point } from "#src/geometry/transform";
import { BLACK, GRADIENT_PLACEHOLDER } from "#src/helpers/colors";
import {
  beginText,
  closePath,
  endText,
  lineTo,
  moveText,
  moveTo,
  type Operator,
  rectangle,
  setFont,
  setStrokingRGB,
  showText,
  stroke,
} from "#src/helpers/operators";
import { escapePdfText } from "#src/helpers/strings";

/**
 * Where gradients are marked on the page, in PDF space.
 * Stops, offsets and the gradient vector are not consulted.
 */
export const GRADIENT_PLACEHOLDER_BOX = { x: 100, y: 100, width: 200, height: 50 } as const;

export interface TextFont {
  /** Resource name in the page's /Font dictionary, e.g. "F1" */
  resourceName: string;
  /** Size in points */
  size: number;
}

const encoder = new TextEncoder();

export class ContentStreamBuilder {
  private readonly ops: Operator[] = [];

  get operators(): readonly Operator[] {
    return this.ops;
  }

  get isEmpty(): boolean {
    return this.ops.length === 0;
  }

  append(...ops: Operator[]): this {
    this.ops.push(...ops);

    return this;
  }

  /**
   * Stroke the outline of a rectangle whose origin is its top-left corner.
   * The path runs clockwise from the origin and is closed before stroking.
   * Outlines are always black.
   */
  strokeRectangle(rect: PdfRect): this {
    const { x, y } = rect.origin;
    const right = x + rect.width;
    const bottom = y - rect.height;

    return this.append(
      moveTo(x, y),
      lineTo(right, y),
      lineTo(right, bottom),
      lineTo(x, bottom),
      closePath(),
      setStrokingRGB(BLACK),
      stroke(),
    );
  }

  /**
   * Show a line of text with its baseline origin at `position`.
   */
  showText(position: Point, text: string, font: TextFont): this {
    return this.append(
      beginText(),
      setFont(font.resourceName, font.size),
      moveText(position.x, position.y),
      showText(escapePdfText(text)),
      endText(),
    );
  }

  /**
   * Stroke the fixed placeholder box that stands in for a gradient.
   */
  strokeGradientPlaceholder(): this {
    const box = GRADIENT_PLACEHOLDER_BOX;

    return this.append(
      rectangle(box.x, box.y, box.width, box.height),
      setStrokingRGB(GRADIENT_PLACEHOLDER),
      stroke(),
    );
  }

  toString(): string {
    return this.ops.join("\n");
  }

  toBytes(): Uint8Array {
    return encoder.encode(this.toString());
  }
}
