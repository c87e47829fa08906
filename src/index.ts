/**
 * svgpdf
 *
 * Converts a subset of SVG into a single-page PDF.
 */

// ─────────────────────────────────────────────────────────────────────────────
// High-level API
// ─────────────────────────────────────────────────────────────────────────────

export { type ConversionResult, convertSvg, convertSvgFile } from "./api/convert";
export { readSvgFile, writePdfFile } from "./api/files";
export {
  type ConvertOptions,
  ConvertOptionsSchema,
  type ResolvedConvertOptions,
  resolveOptions,
} from "./api/options";

// ─────────────────────────────────────────────────────────────────────────────
// Document model
// ─────────────────────────────────────────────────────────────────────────────

export {
  buildObjectTable,
  ObjectNumbering,
  type ObjectRole,
  type ObjectTable,
  type ObjectTableEntry,
  type ObjectTableInput,
  planObjectRoles,
} from "./document/object-table";
export { Page } from "./document/page";
export {
  type DocumentOptions,
  type DocumentState,
  PRODUCER,
  REFERENCE_FONT,
  SvgPdfDocument,
  TEXT_TRANSFORM,
} from "./document/svg-pdf-document";

// ─────────────────────────────────────────────────────────────────────────────
// SVG input
// ─────────────────────────────────────────────────────────────────────────────

export { type DecodeOptions, decodeSvg, SVG_NAMESPACE } from "./svg/decoder";
export type {
  SvgGradient,
  SvgPath,
  SvgRecord,
  SvgRect,
  SvgStop,
  SvgText,
  WarningHandler,
} from "./svg/types";

// ─────────────────────────────────────────────────────────────────────────────
// Geometry, layout and content
// ─────────────────────────────────────────────────────────────────────────────

export {
  applyTransform,
  computeScale,
  DEFAULT_SVG_SIZE,
  type PdfRect,
  type Point,
  type ResolvedSvgSize,
  resolveSvgSize,
  type ScaleFactors,
  type Size,
  toPdfPoint,
  toPdfRect,
  type TransformName,
} from "./geometry/transform";
export { GridCursor, type GridCursorOptions } from "./layout/grid-cursor";
export {
  ContentStreamBuilder,
  GRADIENT_PLACEHOLDER_BOX,
  type TextFont,
} from "./content/content-stream";
export { A4_PAGE, type PageSize } from "./helpers/page-size";
export { BLACK, type RGB, rgb } from "./helpers/colors";

// ─────────────────────────────────────────────────────────────────────────────
// PDF objects and serialization
// ─────────────────────────────────────────────────────────────────────────────

export { PdfArray } from "./objects/pdf-array";
export { PdfDict } from "./objects/pdf-dict";
export { PdfName } from "./objects/pdf-name";
export { PdfNumber } from "./objects/pdf-number";
export type { PdfObject } from "./objects/pdf-object";
export { PdfRef } from "./objects/pdf-ref";
export { PdfStream } from "./objects/pdf-stream";
export { PdfString } from "./objects/pdf-string";
export { writeIndirectObject } from "./writer/serializer";
export { type WriteOptions, type WriteResult, writePdf } from "./writer/pdf-writer";
export { formatXRefEntry, type XRefWriteEntry } from "./writer/xref-writer";

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  DecodeError,
  DestinationWriteError,
  DocumentFinalizedError,
  InvalidOptionsError,
  NoActivePageError,
  SourceOpenError,
  SvgPdfError,
} from "./errors";
