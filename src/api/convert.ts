/**
 * SVG → PDF conversion pipeline.
 *
 * decode → size and scale → one page → gradients, rectangles, texts,
 * paths → save. Everything runs synchronously on one document.
 */

import { SvgPdfDocument } from "#src/document/svg-pdf-document";
import { DEFAULT_SVG_SIZE, resolveSvgSize } from "#src/geometry/transform";
import { decodeSvg } from "#src/svg/decoder";
import { readSvgFile, writePdfFile } from "./files";
import { type ConvertOptions, resolveOptions } from "./options";

export interface ConversionResult {
  /** The finalized document */
  document: SvgPdfDocument;
  /** The serialized PDF */
  bytes: Uint8Array;
  /** Every warning raised while decoding and building, in order */
  warnings: string[];
}

/**
 * Convert SVG source text to a single-page PDF.
 *
 * @throws {InvalidOptionsError} for invalid options
 * @throws {DecodeError} for malformed or unsupported SVG
 *
 * @example
 * ```ts
 * const { bytes } = convertSvg('<svg width="400" height="150"><rect width="100" height="50"/></svg>');
 * ```
 */
export function convertSvg(source: string, options: ConvertOptions = {}): ConversionResult {
  const settings = resolveOptions(options);
  const warnings: string[] = [];
  const onWarning = (message: string) => {
    warnings.push(message);
    options.onWarning?.(message);
  };

  const record = decodeSvg(source, { onWarning });
  const document = new SvgPdfDocument({ ...settings, onWarning });

  const { size, rejected } = resolveSvgSize(record);

  if (rejected) {
    const declared = (["width", "height"] as const)
      .filter(dimension => record[dimension] !== undefined)
      .map(dimension => `${dimension}="${record[dimension] ?? ""}"`)
      .join(" ");

    onWarning(
      `SVG size ${declared} is not a pair of positive numbers; ` +
        `using ${DEFAULT_SVG_SIZE.width}×${DEFAULT_SVG_SIZE.height}`,
    );
  }

  document.setSvgSize(size);
  document.addPage();

  for (const gradient of record.gradients) {
    document.drawGradient(gradient);
  }

  for (const rect of record.rects) {
    document.drawRectangle(rect);
  }

  for (const text of record.texts) {
    document.drawText(text);
  }

  for (const path of record.paths) {
    document.drawPath(path);
  }

  return { document, bytes: document.save(), warnings };
}

/**
 * Convert an SVG file and write the PDF to `pdfPath`.
 *
 * The destination is written once, after conversion has succeeded.
 *
 * @throws {SourceOpenError} if the SVG cannot be read
 * @throws {DestinationWriteError} if the PDF cannot be written
 */
export function convertSvgFile(
  svgPath: string,
  pdfPath: string,
  options: ConvertOptions = {},
): ConversionResult {
  const result = convertSvg(readSvgFile(svgPath), options);

  writePdfFile(pdfPath, result.bytes);

  return result;
}
