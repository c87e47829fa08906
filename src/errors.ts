/**
 * Error classes for SVG → PDF conversion.
 *
 * Every error is fatal to the conversion that raised it. Messages name the
 * stage that failed; the underlying error, when there is one, is kept as
 * `cause`.
 */

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }

  return String(cause);
}

/**
 * Base class for all conversion errors.
 */
export class SvgPdfError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SvgPdfError";
  }
}

/**
 * The SVG source could not be read.
 */
export class SourceOpenError extends SvgPdfError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Error opening SVG source "${path}": ${describeCause(cause)}`, { cause });
    this.name = "SourceOpenError";
  }
}

/**
 * The source is not well-formed XML, or its root is not an `<svg>` element.
 */
export class DecodeError extends SvgPdfError {
  constructor(detail: string, cause?: unknown) {
    super(`Error decoding SVG: ${detail}`, { cause });
    this.name = "DecodeError";
  }
}

/**
 * An element was drawn before any page was added.
 */
export class NoActivePageError extends SvgPdfError {
  constructor(operation: string) {
    super(`Cannot ${operation}: the document has no page yet (call addPage() first)`);
    this.name = "NoActivePageError";
  }
}

/**
 * The document was mutated after it was finalized for saving.
 */
export class DocumentFinalizedError extends SvgPdfError {
  constructor(operation: string) {
    super(`Cannot ${operation}: the document has been finalized`);
    this.name = "DocumentFinalizedError";
  }
}

/**
 * The PDF could not be written to its destination.
 */
export class DestinationWriteError extends SvgPdfError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Error writing PDF "${path}": ${describeCause(cause)}`, { cause });
    this.name = "DestinationWriteError";
  }
}

/**
 * Conversion options failed validation.
 */
export class InvalidOptionsError extends SvgPdfError {
  constructor(readonly issues: string[]) {
    super(`Invalid conversion options: ${issues.join("; ")}`);
    this.name = "InvalidOptionsError";
  }
}
