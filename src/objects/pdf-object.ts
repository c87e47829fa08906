/**
 * PDF object union.
 */
import type { PdfArray } from "./pdf-array";
import type { PdfDict } from "./pdf-dict";
import type { PdfName } from "./pdf-name";
import type { PdfNumber } from "./pdf-number";
import type { PdfRef } from "./pdf-ref";
import type { PdfStream } from "./pdf-stream";
import type { PdfString } from "./pdf-string";

/**
 * Union of the PDF object types this package writes.
 * All types have a `type` field for discrimination.
 */
export type PdfObject = PdfNumber | PdfName | PdfString | PdfRef | PdfArray | PdfDict | PdfStream;
