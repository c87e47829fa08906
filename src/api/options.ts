/**
 * Conversion options and their validation.
 */

import { z } from "zod";
import { InvalidOptionsError } from "#src/errors";
import type { WarningHandler } from "#src/svg/types";

/**
 * Validated, defaulted conversion settings.
 *
 * - columns / rows: size of the layout grid (bookkeeping only)
 * - fontName: display only; text always renders in Helvetica
 * - fontSize: points
 * - title: written to the document Info dictionary
 */
export const ConvertOptionsSchema = z.object({
  columns: z.number().int().min(1).default(3),
  rows: z.number().int().min(1).default(10),
  fontName: z.string().min(1).default("Helvetica"),
  fontSize: z.number().positive().finite().default(12),
  title: z.string().optional(),
});

export type ResolvedConvertOptions = z.infer<typeof ConvertOptionsSchema>;

export type ConvertOptions = z.input<typeof ConvertOptionsSchema> & {
  /** Called for each non-fatal diagnostic */
  onWarning?: WarningHandler;
};

/**
 * Apply defaults and validate.
 *
 * @throws {InvalidOptionsError} listing every invalid field
 */
export function resolveOptions(options: ConvertOptions = {}): ResolvedConvertOptions {
  // onWarning is not part of the schema and is stripped here
  const result = ConvertOptionsSchema.safeParse(options);

  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map(issue => `${issue.path.join(".") || "options"}: ${issue.message}`),
    );
  }

  return result.data;
}
