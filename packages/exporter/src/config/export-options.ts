import { z } from 'zod';

import { ExportError } from '../errors/export-error';

export const ExportOptionsSchema = z.object({
  /**
   * Field separator for delimited output
   */
  delimiter: z.string().min(1).default('\t'),

  includeFileName: z.boolean().default(true),

  /**
   * Position columns (hpos, vpos, width, height, baseline)
   */
  includeAttributes: z.boolean().default(true),

  /**
   * The matchedBy column
   */
  includeMatches: z.boolean().default(true),

  /**
   * The matchedValues column: the value each selecting operation captured
   */
  includeValues: z.boolean().default(true),

  includeMarks: z.boolean().default(true),

  includeFileMetadata: z.boolean().default(true),

  /**
   * Export removed elements too, with a `removed` column
   */
  includeRemoved: z.boolean().default(false),

  /**
   * Throw ExportError instead of writing an empty export
   */
  failOnEmpty: z.boolean().default(false),
});

export type ExportOptionsInput = z.input<typeof ExportOptionsSchema>;

export type ExportOptions = z.output<typeof ExportOptionsSchema>;

/**
 * Validate export options and apply defaults
 *
 * @throws ExportError listing every invalid option
 */
export function parseExportOptions(input: unknown = {}): ExportOptions {
  const result = ExportOptionsSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
      })
      .join('; ');
    throw new ExportError(`Invalid export options: ${details}`);
  }
  return result.data;
}
