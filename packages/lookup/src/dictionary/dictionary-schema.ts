import { z } from 'zod';

/**
 * One dictionary entry
 *
 * `entry` and every `variants` item are matched against element text;
 * `value` (default: `entry`) is what a lookup reports. Extra fields such as
 * external ids are kept as they are.
 */
export const DictionaryEntrySchema = z
  .object({
    entry: z.string().trim().min(1),
    type: z.string().trim().min(1),
    value: z.string().optional(),
    variants: z.array(z.string().trim().min(1)).default([]),
  })
  .passthrough();

export const DictionaryFileSchema = z.array(DictionaryEntrySchema);

export type DictionaryEntry = z.infer<typeof DictionaryEntrySchema>;

export type DictionaryEntryInput = z.input<typeof DictionaryEntrySchema>;

/**
 * Format zod issues as "path: message; ..."
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}
