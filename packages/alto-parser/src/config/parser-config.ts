import { z } from 'zod';

import { AltoParseError } from '../errors/alto-parse-error';
import { ALTO_PARSER } from './constants';

const isValidRegex = (pattern: string): boolean => {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
};

export const BatchConditionSchema = z.object({
  key: z.string().min(1),
  values: z.string().min(1),
});

export const BatchDefinitionSchema = z.object({
  name: z.string().min(1),
  conditions: z.array(BatchConditionSchema).default([]),
});

/**
 * Regex applied to each file's base name; capture groups are stored as
 * file metadata under `valueNames`, in order
 */
export const FileNameStructureSchema = z.object({
  pattern: z.string().refine(isValidRegex, {
    message: 'pattern must be a valid regular expression',
  }),
  valueNames: z.array(z.string().min(1)).min(1),
});

export const ParserConfigSchema = z.object({
  /**
   * What becomes one text element: a TextLine or a whole TextBlock
   */
  lineType: z
    .enum(['TextLine', 'TextBlock'])
    .default(ALTO_PARSER.DEFAULT_LINE_TYPE),

  /**
   * Only files with this ending are picked up when scanning a directory
   */
  fileEnding: z.string().min(1).default(ALTO_PARSER.DEFAULT_FILE_ENDING),

  /**
   * Static metadata added to every file
   */
  metadata: z.record(z.string(), z.string()).default({}),

  fileNameStructure: FileNameStructureSchema.optional(),

  batches: z.array(BatchDefinitionSchema).default([]),

  /**
   * Generate `block-001` / `line-001` style IDs for elements without an ID
   * attribute. When false, such elements keep an empty ID and corpus
   * construction fails.
   */
  generateMissingIds: z.boolean().default(true),

  /**
   * Level of the console logger created when no logger is injected
   */
  logLevel: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('info'),
});

export type ParserConfigInput = z.input<typeof ParserConfigSchema>;
export type ParserConfig = z.output<typeof ParserConfigSchema>;

/**
 * Validate a parser configuration and fill in defaults
 *
 * Accepts unknown input so that configurations read from JSON files can be
 * passed straight in.
 *
 * @throws {AltoParseError} When the configuration does not match the schema
 */
export function parseParserConfig(input: unknown = {}): ParserConfig {
  const result = ParserConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new AltoParseError(`Invalid parser configuration: ${details}`, {
      cause: result.error,
    });
  }
  return result.data;
}
