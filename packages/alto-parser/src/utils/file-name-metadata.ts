import type { FileMetadata } from '@altokit/model';

import type { ParserConfig } from '../config/parser-config';

type FileNameStructure = NonNullable<ParserConfig['fileNameStructure']>;

/**
 * Extract metadata from a file name
 *
 * The pattern's capture groups are assigned to `valueNames` in order. Returns
 * null when the pattern does not match or when the number of capture groups
 * differs from the number of value names.
 *
 * @example
 * ```typescript
 * extractFileNameMetadata('1923_0022.xml', {
 *   pattern: '(\\d{4})_(\\d{4})',
 *   valueNames: ['year', 'page'],
 * });
 * // { year: '1923', page: '0022' }
 * ```
 */
export function extractFileNameMetadata(
  fileName: string,
  structure: FileNameStructure,
): FileMetadata | null {
  const match = new RegExp(structure.pattern).exec(fileName);
  if (!match || match.length - 1 !== structure.valueNames.length) {
    return null;
  }

  const metadata: FileMetadata = {};
  structure.valueNames.forEach((name, index) => {
    metadata[name] = match[index + 1] ?? '';
  });
  return metadata;
}
