import { describe, expect, test } from 'vitest';

import { ExportError } from '../errors/export-error';
import { parseExportOptions } from './export-options';

describe('parseExportOptions', () => {
  test('applies defaults', () => {
    expect(parseExportOptions()).toEqual({
      delimiter: '\t',
      includeFileName: true,
      includeAttributes: true,
      includeMatches: true,
      includeValues: true,
      includeMarks: true,
      includeFileMetadata: true,
      includeRemoved: false,
      failOnEmpty: false,
    });
  });

  test('keeps given values', () => {
    const options = parseExportOptions({
      delimiter: ';',
      includeAttributes: false,
    });
    expect(options.delimiter).toBe(';');
    expect(options.includeAttributes).toBe(false);
    expect(options.includeMarks).toBe(true);
  });

  test('lists every invalid option', () => {
    expect(() =>
      parseExportOptions({ delimiter: '', includeMarks: 'yes' }),
    ).toThrow(
      'Invalid export options: delimiter: String must contain at least 1 character(s); includeMarks: Expected boolean, received string',
    );
    expect(() => parseExportOptions(null)).toThrow(ExportError);
  });
});
