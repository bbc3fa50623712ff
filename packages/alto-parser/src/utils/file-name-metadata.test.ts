import { describe, expect, test } from 'vitest';

import { extractFileNameMetadata } from './file-name-metadata';

describe('extractFileNameMetadata', () => {
  test('maps capture groups to value names', () => {
    expect(
      extractFileNameMetadata('1923_0022.xml', {
        pattern: '(\\d{4})_(\\d{4})',
        valueNames: ['year', 'page'],
      }),
    ).toEqual({ year: '1923', page: '0022' });
  });

  test('searches anywhere in the file name', () => {
    expect(
      extractFileNameMetadata('scan_bscc_0042_a1.alto', {
        pattern: 'bscc_(\\d{4})_([a-z0-9]*)',
        valueNames: ['page', 'id'],
      }),
    ).toEqual({ page: '0042', id: 'a1' });
  });

  test('returns null when the pattern does not match', () => {
    expect(
      extractFileNameMetadata('cover.xml', {
        pattern: '(\\d{4})',
        valueNames: ['page'],
      }),
    ).toBeNull();
  });

  test('returns null when group and value name counts differ', () => {
    expect(
      extractFileNameMetadata('1923_0022.xml', {
        pattern: '(\\d{4})_(\\d{4})',
        valueNames: ['year'],
      }),
    ).toBeNull();
  });

  test('stores an empty string for a group that did not participate', () => {
    expect(
      extractFileNameMetadata('page_12.xml', {
        pattern: 'page_(\\d+)(b)?',
        valueNames: ['page', 'side'],
      }),
    ).toEqual({ page: '12', side: '' });
  });
});
