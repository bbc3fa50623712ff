import { describe, expect, test } from 'vitest';

import { AltoParseError } from './alto-parse-error';

describe('AltoParseError', () => {
  describe('constructor', () => {
    test('creates error with message', () => {
      const error = new AltoParseError('test message');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AltoParseError);
      expect(error.message).toBe('test message');
      expect(error.name).toBe('AltoParseError');
      expect(error.filePath).toBeUndefined();
    });

    test('keeps cause and file path', () => {
      const cause = new Error('original error');
      const error = new AltoParseError('wrapped message', {
        cause,
        filePath: '/data/page_0001.xml',
      });

      expect(error.cause).toBe(cause);
      expect(error.filePath).toBe('/data/page_0001.xml');
    });
  });

  describe('getErrorMessage', () => {
    test('returns message from Error instance', () => {
      expect(AltoParseError.getErrorMessage(new Error('boom'))).toBe('boom');
    });

    test('returns String() for non-Error values', () => {
      expect(AltoParseError.getErrorMessage('string error')).toBe(
        'string error',
      );
      expect(AltoParseError.getErrorMessage(42)).toBe('42');
      expect(AltoParseError.getErrorMessage(undefined)).toBe('undefined');
    });
  });

  describe('fromError', () => {
    test('prefixes the context and keeps the cause', () => {
      const cause = new Error('ENOENT');
      const error = AltoParseError.fromError(
        'Failed to read file',
        cause,
        'missing.xml',
      );

      expect(error.message).toBe('Failed to read file: ENOENT');
      expect(error.cause).toBe(cause);
      expect(error.filePath).toBe('missing.xml');
    });
  });
});
