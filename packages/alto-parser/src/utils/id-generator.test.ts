import { beforeEach, describe, expect, test } from 'vitest';

import { IdGenerator } from './id-generator';

describe('IdGenerator', () => {
  let generator: IdGenerator;

  beforeEach(() => {
    generator = new IdGenerator();
  });

  describe('generate', () => {
    test('should generate block IDs with correct format', () => {
      expect(generator.generate('TextBlock')).toBe('block-001');
      expect(generator.generate('TextBlock')).toBe('block-002');
    });

    test('should generate line IDs with correct format', () => {
      expect(generator.generate('TextLine')).toBe('line-001');
      expect(generator.generate('TextLine')).toBe('line-002');
    });

    test('should pad double digits with zeros', () => {
      for (let i = 0; i < 9; i++) {
        generator.generate('TextLine');
      }
      expect(generator.generate('TextLine')).toBe('line-010');
    });

    test('should handle numbers larger than 999', () => {
      for (let i = 0; i < 999; i++) {
        generator.generate('TextBlock');
      }
      expect(generator.generate('TextBlock')).toBe('block-1000');
    });

    test('should increment independently per element type', () => {
      generator.generate('TextBlock');
      generator.generate('TextBlock');
      expect(generator.generate('TextLine')).toBe('line-001');
    });
  });

  describe('reserved IDs', () => {
    test('should skip IDs already present in the file', () => {
      const reserved = new IdGenerator(new Set(['line-001', 'line-002']));

      expect(reserved.generate('TextLine')).toBe('line-003');
      expect(reserved.generate('TextBlock')).toBe('block-001');
    });

    test('should keep counting after a skipped ID', () => {
      const reserved = new IdGenerator(new Set(['block-002']));

      expect(reserved.generate('TextBlock')).toBe('block-001');
      expect(reserved.generate('TextBlock')).toBe('block-003');
      expect(reserved.generate('TextBlock')).toBe('block-004');
    });
  });
});
