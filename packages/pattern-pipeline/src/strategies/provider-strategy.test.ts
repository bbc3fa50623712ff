import type { TextElement } from '@altokit/model';
import type { DictionaryProvider, EntityProvider } from '../providers/types';

import { describe, expect, test, vi } from 'vitest';

import { ProviderError } from '../errors/pipeline-error';
import { DictionaryStrategy } from './dictionary-strategy';
import { EntityStrategy } from './entity-strategy';

function element(text: string): TextElement {
  return {
    id: 'TL7',
    type: 'TextLine',
    text,
    position: { hpos: null, vpos: null, width: null, height: null, baseline: null },
    sourceFile: 'a.xml',
    parentId: null,
    category: null,
    matchedBy: [],
    matchedValues: {},
    marks: {},
    removed: false,
  };
}

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('DictionaryStrategy', () => {
  const cities: DictionaryProvider = {
    name: 'cities',
    lookup: (text) =>
      text === 'Berlin'
        ? [
            { key: 'Berlin', value: 'DE', type: 'city' },
            { key: 'Berlin', value: 'US' },
          ]
        : [],
  };

  test('builds its id from option name, provider name or default', () => {
    const logger = createLogger();
    expect(new DictionaryStrategy(cities, logger, 'places').id).toBe(
      'lookup(places)',
    );
    expect(new DictionaryStrategy(cities, logger).id).toBe('lookup(cities)');
    expect(new DictionaryStrategy({ lookup: () => [] }, logger).id).toBe(
      'lookup(dictionary)',
    );
  });

  test('records the first value and offers its type', () => {
    const strategy = new DictionaryStrategy(cities, createLogger());
    expect(strategy.evaluate(element('Berlin'))).toEqual({
      value: 'DE',
      candidate: 'city',
    });
  });

  test('leaves the candidate out without a type', () => {
    const strategy = new DictionaryStrategy(
      { lookup: () => [{ key: 'Bern', value: 'CH' }] },
      createLogger(),
    );
    expect(strategy.evaluate(element('Bern'))).toEqual({ value: 'CH' });
  });

  test('returns null on no pairs', () => {
    const strategy = new DictionaryStrategy(cities, createLogger());
    expect(strategy.evaluate(element('Paris'))).toBeNull();
  });

  test('wraps provider failures in ProviderError', () => {
    const cause = new Error('table closed');
    const strategy = new DictionaryStrategy(
      {
        name: 'cities',
        lookup: () => {
          throw cause;
        },
      },
      createLogger(),
    );

    expect(() => strategy.evaluate(element('Berlin'))).toThrow(
      "lookup(cities) failed on element 'TL7' of a.xml: table closed",
    );
    try {
      strategy.evaluate(element('Berlin'));
    } catch (error) {
      expect(error).toBeInstanceOf(ProviderError);
      expect(error instanceof ProviderError && error.cause).toBe(cause);
    }
  });

  test('rethrows ProviderError from the provider unchanged', () => {
    const thrown = new ProviderError('quota exceeded');
    const strategy = new DictionaryStrategy(
      {
        lookup: () => {
          throw thrown;
        },
      },
      createLogger(),
    );
    expect(() => strategy.evaluate(element('x'))).toThrow(thrown);
  });

  test('treats failures the provider marks recoverable as no match', () => {
    const logger = createLogger();
    const strategy = new DictionaryStrategy(
      {
        name: 'cities',
        lookup: () => {
          throw new Error('unsupported script');
        },
        isRecoverable: () => true,
      },
      logger,
    );

    expect(strategy.evaluate(element('Берлин'))).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      "[DictionaryStrategy] lookup(cities) skipped element 'TL7' of a.xml: unsupported script",
    );
  });

  test('treats a recoverable ProviderError as no match', () => {
    const strategy = new DictionaryStrategy(
      {
        lookup: () => {
          throw new ProviderError('miss', { recoverable: true });
        },
      },
      createLogger(),
    );
    expect(strategy.evaluate(element('x'))).toBeNull();
  });
});

describe('EntityStrategy', () => {
  const ner: EntityProvider = {
    name: 'ner',
    tag: (text) =>
      text.includes('Acme')
        ? [
            { span: 'Acme', entityType: 'ORG' },
            { span: 'Berlin', entityType: 'LOC' },
          ]
        : [],
  };

  test('records the first entity type as value and candidate', () => {
    const strategy = new EntityStrategy(ner, createLogger());
    expect(strategy.id).toBe('tag(ner)');
    expect(strategy.evaluate(element('Acme Berlin'))).toEqual({
      value: 'ORG',
      candidate: 'ORG',
    });
  });

  test('filters by entity type', () => {
    const strategy = new EntityStrategy(ner, createLogger(), {
      types: ['LOC'],
    });
    expect(strategy.evaluate(element('Acme Berlin'))).toEqual({
      value: 'LOC',
      candidate: 'LOC',
    });

    const none = new EntityStrategy(ner, createLogger(), { types: ['PER'] });
    expect(none.evaluate(element('Acme Berlin'))).toBeNull();
  });

  test('defaults the id name', () => {
    expect(new EntityStrategy({ tag: () => [] }, createLogger()).id).toBe(
      'tag(entities)',
    );
  });

  test('wraps tagger failures', () => {
    const strategy = new EntityStrategy(
      {
        name: 'ner',
        tag: () => {
          throw new Error('model unavailable');
        },
      },
      createLogger(),
    );
    expect(() => strategy.evaluate(element('x'))).toThrow(ProviderError);
  });
});
