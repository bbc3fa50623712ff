import type { ElementSeed, ParsedFileSeed, TextElement } from '@altokit/model';

import { describe, expect, test } from 'vitest';

import { ModelIntegrityError } from '../errors/pipeline-error';
import { ParsedCorpus } from './parsed-corpus';

function element(id: string, text: string): ElementSeed {
  return {
    id,
    type: 'TextLine',
    text,
    position: { hpos: 10, vpos: 20, width: 30, height: 40, baseline: null },
    parentId: 'TB1',
  };
}

function file(path: string, elements: ElementSeed[]): ParsedFileSeed {
  return { path, fileName: path, metadata: { year: '1901' }, elements };
}

function firstElement(corpus: ParsedCorpus): TextElement {
  const [first] = corpus.elements();
  if (!first) {
    throw new Error('corpus is empty');
  }
  return first;
}

describe('ParsedCorpus', () => {
  test('creates elements with initial pipeline state', () => {
    const corpus = ParsedCorpus.fromFiles([
      file('a.xml', [element('TL1', 'Acme')]),
    ]);

    expect(corpus.elements()).toEqual([
      {
        id: 'TL1',
        type: 'TextLine',
        text: 'Acme',
        position: { hpos: 10, vpos: 20, width: 30, height: 40, baseline: null },
        sourceFile: 'a.xml',
        parentId: 'TB1',
        category: null,
        matchedBy: [],
        matchedValues: {},
        marks: {},
        removed: false,
      },
    ]);
  });

  test('enumerates in file order then element order', () => {
    const corpus = ParsedCorpus.fromFiles([
      file('b.xml', [element('1', 'b1'), element('2', 'b2')]),
      file('a.xml', [element('1', 'a1')]),
    ]);

    expect(corpus.elements().map((e) => e.text)).toEqual(['b1', 'b2', 'a1']);
    expect(corpus.files().map((f) => f.path)).toEqual(['b.xml', 'a.xml']);
    expect(corpus.size).toBe(3);
  });

  test('allows the same id in different files', () => {
    const corpus = ParsedCorpus.fromFiles([
      file('a.xml', [element('TL1', 'x')]),
      file('b.xml', [element('TL1', 'y')]),
    ]);
    expect(corpus.size).toBe(2);
  });

  test('rejects duplicate ids within a file', () => {
    expect(() =>
      ParsedCorpus.fromFiles([
        file('a.xml', [element('TL1', 'x'), element('TL1', 'y')]),
      ]),
    ).toThrow(ModelIntegrityError);
    expect(() =>
      ParsedCorpus.fromFiles([
        file('a.xml', [element('TL1', 'x'), element('TL1', 'y')]),
      ]),
    ).toThrow("Duplicate element id 'TL1' in 'a.xml'");
  });

  test('rejects empty ids', () => {
    expect(() =>
      ParsedCorpus.fromFiles([file('a.xml', [element('', 'x')])]),
    ).toThrow("Element at index 0 in 'a.xml' has no id");
  });

  test('rejects the same file twice', () => {
    expect(() =>
      ParsedCorpus.fromFiles([file('a.xml', []), file('a.xml', [])]),
    ).toThrow("Duplicate file 'a.xml' in corpus");
  });

  test('empty corpus has no elements', () => {
    const corpus = ParsedCorpus.empty();
    expect(corpus.elements()).toEqual([]);
    expect(corpus.size).toBe(0);
    expect(corpus.removedCount).toBe(0);
  });

  test('getFile and fileOf resolve the owning file', () => {
    const corpus = ParsedCorpus.fromFiles([
      file('a.xml', [element('TL1', 'x')]),
    ]);
    const target = firstElement(corpus);

    expect(corpus.getFile('a.xml')?.metadata).toEqual({ year: '1901' });
    expect(corpus.getFile('missing.xml')).toBeUndefined();
    expect(corpus.fileOf(target).path).toBe('a.xml');
    expect(corpus.fileOf(target).elements[0]).toBe(target);
  });

  test('assignCategory overwrites the previous label', () => {
    const corpus = ParsedCorpus.fromFiles([
      file('a.xml', [element('TL1', 'x')]),
    ]);
    const target = firstElement(corpus);

    corpus.assignCategory(target, 'first');
    corpus.assignCategory(target, 'second');
    expect(target.category).toBe('second');
  });

  test('recordMatch appends ids and stores values', () => {
    const corpus = ParsedCorpus.fromFiles([
      file('a.xml', [element('TL1', 'x')]),
    ]);
    const target = firstElement(corpus);

    corpus.recordMatch(target, 'find(x)', 'x');
    corpus.recordMatch(target, 'categorize(a)');
    expect(target.matchedBy).toEqual(['find(x)', 'categorize(a)']);
    expect(target.matchedValues).toEqual({ 'find(x)': 'x' });
  });

  test('setMark stores annotations', () => {
    const corpus = ParsedCorpus.fromFiles([
      file('a.xml', [element('TL1', 'x')]),
    ]);
    const target = firstElement(corpus);

    corpus.setMark(target, 'checked', true);
    corpus.setMark(target, 'page', 3);
    expect(target.marks).toEqual({ checked: true, page: 3 });
  });

  test('markRemoved is monotonic and hides the element', () => {
    const corpus = ParsedCorpus.fromFiles([
      file('a.xml', [element('TL1', 'x'), element('TL2', 'y')]),
    ]);
    const target = firstElement(corpus);

    expect(corpus.markRemoved(target)).toBe(true);
    expect(corpus.markRemoved(target)).toBe(false);
    expect(target.removed).toBe(true);
    expect(corpus.elements().map((e) => e.id)).toEqual(['TL2']);
    expect(corpus.allElements({ includeRemoved: true }).map((e) => e.id)).toEqual([
      'TL1',
      'TL2',
    ]);
    expect(corpus.allElements().map((e) => e.id)).toEqual(['TL2']);
    expect(corpus.removedCount).toBe(1);
    expect(corpus.size).toBe(2);
  });

  test('rejects elements from another corpus', () => {
    const corpus = ParsedCorpus.fromFiles([
      file('a.xml', [element('TL1', 'x')]),
    ]);
    const other = ParsedCorpus.fromFiles([
      file('a.xml', [element('TL1', 'x')]),
    ]);
    const foreign = firstElement(other);

    expect(() => corpus.assignCategory(foreign, 'a')).toThrow(
      ModelIntegrityError,
    );
    expect(() => corpus.fileOf(foreign)).toThrow(
      "Element 'TL1' of 'a.xml' does not belong to this corpus",
    );
  });

  test('freezes positions and metadata', () => {
    const corpus = ParsedCorpus.fromFiles([
      file('a.xml', [element('TL1', 'x')]),
    ]);
    expect(Object.isFrozen(firstElement(corpus).position)).toBe(true);
    expect(Object.isFrozen(corpus.getFile('a.xml')?.metadata)).toBe(true);
  });
});
