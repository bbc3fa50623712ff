import type { DictionaryEntry } from './dictionary-schema';

import { describe, expect, test } from 'vitest';

import { DictionaryTable } from './dictionary-table';

const entries: DictionaryEntry[] = [
  { entry: 'Berlin', type: 'city', value: 'DE', variants: ['Berlyn'] },
  { entry: 'New York', type: 'city', value: 'US', variants: [] },
  { entry: 'Dr.', type: 'title', variants: ['Doktor'] },
];

describe('DictionaryTable', () => {
  test('strict lookup requires the whole text', () => {
    const table = new DictionaryTable(entries, { name: 'city_table' });

    expect(table.lookup('Berlin')).toEqual([
      { key: 'Berlin', value: 'DE', type: 'city' },
    ]);
    expect(table.lookup('Hotel Berlin')).toEqual([]);
    expect(table.name).toBe('city_table');
  });

  test('matches variants and reports the entry value', () => {
    const table = new DictionaryTable(entries);
    expect(table.lookup('Berlyn')).toEqual([
      { key: 'Berlyn', value: 'DE', type: 'city' },
    ]);
  });

  test('reports the entry itself without a value', () => {
    const table = new DictionaryTable(entries);
    expect(table.lookup('Doktor')).toEqual([
      { key: 'Doktor', value: 'Dr.', type: 'title' },
    ]);
  });

  test('collapses whitespace before comparing', () => {
    const table = new DictionaryTable(entries);
    expect(table.lookup('  New   York ')).toEqual([
      { key: 'New York', value: 'US', type: 'city' },
    ]);
  });

  test('substring lookup matches whole words only', () => {
    const table = new DictionaryTable(entries, { strict: false });

    expect(table.lookup('Hotel Berlin, Dr. Meier')).toEqual([
      { key: 'Berlin', value: 'DE', type: 'city' },
      { key: 'Dr.', value: 'Dr.', type: 'title' },
    ]);
    expect(table.lookup('Berliner Str.')).toEqual([]);
  });

  test('restrictTo limits the entry type', () => {
    const table = new DictionaryTable(entries, {
      strict: false,
      restrictTo: 'title',
    });
    expect(table.lookup('Dr. Berlin')).toEqual([
      { key: 'Dr.', value: 'Dr.', type: 'title' },
    ]);
  });

  test('ignoreCase compares case-insensitively', () => {
    expect(new DictionaryTable(entries).lookup('BERLIN')).toEqual([]);
    expect(
      new DictionaryTable(entries, { ignoreCase: true }).lookup('BERLIN'),
    ).toEqual([{ key: 'Berlin', value: 'DE', type: 'city' }]);
  });

  test('empty text never matches', () => {
    expect(new DictionaryTable(entries, { strict: false }).lookup('  ')).toEqual(
      [],
    );
  });

  test('withOptions keeps entries and name', () => {
    const table = new DictionaryTable(entries, { name: 'places' });
    const loose = table.withOptions({ strict: false });

    expect(loose.name).toBe('places');
    expect(loose.strict).toBe(false);
    expect(loose.size).toBe(3);
    expect(loose.lookup('in Berlin')).toHaveLength(1);
  });

  test('merge combines entries in order', () => {
    const cities = new DictionaryTable(entries.slice(0, 2), { name: 'all' });
    const titles = new DictionaryTable(entries.slice(2));
    const merged = cities.merge(titles);

    expect(merged.size).toBe(3);
    expect(merged.name).toBe('all');
    expect(merged.types).toEqual(['city', 'title']);
  });

  test('reports every entry sharing a key', () => {
    const table = new DictionaryTable([
      { entry: 'Paris', type: 'city', value: 'FR', variants: [] },
      { entry: 'Paris', type: 'city', value: 'US', variants: [] },
    ]);
    expect(table.lookup('Paris').map((match) => match.value)).toEqual([
      'FR',
      'US',
    ]);
  });
});
