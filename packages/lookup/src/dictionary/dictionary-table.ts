import type {
  DictionaryMatch,
  DictionaryProvider,
} from '@altokit/pattern-pipeline';
import type { DictionaryEntry } from './dictionary-schema';

import { escapeRegExp } from 'es-toolkit';

export interface DictionaryTableOptions {
  /**
   * Name reported to the pipeline (`lookup(<name>)`)
   */
  name?: string;

  /**
   * true: the whole element text must equal an entry or variant.
   * false: an entry or variant occurring as a whole word anywhere in the
   * text is enough. (default: true)
   */
  strict?: boolean;

  /**
   * Only consult entries of this type
   */
  restrictTo?: string;

  /**
   * (default: false)
   */
  ignoreCase?: boolean;
}

interface IndexedKey {
  key: string;
  entry: DictionaryEntry;
  pattern: RegExp;
}

function normalize(text: string, ignoreCase: boolean): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return ignoreCase ? collapsed.toLowerCase() : collapsed;
}

/**
 * DictionaryTable
 *
 * In-memory dictionary implementing the pipeline's DictionaryProvider
 * contract. Whitespace runs are collapsed before comparing.
 *
 * @example
 * ```typescript
 * const table = new DictionaryTable(entries, { name: 'locations' });
 * pipeline
 *   .lookupDictionary(table.withOptions({ strict: false, restrictTo: 'city' }))
 *   .categorize()
 *   .remove();
 * ```
 */
export class DictionaryTable implements DictionaryProvider {
  readonly name: string;
  readonly strict: boolean;
  readonly restrictTo?: string;
  readonly ignoreCase: boolean;

  private readonly exact = new Map<string, IndexedKey[]>();
  private readonly keys: IndexedKey[] = [];

  constructor(
    private readonly entries: readonly DictionaryEntry[],
    options: DictionaryTableOptions = {},
  ) {
    this.name = options.name ?? 'dictionary';
    this.strict = options.strict ?? true;
    this.restrictTo = options.restrictTo;
    this.ignoreCase = options.ignoreCase ?? false;

    for (const entry of entries) {
      if (this.restrictTo !== undefined && entry.type !== this.restrictTo) {
        continue;
      }
      for (const key of [entry.entry, ...entry.variants]) {
        this.index(key, entry);
      }
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Distinct entry types in first-seen order
   */
  get types(): string[] {
    return [...new Set(this.entries.map((entry) => entry.type))];
  }

  /**
   * Same entries with other matching options; the name is kept unless given
   */
  withOptions(options: DictionaryTableOptions): DictionaryTable {
    return new DictionaryTable(this.entries, {
      name: this.name,
      strict: this.strict,
      restrictTo: this.restrictTo,
      ignoreCase: this.ignoreCase,
      ...options,
    });
  }

  /**
   * Table holding the entries of both tables, this one first
   */
  merge(other: DictionaryTable): DictionaryTable {
    return new DictionaryTable([...this.entries, ...other.entries], {
      name: this.name,
      strict: this.strict,
      restrictTo: this.restrictTo,
      ignoreCase: this.ignoreCase,
    });
  }

  lookup(text: string): DictionaryMatch[] {
    const normalized = normalize(text, this.ignoreCase);
    if (normalized === '') {
      return [];
    }

    const hits = this.strict
      ? (this.exact.get(normalized) ?? [])
      : this.keys.filter((indexed) => indexed.pattern.test(normalized));

    return hits.map(({ key, entry }) => ({
      key,
      value: entry.value ?? entry.entry,
      type: entry.type,
    }));
  }

  private index(key: string, entry: DictionaryEntry): void {
    const normalized = normalize(key, this.ignoreCase);
    if (normalized === '') {
      return;
    }
    const indexed: IndexedKey = {
      key,
      entry,
      pattern: new RegExp(
        `(?<![\\p{L}\\p{N}])${escapeRegExp(normalized)}(?![\\p{L}\\p{N}])`,
        'u',
      ),
    };
    this.keys.push(indexed);

    const bucket = this.exact.get(normalized);
    if (bucket) {
      bucket.push(indexed);
    } else {
      this.exact.set(normalized, [indexed]);
    }
  }
}
