import type { LoggerMethods } from '@altokit/logger';

import { readFile } from 'node:fs/promises';

import { DictionaryLoadError } from '../errors/dictionary-load-error';
import {
  type DictionaryEntry,
  DictionaryFileSchema,
  formatIssues,
} from './dictionary-schema';
import { DictionaryTable, type DictionaryTableOptions } from './dictionary-table';

/**
 * DictionaryLoader
 *
 * Reads JSON dictionary files into DictionaryTables.
 */
export class DictionaryLoader {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Load one dictionary file
   *
   * @throws DictionaryLoadError when the file cannot be read or is invalid
   */
  async load(
    path: string,
    options: DictionaryTableOptions = {},
  ): Promise<DictionaryTable> {
    return new DictionaryTable(await this.readEntries(path), options);
  }

  /**
   * Load several dictionary files into one table, keeping file order
   */
  async loadAll(
    paths: readonly string[],
    options: DictionaryTableOptions = {},
  ): Promise<DictionaryTable> {
    const entries: DictionaryEntry[] = [];
    for (const path of paths) {
      entries.push(...(await this.readEntries(path)));
    }
    return new DictionaryTable(entries, options);
  }

  /**
   * Validate already-read dictionary content
   */
  parse(content: string, source: string): DictionaryEntry[] {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw DictionaryLoadError.fromError(
        `The dictionary '${source}' is not valid JSON`,
        error,
        source,
      );
    }

    const result = DictionaryFileSchema.safeParse(data);
    if (!result.success) {
      throw new DictionaryLoadError(
        `The dictionary '${source}' is invalid: ${formatIssues(result.error)}`,
        { filePath: source },
      );
    }
    return result.data;
  }

  private async readEntries(path: string): Promise<DictionaryEntry[]> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw DictionaryLoadError.fromError(
        `Cannot read dictionary '${path}'`,
        error,
        path,
      );
    }

    const entries = this.parse(content, path);
    this.logger.info(
      `[DictionaryLoader] Loaded ${entries.length} entries from ${path}`,
    );
    return entries;
  }
}
