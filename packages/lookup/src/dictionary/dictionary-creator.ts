import type { LoggerMethods } from '@altokit/logger';
import type { DictionaryEntry } from './dictionary-schema';

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as XLSX from 'xlsx';

import { DictionaryLoadError } from '../errors/dictionary-load-error';

export interface DictionaryCreatorOptions {
  /**
   * Type written into every entry
   */
  type: string;

  /**
   * Column holding the entry (default: "entry", else the first column)
   */
  entryColumn?: string;

  /**
   * Column holding the reported value (default: none, value = entry)
   */
  valueColumn?: string;

  /**
   * Column holding alternative spellings (default: "variants")
   */
  variantsColumn?: string;

  /**
   * Separator between variants (default: "|")
   */
  variantSeparator?: string;
}

function cellText(value: unknown): string {
  return value === undefined || value === null ? '' : String(value).trim();
}

/**
 * DictionaryCreator
 *
 * Turns a CSV table into a JSON dictionary. Columns other than the entry,
 * value and variants columns are copied into each entry as extra fields.
 */
export class DictionaryCreator {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Build entries from CSV content
   *
   * @throws DictionaryLoadError when the table has no rows or lacks the entry column
   */
  fromCsv(
    content: string,
    options: DictionaryCreatorOptions,
    source = 'csv',
  ): DictionaryEntry[] {
    const workbook = XLSX.read(content, { type: 'string', raw: true });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
      throw new DictionaryLoadError(`The table '${source}' is empty`, {
        filePath: source,
      });
    }

    const [headerRow = []] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      raw: true,
    });
    const headers = headerRow.map(cellText);
    const entryColumn =
      options.entryColumn ??
      (headers.includes('entry') ? 'entry' : headers[0]);
    if (entryColumn === undefined || !headers.includes(entryColumn)) {
      throw new DictionaryLoadError(
        `The table '${source}' has no column '${entryColumn ?? 'entry'}'`,
        { filePath: source },
      );
    }

    const variantsColumn = options.variantsColumn ?? 'variants';
    const separator = options.variantSeparator ?? '|';
    const reserved = new Set([entryColumn, variantsColumn, options.valueColumn]);

    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
      raw: true,
      defval: '',
    });

    const entries: DictionaryEntry[] = [];
    for (const row of rows) {
      const entry = cellText(row[entryColumn]);
      if (entry === '') {
        continue;
      }

      const extra: Record<string, string> = {};
      for (const header of headers) {
        const text = cellText(row[header]);
        if (!reserved.has(header) && header !== '' && text !== '') {
          extra[header] = text;
        }
      }

      const value =
        options.valueColumn === undefined
          ? ''
          : cellText(row[options.valueColumn]);

      entries.push({
        ...extra,
        entry,
        type: options.type,
        ...(value === '' ? {} : { value }),
        variants: cellText(row[variantsColumn])
          .split(separator)
          .map((variant) => variant.trim())
          .filter((variant) => variant !== ''),
      });
    }

    return entries;
  }

  /**
   * Read a CSV file and write the dictionary as JSON
   *
   * @returns The entries written
   */
  async fromFile(
    csvPath: string,
    jsonPath: string,
    options: DictionaryCreatorOptions,
  ): Promise<DictionaryEntry[]> {
    let content: string;
    try {
      content = await readFile(csvPath, 'utf-8');
    } catch (error) {
      throw DictionaryLoadError.fromError(
        `Cannot read table '${csvPath}'`,
        error,
        csvPath,
      );
    }

    const entries = this.fromCsv(content, options, csvPath);
    await mkdir(dirname(jsonPath), { recursive: true });
    await writeFile(jsonPath, JSON.stringify(entries, null, 2), 'utf-8');

    this.logger.info(
      `[DictionaryCreator] Wrote ${entries.length} '${options.type}' entries from ${csvPath} to ${jsonPath}`,
    );
    return entries;
  }
}
