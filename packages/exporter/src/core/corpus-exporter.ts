import type { LoggerMethods } from '@altokit/logger';
import type {
  ExportCell,
  ExportRow,
  ExportValue,
  ParsedFile,
  TextElement,
} from '@altokit/model';
import type { ParsedCorpus } from '@altokit/pattern-pipeline';

import { uniq } from 'es-toolkit';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import * as XLSX from 'xlsx';

import {
  type ExportOptions,
  parseExportOptions,
} from '../config/export-options';
import { ExportError } from '../errors/export-error';

/**
 * Row after the column flags are applied
 */
export type ExportRecord = Record<string, ExportValue>;

export interface CorpusExporterOptions {
  logger: LoggerMethods;
  options?: unknown;
}

const ATTRIBUTE_COLUMNS = [
  'hpos',
  'vpos',
  'width',
  'height',
  'baseline',
] as const;

/**
 * Flatten a value into one delimited cell: lists are joined with "|",
 * captured values are written as a JSON object
 */
function toCsvCell(value: ExportValue | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (Array.isArray(value)) {
    return value.join('|');
  }
  if (typeof value === 'object') {
    return Object.keys(value).length > 0 ? JSON.stringify(value) : '';
  }
  return String(value);
}

/**
 * CorpusExporter
 *
 * Serializes the elements of a corpus after all pipeline chains have run.
 * Removed elements are left out unless `includeRemoved` is set.
 *
 * @example
 * ```typescript
 * const exporter = new CorpusExporter(corpus, { logger });
 * await exporter.saveCsv('output/export.tsv');
 * await exporter.saveJsons('output/json/');
 * ```
 */
export class CorpusExporter {
  readonly options: ExportOptions;
  private readonly logger: LoggerMethods;

  /**
   * @throws ExportError when the options are invalid
   */
  constructor(
    private readonly corpus: ParsedCorpus,
    { logger, options }: CorpusExporterOptions,
  ) {
    this.logger = logger;
    this.options = parseExportOptions(options);
  }

  /**
   * Full rows, one per exported element, in corpus order
   */
  rows(files: readonly ParsedFile[] = this.corpus.files()): ExportRow[] {
    return files.flatMap((file) =>
      file.elements
        .filter((element) => this.options.includeRemoved || !element.removed)
        .map((element) => this.toRow(element, file)),
    );
  }

  /**
   * Rows with the columns switched off by the options removed
   */
  records(files?: readonly ParsedFile[]): ExportRecord[] {
    const dropped = new Set<string>();
    if (!this.options.includeFileName) {
      dropped.add('file');
      dropped.add('path');
    }
    if (!this.options.includeAttributes) {
      ATTRIBUTE_COLUMNS.forEach((column) => dropped.add(column));
    }
    if (!this.options.includeMatches) {
      dropped.add('matchedBy');
    }
    if (!this.options.includeValues) {
      dropped.add('matchedValues');
    }
    return this.rows(files).map((row) =>
      Object.fromEntries(
        Object.entries(row).filter(([column]) => !dropped.has(column)),
      ),
    );
  }

  /**
   * Delimited text with a header line; every line ends with "\n".
   * Empty when there is nothing to export.
   */
  toCsv(files?: readonly ParsedFile[]): string {
    const records = this.records(files);
    const header = uniq(records.flatMap((record) => Object.keys(record)));
    if (header.length === 0) {
      return '';
    }

    const sheet = XLSX.utils.json_to_sheet(
      records.map((record) =>
        Object.fromEntries(header.map((key) => [key, toCsvCell(record[key])])),
      ),
      { header },
    );
    const csv = XLSX.utils.sheet_to_csv(sheet, {
      FS: this.options.delimiter,
      RS: '\n',
    });
    return `${csv}\n`;
  }

  toJson(files?: readonly ParsedFile[]): string {
    return JSON.stringify(this.records(files), null, 2);
  }

  /**
   * Write every file's elements into one delimited file
   *
   * @returns Number of rows written
   */
  async saveCsv(path: string): Promise<number> {
    const count = this.checkNotEmpty(this.rows().length, path);
    await this.write(path, this.toCsv());
    this.logger.info(`[CorpusExporter] Saved ${count} rows to ${path}`);
    return count;
  }

  async saveJson(path: string): Promise<number> {
    const count = this.checkNotEmpty(this.rows().length, path);
    await this.write(path, this.toJson());
    this.logger.info(`[CorpusExporter] Saved ${count} rows to ${path}`);
    return count;
  }

  /**
   * Write one delimited file per parsed file into `directory`
   * (".tsv" for tab-separated output, ".csv" otherwise)
   *
   * @returns Paths written
   */
  async saveCsvs(directory: string): Promise<string[]> {
    const extension = this.options.delimiter === '\t' ? '.tsv' : '.csv';
    return this.saveEach(directory, extension, (file) => this.toCsv([file]));
  }

  async saveJsons(directory: string): Promise<string[]> {
    return this.saveEach(directory, '.json', (file) => this.toJson([file]));
  }

  private toRow(element: TextElement, file: ParsedFile): ExportRow {
    const row: ExportRow = {
      file: file.fileName,
      path: file.path,
      id: element.id,
      type: element.type,
      text: element.text,
      category: element.category,
      hpos: element.position.hpos,
      vpos: element.position.vpos,
      width: element.position.width,
      height: element.position.height,
      baseline: element.position.baseline,
      matchedBy: [...element.matchedBy],
      matchedValues: { ...element.matchedValues },
    };
    if (this.options.includeRemoved) {
      row.removed = element.removed;
    }

    const extra: Array<[string, ExportCell]> = [
      ...(this.options.includeMarks ? Object.entries(element.marks) : []),
      ...(this.options.includeFileMetadata ? Object.entries(file.metadata) : []),
    ];
    // fixed columns win over marks and metadata of the same name
    for (const [key, value] of extra) {
      if (!(key in row)) {
        row[key] = value;
      }
    }
    return row;
  }

  private async saveEach(
    directory: string,
    extension: string,
    render: (file: ParsedFile) => string,
  ): Promise<string[]> {
    const files = this.corpus
      .files()
      .filter((file) => this.rows([file]).length > 0);
    this.checkNotEmpty(files.length, directory);

    const written: string[] = [];
    for (const file of files) {
      const path = join(
        directory,
        `${basename(file.fileName, extname(file.fileName))}${extension}`,
      );
      await this.write(path, render(file));
      written.push(path);
    }

    this.logger.info(
      `[CorpusExporter] Saved ${written.length} files to ${directory}`,
    );
    return written;
  }

  private checkNotEmpty(count: number, target: string): number {
    if (count === 0) {
      if (this.options.failOnEmpty) {
        throw new ExportError(`Nothing to export to '${target}'`, {
          filePath: target,
        });
      }
      this.logger.warn(`[CorpusExporter] Nothing to export to ${target}`);
    }
    return count;
  }

  private async write(path: string, content: string): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, 'utf-8');
    } catch (error) {
      throw ExportError.fromError(`Cannot write '${path}'`, error, path);
    }
  }
}
