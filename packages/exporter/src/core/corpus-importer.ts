import type { LoggerMethods } from '@altokit/logger';
import type { ElementSeed, ParsedFileSeed } from '@altokit/model';

import { ParsedCorpus } from '@altokit/pattern-pipeline';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { ExportError } from '../errors/export-error';

const nullableNumber = z.number().nullable().default(null);

const ImportRowSchema = z
  .object({
    file: z.string().min(1),
    path: z.string().min(1).optional(),
    id: z.string().min(1),
    type: z.enum(['TextLine', 'TextBlock']).default('TextLine'),
    text: z.string(),
    category: z.string().nullable().default(null),
    hpos: nullableNumber,
    vpos: nullableNumber,
    width: nullableNumber,
    height: nullableNumber,
    baseline: z.string().nullable().default(null),
    matchedBy: z.array(z.string()).default([]),
    matchedValues: z.record(z.string(), z.string()).default({}),
    removed: z.boolean().default(false),
  })
  .passthrough();

const ImportFileSchema = z.array(ImportRowSchema);

type ImportRow = z.output<typeof ImportRowSchema>;

const sourcePath = (row: ImportRow): string => row.path ?? row.file;

/**
 * CorpusImporter
 *
 * Rebuilds a corpus from a JSON export written with the file name and
 * attribute columns. Files are keyed by the `path` column (the file name
 * when it is missing). Restores text, position, category, the matchedBy
 * trail with its captured values and the removed flag; other columns are
 * ignored.
 */
export class CorpusImporter {
  constructor(private readonly logger: LoggerMethods) {}

  async fromJson(path: string): Promise<ParsedCorpus> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw ExportError.fromError(`Cannot read export '${path}'`, error, path);
    }
    const corpus = this.parseJson(content, path);
    this.logger.info(
      `[CorpusImporter] Imported ${corpus.size} elements from ${path}`,
    );
    return corpus;
  }

  /**
   * @throws ExportError when the content is not a JSON export
   * @throws ModelIntegrityError when an id repeats within a file
   */
  parseJson(content: string, source = 'json'): ParsedCorpus {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw ExportError.fromError(
        `The export '${source}' is not valid JSON`,
        error,
        source,
      );
    }

    const result = ImportFileSchema.safeParse(data);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ExportError(
        `The export '${source}' cannot be imported: ${details}`,
        { filePath: source },
      );
    }

    const rows = result.data;
    const corpus = ParsedCorpus.fromFiles(this.toSeeds(rows));
    rows.forEach((row) => this.restoreState(corpus, row));
    return corpus;
  }

  private toSeeds(rows: readonly ImportRow[]): ParsedFileSeed[] {
    const seeds = new Map<string, ParsedFileSeed>();
    for (const row of rows) {
      const path = sourcePath(row);
      let seed = seeds.get(path);
      if (!seed) {
        seed = { path, fileName: row.file, metadata: {}, elements: [] };
        seeds.set(path, seed);
      }
      const element: ElementSeed = {
        id: row.id,
        type: row.type,
        text: row.text,
        position: {
          hpos: row.hpos,
          vpos: row.vpos,
          width: row.width,
          height: row.height,
          baseline: row.baseline,
        },
        parentId: null,
      };
      seed.elements.push(element);
    }
    return [...seeds.values()];
  }

  private restoreState(corpus: ParsedCorpus, row: ImportRow): void {
    const element = corpus
      .getFile(sourcePath(row))
      ?.elements.find((candidate) => candidate.id === row.id);
    if (!element) {
      return;
    }
    for (const operation of row.matchedBy) {
      corpus.recordMatch(element, operation, row.matchedValues[operation]);
    }
    if (row.category !== null && row.category !== '') {
      corpus.assignCategory(element, row.category);
    }
    if (row.removed) {
      corpus.markRemoved(element);
    }
  }
}
