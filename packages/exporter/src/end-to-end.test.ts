import type { LoggerMethods } from '@altokit/logger';

import { AltoFileParser } from '@altokit/alto-parser';
import { DictionaryTable } from '@altokit/lookup';
import { ParsedCorpus, PatternPipeline } from '@altokit/pattern-pipeline';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { CorpusExporter } from './core/corpus-exporter';

const createAlto = (blocks: string[][]): string =>
  `<?xml version="1.0" encoding="UTF-8"?>
<alto xmlns="http://www.loc.gov/standards/alto/ns-v3#">
  <Layout><Page ID="P1"><PrintSpace>
${blocks
  .map(
    (lines, b) =>
      `    <TextBlock ID="TB${b + 1}">${lines
        .map(
          (line, l) =>
            `<TextLine ID="TB${b + 1}_TL${l + 1}"><String CONTENT="${line}"/></TextLine>`,
        )
        .join('')}</TextBlock>`,
  )
  .join('\n')}
  </PrintSpace></Page></Layout>
</alto>`;

describe('ALTO to TSV', () => {
  let mockLogger: LoggerMethods;
  let directory: string;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    directory = mkdtempSync(join(tmpdir(), 'altokit-e2e-'));
    writeFileSync(
      join(directory, '1923_0022.xml'),
      createAlto([['Acme &amp; Cie.'], ['Berlin'], ['Index']]),
    );
    writeFileSync(
      join(directory, '1923_0023.xml'),
      createAlto([['Acme Corp', 'Zurich'], ['Dr. Keller']]),
    );
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  test('parses, categorizes per batch and exports', async () => {
    const parser = new AltoFileParser({
      logger: mockLogger,
      config: {
        lineType: 'TextBlock',
        fileNameStructure: {
          pattern: '(\\d{4})_(\\d{4})',
          valueNames: ['year', 'page'],
        },
        batches: [
          { name: 'index', conditions: [{ key: 'page', values: '22' }] },
          { name: 'board', conditions: [{ key: 'page', values: '23-24' }] },
        ],
      },
    });
    await parser.addFiles(directory);
    const corpus = ParsedCorpus.fromFiles(await parser.parse());
    const cities = new DictionaryTable(
      [{ entry: 'Berlin', type: 'city', value: 'DE', variants: [] }],
      { name: 'cities' },
    );

    const pipeline = PatternPipeline.create(corpus, {
      logger: mockLogger,
      batches: parser.batches,
    });
    pipeline
      .batch('index')
      .find('& Cie\\.$')
      .categorize('company_name')
      .remove();
    pipeline.lookupDictionary(cities).categorize();
    pipeline.batch('board').find('^Acme').categorize('company');
    pipeline.all().find('^Index$').remove();

    const path = join(directory, 'out', 'export.tsv');
    await new CorpusExporter(corpus, {
      logger: mockLogger,
      options: {
        includeAttributes: false,
        includeMatches: false,
        includeValues: false,
      },
    }).saveCsv(path);

    const first = join(directory, '1923_0022.xml');
    const second = join(directory, '1923_0023.xml');
    expect(readFileSync(path, 'utf-8')).toBe(
      [
        'file\tpath\tid\ttype\ttext\tcategory\tyear\tpage',
        `1923_0022.xml\t${first}\tTB2\tTextBlock\tBerlin\tcity\t1923\t0022`,
        `1923_0023.xml\t${second}\tTB1\tTextBlock\tAcme Corp Zurich\tcompany\t1923\t0023`,
        `1923_0023.xml\t${second}\tTB2\tTextBlock\tDr. Keller\t\t1923\t0023`,
        '',
      ].join('\n'),
    );
    expect(corpus.removedCount).toBe(2);
    expect(
      corpus
        .allElements({ includeRemoved: true })
        .find((element) => element.text === 'Acme & Cie.')?.category,
    ).toBe('company_name');
  });
});
