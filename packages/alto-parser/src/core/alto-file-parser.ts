import type { LoggerMethods } from '@altokit/logger';
import type {
  BatchDefinition,
  FileMetadata,
  ParsedFileSeed,
} from '@altokit/model';

import { getLogger } from '@altokit/logger';
import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';

import { type ParserConfig, parseParserConfig } from '../config/parser-config';
import { AltoParseError } from '../errors/alto-parse-error';
import { extractFileNameMetadata } from '../utils/file-name-metadata';
import { AltoXmlReader } from './alto-xml-reader';

export interface AltoFileParserOptions {
  /**
   * Logger instance. A console logger at `config.logLevel` is created when omitted.
   */
  logger?: LoggerMethods;

  /**
   * Parser configuration, validated with ParserConfigSchema
   */
  config?: unknown;
}

/**
 * AltoFileParser
 *
 * Collects ALTO files and turns each one into a ParsedFileSeed: its text
 * elements plus file metadata from the configuration and the file name.
 *
 * @example
 * ```typescript
 * const parser = new AltoFileParser({
 *   config: {
 *     lineType: 'TextBlock',
 *     fileEnding: '.xml',
 *     metadata: { title: 'Some title' },
 *     fileNameStructure: { pattern: '(\\d{4})_(\\d{4})', valueNames: ['year', 'page'] },
 *   },
 * });
 *
 * await parser.addFiles('assets/alto');
 * const files = await parser.parse();
 * ```
 */
export class AltoFileParser {
  readonly config: ParserConfig;
  private readonly logger: LoggerMethods;
  private readonly reader: AltoXmlReader;
  private readonly filePaths: string[] = [];

  constructor(options: AltoFileParserOptions = {}) {
    this.config = parseParserConfig(options.config ?? {});
    this.logger = options.logger ?? getLogger({ level: this.config.logLevel });
    this.reader = new AltoXmlReader(this.logger, {
      lineType: this.config.lineType,
      generateMissingIds: this.config.generateMissingIds,
    });

    this.logger.debug('[AltoFileParser] Parser config:', this.config);
  }

  /**
   * Batch definitions from the configuration, for the pattern pipeline
   */
  get batches(): BatchDefinition[] {
    return this.config.batches;
  }

  /**
   * Paths added so far, in the order they will be parsed
   */
  getFiles(): string[] {
    return [...this.filePaths];
  }

  /**
   * Add every file in a directory that ends with `fileEnding`
   * (default: the configured file ending). Files are added in name order.
   *
   * @returns Number of files added
   * @throws {AltoParseError} When the path is not a readable directory
   */
  async addFiles(
    directoryPath: string,
    fileEnding: string = this.config.fileEnding,
  ): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(directoryPath);
    } catch (error) {
      throw AltoParseError.fromError(
        `The given path '${directoryPath}' is not a directory`,
        error,
      );
    }

    const matching = entries
      .filter((entry) => entry.endsWith(fileEnding))
      .sort((a, b) => a.localeCompare(b));

    for (const entry of matching) {
      await this.addFile(join(directoryPath, entry));
    }

    this.logger.info(
      `[AltoFileParser] Added ${matching.length} files from ${directoryPath}`,
    );
    return matching.length;
  }

  /**
   * Add a single file
   *
   * @throws {AltoParseError} When the path is not a file
   */
  async addFile(filePath: string): Promise<void> {
    let isFile: boolean;
    try {
      isFile = (await stat(filePath)).isFile();
    } catch (error) {
      throw AltoParseError.fromError(
        `The given path '${filePath}' is not a file`,
        error,
        filePath,
      );
    }
    if (!isFile) {
      throw new AltoParseError(`The given path '${filePath}' is not a file`, {
        filePath,
      });
    }

    this.filePaths.push(filePath);
    this.logger.debug(`[AltoFileParser] Added file ${filePath}`);
  }

  /**
   * Parse every added file, in insertion order
   *
   * @throws {AltoParseError} On the first file that cannot be read or parsed
   */
  async parse(): Promise<ParsedFileSeed[]> {
    const files: ParsedFileSeed[] = [];

    for (const filePath of this.filePaths) {
      let xml: string;
      try {
        xml = await readFile(filePath, 'utf-8');
      } catch (error) {
        throw AltoParseError.fromError(
          `Failed to read '${filePath}'`,
          error,
          filePath,
        );
      }
      files.push(this.parseContent(xml, filePath));
    }

    this.logger.info(`[AltoFileParser] Parsed text from ${files.length} files`);
    return files;
  }

  /**
   * Parse ALTO content that is already in memory
   */
  parseContent(xml: string, filePath: string): ParsedFileSeed {
    const fileName = basename(filePath);
    const { elements } = this.reader.read(xml, filePath);

    return {
      path: filePath,
      fileName,
      metadata: this.buildMetadata(fileName, filePath),
      elements,
    };
  }

  private buildMetadata(fileName: string, filePath: string): FileMetadata {
    const metadata: FileMetadata = { ...this.config.metadata };
    const structure = this.config.fileNameStructure;
    if (!structure) {
      return metadata;
    }

    const extracted = extractFileNameMetadata(fileName, structure);
    if (!extracted) {
      this.logger.warn(
        `[AltoFileParser] The file name structure does not match the file name of '${filePath}'`,
      );
      return metadata;
    }
    return { ...metadata, ...extracted };
  }
}
