import type { ElementSeed, TextElement } from './text-element';

/**
 * Metadata attached to a parsed file
 *
 * Static values from the parser configuration plus values extracted from
 * the file name.
 */
export type FileMetadata = Record<string, string>;

/**
 * Parser output for one file
 *
 * @interface ParsedFileSeed
 */
export interface ParsedFileSeed {
  /**
   * Path the file was read from; used as the corpus key
   * @type {string}
   */
  path: string;

  /**
   * Base name of the file
   * @type {string}
   */
  fileName: string;

  /**
   * @type {FileMetadata}
   */
  metadata: FileMetadata;

  /**
   * Elements in document order
   * @type {ElementSeed[]}
   */
  elements: ElementSeed[];
}

/**
 * A file inside a corpus, holding the live text elements
 *
 * @interface ParsedFile
 */
export interface ParsedFile {
  readonly path: string;
  readonly fileName: string;
  readonly metadata: Readonly<FileMetadata>;
  readonly elements: readonly TextElement[];
}
