/**
 * @altokit/model
 *
 * Data shapes shared between the ALTO parser, the pattern pipeline and the exporter.
 *
 * @packageDocumentation
 */

export type {
  ElementPosition,
  ElementSeed,
  ElementType,
  MarkValue,
  TextElement,
} from './text-element';
export type {
  FileMetadata,
  ParsedFile,
  ParsedFileSeed,
} from './parsed-file';
export type { ExportCell, ExportRow, ExportValue } from './export-row';
export type { BatchCondition, BatchDefinition } from './batch-definition';
