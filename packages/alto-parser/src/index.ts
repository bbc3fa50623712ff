/**
 * @altokit/alto-parser
 *
 * Reads ALTO XML files (v1-v4) into flat lists of text elements with file metadata.
 *
 * @packageDocumentation
 */

export { AltoFileParser } from './core/alto-file-parser';
export type { AltoFileParserOptions } from './core/alto-file-parser';
export { AltoXmlReader } from './core/alto-xml-reader';
export type {
  AltoReadResult,
  AltoXmlReaderOptions,
} from './core/alto-xml-reader';
export {
  ALTO_NAMESPACES,
  ALTO_PARSER,
  ALTO_TAGS,
  ALTO_VERSIONS,
} from './config/constants';
export type { AltoVersion } from './config/constants';
export {
  BatchConditionSchema,
  BatchDefinitionSchema,
  FileNameStructureSchema,
  ParserConfigSchema,
  parseParserConfig,
} from './config/parser-config';
export type { ParserConfig, ParserConfigInput } from './config/parser-config';
export { AltoParseError } from './errors/alto-parse-error';
export { IdGenerator } from './utils/id-generator';
export { TextSanitizer } from './utils/text-sanitizer';
export { extractFileNameMetadata } from './utils/file-name-metadata';
