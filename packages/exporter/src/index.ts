export {
  ExportOptionsSchema,
  parseExportOptions,
  type ExportOptions,
  type ExportOptionsInput,
} from './config/export-options';
export {
  CorpusExporter,
  type CorpusExporterOptions,
  type ExportRecord,
} from './core/corpus-exporter';
export { CorpusImporter } from './core/corpus-importer';
export { ExportError } from './errors/export-error';
