export {
  DictionaryEntrySchema,
  DictionaryFileSchema,
  formatIssues,
  type DictionaryEntry,
  type DictionaryEntryInput,
} from './dictionary/dictionary-schema';
export {
  DictionaryTable,
  type DictionaryTableOptions,
} from './dictionary/dictionary-table';
export { DictionaryLoader } from './dictionary/dictionary-loader';
export {
  DictionaryCreator,
  type DictionaryCreatorOptions,
} from './dictionary/dictionary-creator';
export {
  EntityTagTable,
  type EntityTagTableOptions,
} from './entities/entity-tag-table';
export {
  LLMEntityTagger,
  type LLMEntityTaggerOptions,
  type TokenUsageTotals,
} from './entities/llm-entity-tagger';
export { DictionaryLoadError } from './errors/dictionary-load-error';
