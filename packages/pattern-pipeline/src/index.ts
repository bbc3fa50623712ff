export { ParsedCorpus } from './core/parsed-corpus';
export {
  PatternPipeline,
  type FindOptions,
  type LookupOptions,
  type MatchDescription,
  type PatternPipelineOptions,
  type PipelineState,
  type SelectionEntry,
  type TagOptions,
} from './core/pattern-pipeline';
export {
  isInBatch,
  matchesCondition,
  matchesConditionValue,
} from './core/batch-scope';
export {
  BatchNotFoundError,
  CategoryError,
  ModelIntegrityError,
  PatternError,
  PipelineError,
  ProviderError,
} from './errors/pipeline-error';
export type {
  DictionaryMatch,
  DictionaryProvider,
  EntityProvider,
  EntityTag,
  Provider,
} from './providers/types';
export type { MatchOutcome, MatchStrategy } from './strategies/match-strategy';
export { RegexStrategy } from './strategies/regex-strategy';
export { ProviderStrategy } from './strategies/provider-strategy';
export { DictionaryStrategy } from './strategies/dictionary-strategy';
export {
  EntityStrategy,
  type EntityStrategyOptions,
} from './strategies/entity-strategy';
