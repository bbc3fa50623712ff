/**
 * One (key, value) pair returned by a dictionary lookup
 */
export interface DictionaryMatch {
  key: string;
  value: string;

  /**
   * Dictionary type; offered as the candidate category
   */
  type?: string;
}

/**
 * One named-entity span returned by a tagger
 */
export interface EntityTag {
  span: string;
  entityType: string;
}

/**
 * Shared part of the provider contracts
 *
 * `isRecoverable` lets a provider declare which of its failures mean
 * "no match for this element" instead of aborting the operation.
 */
interface ProviderBase {
  readonly name?: string;
  isRecoverable?(error: unknown): boolean;
}

/**
 * Dictionary collaborator used by `lookupDictionary`
 *
 * Must be a pure function of the text for the duration of a pipeline run.
 */
export interface DictionaryProvider extends ProviderBase {
  lookup(text: string): readonly DictionaryMatch[];
}

/**
 * NER collaborator used by `tagEntities`
 */
export interface EntityProvider extends ProviderBase {
  tag(text: string): readonly EntityTag[];
}

export type Provider = DictionaryProvider | EntityProvider;
