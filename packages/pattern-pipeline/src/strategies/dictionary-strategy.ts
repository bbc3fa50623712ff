import type { LoggerMethods } from '@altokit/logger';
import type { TextElement } from '@altokit/model';
import type { DictionaryProvider } from '../providers/types';
import type { MatchOutcome } from './match-strategy';

import { ProviderStrategy } from './provider-strategy';

/**
 * Selects elements for which the dictionary returns at least one pair.
 * Records the first pair's value; its type becomes the candidate category.
 */
export class DictionaryStrategy extends ProviderStrategy<DictionaryProvider> {
  readonly id: string;

  constructor(
    provider: DictionaryProvider,
    logger: LoggerMethods,
    name?: string,
  ) {
    super(provider, logger);
    this.id = `lookup(${name ?? provider.name ?? 'dictionary'})`;
  }

  evaluate(element: TextElement): MatchOutcome | null {
    const [first] = this.invoke(element, () =>
      this.provider.lookup(element.text),
    );
    if (!first) {
      return null;
    }
    return first.type === undefined
      ? { value: first.value }
      : { value: first.value, candidate: first.type };
  }
}
