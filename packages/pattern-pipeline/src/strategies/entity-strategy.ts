import type { LoggerMethods } from '@altokit/logger';
import type { TextElement } from '@altokit/model';
import type { EntityProvider } from '../providers/types';
import type { MatchOutcome } from './match-strategy';

import { ProviderStrategy } from './provider-strategy';

export interface EntityStrategyOptions {
  /**
   * Keep only tags of these entity types
   */
  types?: readonly string[];
}

/**
 * Selects elements carrying at least one entity tag. The first tag's entity
 * type is recorded and offered as candidate category.
 */
export class EntityStrategy extends ProviderStrategy<EntityProvider> {
  readonly id: string;
  private readonly types: ReadonlySet<string> | null;

  constructor(
    provider: EntityProvider,
    logger: LoggerMethods,
    options: EntityStrategyOptions = {},
  ) {
    super(provider, logger);
    this.id = `tag(${provider.name ?? 'entities'})`;
    this.types = options.types ? new Set(options.types) : null;
  }

  evaluate(element: TextElement): MatchOutcome | null {
    const tags = this.invoke(element, () => this.provider.tag(element.text));
    const tag = tags.find((t) => !this.types || this.types.has(t.entityType));
    if (!tag) {
      return null;
    }
    return { value: tag.entityType, candidate: tag.entityType };
  }
}
