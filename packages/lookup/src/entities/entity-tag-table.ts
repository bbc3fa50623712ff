import type { EntityProvider, EntityTag } from '@altokit/pattern-pipeline';

import { escapeRegExp } from 'es-toolkit';

export interface EntityTagTableOptions {
  name?: string;

  /**
   * (default: false)
   */
  ignoreCase?: boolean;
}

interface KnownEntity {
  span: string;
  entityType: string;
  pattern: RegExp;
}

/**
 * EntityTagTable
 *
 * Gazetteer tagger: reports every known span occurring as a whole word in
 * the text, ordered by position. Used where a fixed list of names is enough
 * or as a stand-in for a model-backed tagger.
 */
export class EntityTagTable implements EntityProvider {
  readonly name: string;
  private readonly known: KnownEntity[];

  constructor(
    tags: readonly EntityTag[],
    options: EntityTagTableOptions = {},
  ) {
    this.name = options.name ?? 'gazetteer';
    const flags = options.ignoreCase ? 'giu' : 'gu';

    this.known = tags
      .filter((tag) => tag.span.trim() !== '')
      .map((tag) => ({
        span: tag.span,
        entityType: tag.entityType,
        pattern: new RegExp(
          `(?<![\\p{L}\\p{N}])${escapeRegExp(tag.span.trim())}(?![\\p{L}\\p{N}])`,
          flags,
        ),
      }));
  }

  /**
   * @param spans - Span to entity type, e.g. `{ Zurich: 'LOC' }`
   */
  static fromRecord(
    spans: Readonly<Record<string, string>>,
    options: EntityTagTableOptions = {},
  ): EntityTagTable {
    return new EntityTagTable(
      Object.entries(spans).map(([span, entityType]) => ({ span, entityType })),
      options,
    );
  }

  tag(text: string): EntityTag[] {
    const found: Array<EntityTag & { index: number }> = [];
    for (const { entityType, pattern } of this.known) {
      for (const match of text.matchAll(pattern)) {
        found.push({ span: match[0], entityType, index: match.index ?? 0 });
      }
    }
    return found
      .sort((a, b) => a.index - b.index)
      .map(({ span, entityType }) => ({ span, entityType }));
  }
}
