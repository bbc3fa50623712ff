import type { LoggerMethods } from '@altokit/logger';
import type { BatchDefinition, MarkValue, TextElement } from '@altokit/model';
import type { DictionaryProvider, EntityProvider } from '../providers/types';
import type { MatchStrategy } from '../strategies/match-strategy';
import type { ParsedCorpus } from './parsed-corpus';

import { BatchNotFoundError, CategoryError } from '../errors/pipeline-error';
import { DictionaryStrategy } from '../strategies/dictionary-strategy';
import {
  EntityStrategy,
  type EntityStrategyOptions,
} from '../strategies/entity-strategy';
import { RegexStrategy } from '../strategies/regex-strategy';
import { isInBatch } from './batch-scope';

/**
 * One selected element with the value its selecting step captured
 */
export interface SelectionEntry {
  readonly element: TextElement;
  readonly value?: string;
  readonly candidate?: string;
}

export interface PatternPipelineOptions {
  logger: LoggerMethods;
  batches?: readonly BatchDefinition[];
}

export interface FindOptions {
  flags?: string;
}

export interface LookupOptions {
  /**
   * Name used in the operation id; defaults to the provider name
   */
  name?: string;
}

export type TagOptions = EntityStrategyOptions;

/**
 * Printable record of one (operation, element) pair
 */
export interface MatchDescription {
  operation: string;
  elementId: string;
  sourceFile: string;
  text: string;
}

export interface PipelineState {
  /**
   * null: nothing selected yet, the next selecting step starts from the
   * whole (scoped) corpus
   */
  selection: readonly SelectionEntry[] | null;
  scope: BatchDefinition | null;
  /**
   * Operation ids applied along this chain, in order
   */
  operations: readonly string[];
}

const INITIAL_STATE: PipelineState = {
  selection: null,
  scope: null,
  operations: [],
};

/**
 * PatternPipeline
 *
 * Chainable selection over a ParsedCorpus. Every call returns a new pipeline
 * holding the resulting selection; effects (`matchedBy`, `category`, `marks`,
 * `removed`) are written into the shared corpus immediately, so they are
 * visible to every other chain over the same corpus.
 *
 * @example
 * ```typescript
 * const pipeline = PatternPipeline.create(corpus, { logger });
 * pipeline.find('(^.*\\& Cie\\.$)').categorize('company_name');
 * pipeline.find('^Acme.*').remove();
 * ```
 */
export class PatternPipeline {
  private readonly logger: LoggerMethods;
  private readonly batches: readonly BatchDefinition[];

  constructor(
    private readonly corpus: ParsedCorpus,
    options: PatternPipelineOptions,
    private readonly state: PipelineState = INITIAL_STATE,
  ) {
    this.logger = options.logger;
    this.batches = options.batches ?? [];
  }

  static create(
    corpus: ParsedCorpus,
    options: PatternPipelineOptions,
  ): PatternPipeline {
    return new PatternPipeline(corpus, options);
  }

  /**
   * Select elements whose text matches `pattern`
   *
   * @throws PatternError when the pattern does not compile; the corpus is
   *   left untouched
   */
  find(pattern: string | RegExp, options: FindOptions = {}): PatternPipeline {
    return this.match(new RegexStrategy(pattern, options.flags));
  }

  /**
   * Select elements for which the dictionary reports at least one pair
   *
   * @throws ProviderError on a non-recoverable provider failure
   */
  lookupDictionary(
    provider: DictionaryProvider,
    options: LookupOptions = {},
  ): PatternPipeline {
    return this.match(
      new DictionaryStrategy(provider, this.logger, options.name),
    );
  }

  /**
   * Select elements carrying at least one entity tag
   *
   * @throws ProviderError on a non-recoverable provider failure
   */
  tagEntities(
    provider: EntityProvider,
    options: TagOptions = {},
  ): PatternPipeline {
    return this.match(new EntityStrategy(provider, this.logger, options));
  }

  /**
   * Run a selection strategy over the current candidates
   *
   * Matches are recorded element by element; when the strategy throws, the
   * matches recorded before the failure stay in the corpus.
   */
  match(strategy: MatchStrategy): PatternPipeline {
    strategy.prepare?.();

    const candidates = this.candidates();
    const selected: SelectionEntry[] = [];

    for (const entry of candidates) {
      const outcome = strategy.evaluate(entry.element);
      if (!outcome) {
        continue;
      }
      this.corpus.recordMatch(entry.element, strategy.id, outcome.value);
      selected.push({
        element: entry.element,
        value: outcome.value,
        candidate: outcome.candidate ?? entry.candidate,
      });
    }

    this.logger.debug(
      `[PatternPipeline] ${strategy.id} selected ${selected.length} of ${candidates.length} elements`,
    );
    return this.next({ selection: selected }, strategy.id);
  }

  /**
   * Commit a category to every selected element
   *
   * Without a label, each element receives the candidate proposed by the
   * step that selected it.
   *
   * @throws CategoryError for an empty label, or when no label is given and
   *   a selected element has no candidate; nothing is written in that case
   */
  categorize(label?: string): PatternPipeline {
    if (label !== undefined && label.trim() === '') {
      throw new CategoryError('Category label must not be empty');
    }

    const entries = this.selection();
    const assignments = entries.map((entry) => {
      const resolved = label ?? entry.candidate;
      if (resolved === undefined) {
        throw new CategoryError(
          `No category given and element '${entry.element.id}' of ${entry.element.sourceFile} has no candidate category`,
        );
      }
      return { element: entry.element, label: resolved };
    });

    for (const { element, label: resolved } of assignments) {
      this.corpus.assignCategory(element, resolved);
      this.corpus.recordMatch(element, `categorize(${resolved})`);
    }

    this.logger.debug(
      `[PatternPipeline] categorize(${label ?? '<candidate>'}) applied to ${assignments.length} elements`,
    );
    return this.next({}, `categorize(${label ?? '<candidate>'})`);
  }

  /**
   * Write an annotation on every selected element
   */
  mark(name: string, value: MarkValue = true): PatternPipeline {
    const operationId = `mark(${name})`;
    for (const { element } of this.selection()) {
      this.corpus.setMark(element, name, value);
      this.corpus.recordMatch(element, operationId);
    }
    return this.next({}, operationId);
  }

  /**
   * Soft-delete every selected element
   *
   * Removed elements are skipped by every later selecting step of every
   * chain over the corpus. Calling it twice changes nothing.
   */
  remove(): PatternPipeline {
    let removed = 0;
    for (const { element } of this.selection()) {
      if (this.corpus.markRemoved(element)) {
        removed++;
      }
    }
    this.logger.debug(`[PatternPipeline] remove() removed ${removed} elements`);
    return this.next({}, 'remove()');
  }

  /**
   * Drop the selection; the next step starts from the whole corpus within
   * the current batch scope
   */
  reset(): PatternPipeline {
    return this.next({ selection: null }, 'reset()');
  }

  /**
   * Start a fresh chain over the files of a configured batch
   *
   * @throws BatchNotFoundError when no batch has that name
   */
  batch(name: string): PatternPipeline {
    const definition = this.batches.find((b) => b.name === name);
    if (!definition) {
      throw new BatchNotFoundError(
        name,
        this.batches.map((b) => b.name),
      );
    }
    return this.fork({ selection: null, scope: definition, operations: [] });
  }

  /**
   * Start a fresh chain over the whole corpus
   */
  all(): PatternPipeline {
    return this.fork(INITIAL_STATE);
  }

  /**
   * Current selection; empty before the first selecting step. Elements
   * removed since they were selected are left out.
   */
  selection(): readonly SelectionEntry[] {
    return (this.state.selection ?? []).filter(
      (entry) => !entry.element.removed,
    );
  }

  elements(): TextElement[] {
    return this.selection().map((entry) => entry.element);
  }

  texts(): string[] {
    return this.selection().map((entry) => entry.element.text);
  }

  get size(): number {
    return this.selection().length;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  get batchName(): string | null {
    return this.state.scope?.name ?? null;
  }

  /**
   * Operation ids applied along this chain
   */
  get operations(): readonly string[] {
    return this.state.operations;
  }

  /**
   * One entry per (operation, element) pair of the selected elements
   */
  describeMatches(): MatchDescription[] {
    return this.selection().flatMap(({ element }) =>
      element.matchedBy.map((operation) => ({
        operation,
        elementId: element.id,
        sourceFile: element.sourceFile,
        text: element.text,
      })),
    );
  }

  logMatches(): void {
    const descriptions = this.describeMatches();
    if (descriptions.length === 0) {
      this.logger.info('[PatternPipeline] No matches');
      return;
    }
    for (const d of descriptions) {
      this.logger.info(
        `[PatternPipeline] ${d.operation} ${d.sourceFile}#${d.elementId}: ${d.text}`,
      );
    }
  }

  /**
   * Elements the next selecting step evaluates
   */
  private candidates(): readonly SelectionEntry[] {
    if (this.state.selection) {
      return this.selection();
    }
    const scope = this.state.scope;
    return this.corpus
      .elements()
      .filter(
        (element) =>
          !scope ||
          isInBatch(this.corpus.fileOf(element).metadata, scope),
      )
      .map((element) => ({ element }));
  }

  private next(
    changes: Partial<Pick<PipelineState, 'selection'>>,
    operationId: string,
  ): PatternPipeline {
    return this.fork({
      ...this.state,
      ...changes,
      operations: [...this.state.operations, operationId],
    });
  }

  private fork(state: PipelineState): PatternPipeline {
    return new PatternPipeline(
      this.corpus,
      { logger: this.logger, batches: this.batches },
      state,
    );
  }
}
