import type { LoggerMethods } from '@altokit/logger';
import type { EntityProvider, EntityTag } from '@altokit/pattern-pipeline';
import type { ExtendedTokenUsage } from '@altokit/shared';
import type { LanguageModel } from 'ai';

import { ProviderError } from '@altokit/pattern-pipeline';
import { BatchProcessor, LLMCaller } from '@altokit/shared';
import { uniq } from 'es-toolkit';
import { z } from 'zod';

export interface LLMEntityTaggerOptions {
  /**
   * Name reported to the pipeline (`tag(<name>)`, default: 'llm')
   */
  name?: string;

  /**
   * Entity types the model may report (default: PER, ORG, LOC, DATE)
   */
  entityTypes?: readonly string[];

  /**
   * Texts per LLM call (default: 20)
   */
  batchSize?: number;

  /**
   * Calls in flight at once (default: 4)
   */
  concurrency?: number;

  /**
   * Maximum retry count for LLM API (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for LLM generation (default: 0)
   */
  temperature?: number;

  abortSignal?: AbortSignal;
}

export interface TokenUsageTotals {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

const DEFAULT_ENTITY_TYPES = ['PER', 'ORG', 'LOC', 'DATE'] as const;

/**
 * Schema for batch tagging response
 */
const EntityBatchSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int().describe('Index of the text in the input list'),
      entities: z.array(
        z.object({
          span: z.string().describe('Exact substring of the text'),
          entityType: z.string().describe('One of the allowed entity types'),
        }),
      ),
    }),
  ),
});

/**
 * LLMEntityTagger
 *
 * Named-entity tagger backed by a language model. The pipeline calls
 * providers synchronously, so texts are tagged up front with `prefetch`
 * and `tag` only reads the cache.
 *
 * ## Algorithm
 *
 * 1. Collect distinct, not yet tagged texts
 * 2. Split into batches of batchSize
 * 3. Tag up to `concurrency` batches at once through LLMCaller
 * 4. Keep only spans that occur in the text and allowed entity types
 *
 * @example
 * ```typescript
 * const tagger = new LLMEntityTagger(logger, model);
 * await tagger.prefetch(corpus.elements().map((e) => e.text));
 * pipeline.tagEntities(tagger).categorize();
 * ```
 */
export class LLMEntityTagger implements EntityProvider {
  readonly name: string;
  private readonly componentName = 'LLMEntityTagger';
  private readonly entityTypes: readonly string[];
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly maxRetries: number;
  private readonly temperature: number;
  private readonly abortSignal?: AbortSignal;
  private readonly cache = new Map<string, EntityTag[]>();
  private readonly usageTotals: TokenUsageTotals = {
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
  };

  constructor(
    private readonly logger: LoggerMethods,
    private readonly model: LanguageModel,
    options: LLMEntityTaggerOptions = {},
    private readonly fallbackModel?: LanguageModel,
  ) {
    this.name = options.name ?? 'llm';
    this.entityTypes = options.entityTypes ?? DEFAULT_ENTITY_TYPES;
    this.batchSize = options.batchSize ?? 20;
    this.concurrency = options.concurrency ?? 4;
    this.maxRetries = options.maxRetries ?? 3;
    this.temperature = options.temperature ?? 0;
    this.abortSignal = options.abortSignal;
  }

  get usage(): TokenUsageTotals {
    return { ...this.usageTotals };
  }

  /**
   * Whether `tag` can answer for this text
   */
  has(text: string): boolean {
    return this.cache.has(text);
  }

  /**
   * Tag every text that is not cached yet
   *
   * @throws ProviderError when a batch fails on the primary and the fallback model
   */
  async prefetch(texts: readonly string[]): Promise<void> {
    const pending = uniq(texts).filter(
      (text) => !this.cache.has(text) && text.trim() !== '',
    );
    for (const text of texts) {
      if (text.trim() === '') {
        this.cache.set(text, []);
      }
    }

    if (pending.length === 0) {
      this.log('info', 'No texts to tag');
      return;
    }

    this.log(
      'info',
      `Tagging ${pending.length} texts with model: ${LLMCaller.getModelName(this.model)}`,
    );

    try {
      const tags = await BatchProcessor.processConcurrently(
        pending,
        this.batchSize,
        this.concurrency,
        (batch) => this.tagBatch(batch),
        (batchIndex, batchCount) =>
          this.log('debug', `Batch ${batchIndex + 1} / ${batchCount} done`),
      );
      pending.forEach((text, index) => this.cache.set(text, tags[index] ?? []));
    } catch (error) {
      const message = ProviderError.getErrorMessage(error);
      this.log('error', `Tagging failed: ${message}`);
      throw new ProviderError(`Failed to tag entities: ${message}`, {
        cause: error,
      });
    }

    const { inputTokens, outputTokens, totalTokens } = this.usageTotals;
    this.log(
      'info',
      `Completed: ${pending.length} texts tagged (${inputTokens} input, ${outputTokens} output, ${totalTokens} total tokens)`,
    );
  }

  /**
   * Cached tags for a text
   *
   * @throws ProviderError when the text was not prefetched
   */
  tag(text: string): EntityTag[] {
    const tags = this.cache.get(text);
    if (!tags) {
      throw new ProviderError(
        `Text was not prefetched by ${this.componentName}: '${text}'`,
      );
    }
    return tags;
  }

  clear(): void {
    this.cache.clear();
  }

  private async tagBatch(texts: string[]): Promise<EntityTag[][]> {
    const result = await LLMCaller.call({
      schema: EntityBatchSchema,
      systemPrompt: this.buildSystemPrompt(),
      userPrompt: this.buildUserPrompt(texts),
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: this.temperature,
      abortSignal: this.abortSignal,
      component: this.componentName,
      phase: 'entity-tagging',
    });

    this.trackUsage(result.usage);

    if (result.output.results.length !== texts.length) {
      this.log(
        'warn',
        `LLM returned ${result.output.results.length} results for ${texts.length} texts`,
      );
    }

    const allowed = new Set(this.entityTypes);
    const byIndex = new Map(
      result.output.results.map((item) => [item.index, item.entities]),
    );

    return texts.map((text, index) =>
      (byIndex.get(index) ?? [])
        .filter(
          (entity) =>
            allowed.has(entity.entityType) &&
            entity.span !== '' &&
            text.includes(entity.span),
        )
        .map(({ span, entityType }) => ({ span, entityType })),
    );
  }

  private trackUsage(usage: ExtendedTokenUsage): void {
    this.usageTotals.inputTokens += usage.inputTokens;
    this.usageTotals.outputTokens += usage.outputTokens;
    this.usageTotals.totalTokens += usage.totalTokens;
  }

  private log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
  ): void {
    this.logger[level](`[${this.componentName}] ${message}`);
  }

  protected buildSystemPrompt(): string {
    return `You are a named-entity tagger for OCR text from historical printed documents.

For each numbered text, list the named entities it contains.

Rules:
1. Allowed entity types: ${this.entityTypes.join(', ')}
2. "span" must be copied exactly from the text, including OCR errors
3. Do not normalize, translate or complete spans
4. Return an empty list for texts without entities
5. Return one result per text, using the index shown in brackets`;
  }

  protected buildUserPrompt(texts: readonly string[]): string {
    const list = texts.map((text, index) => `[${index}] ${text}`).join('\n');

    return `Tag the named entities in the following texts:

${list}

Return "results" as an array of { "index", "entities": [{ "span", "entityType" }] }.`;
  }
}
