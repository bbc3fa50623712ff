import type { z } from 'zod';

import { type LanguageModel, generateObject } from 'ai';

/**
 * Configuration for a structured LLM call with retry and fallback support
 */
export interface LLMCallConfig<TOutput> {
  /**
   * Zod schema for response validation
   */
  schema: z.ZodType<TOutput>;

  systemPrompt: string;

  userPrompt: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Model tried once the primary model has failed (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum retry count per model, handled by the AI SDK (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'LLMEntityTagger')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'tagging')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

/**
 * LLMCaller - Structured LLM call with fallback support
 *
 * Wraps the AI SDK's generateObject:
 * 1. Try the primary model (the SDK retries up to maxRetries)
 * 2. If it fails and a fallback model is configured, try the fallback
 * 3. Return the parsed output with usage data tagged by model
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   schema: EntityResponseSchema,
 *   systemPrompt: 'Tag named entities',
 *   userPrompt: '1. Acme & Cie.',
 *   primaryModel: openai('gpt-4.1-mini'),
 *   component: 'LLMEntityTagger',
 *   phase: 'tagging',
 * });
 * ```
 */
export class LLMCaller {
  static getModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  private static async generate<TOutput>(
    config: LLMCallConfig<TOutput>,
    model: LanguageModel,
    usedFallback: boolean,
  ): Promise<LLMCallResult<TOutput>> {
    const response = await generateObject({
      model,
      schema: config.schema,
      system: config.systemPrompt,
      prompt: config.userPrompt,
      temperature: config.temperature,
      maxRetries: config.maxRetries ?? 3,
      abortSignal: config.abortSignal,
    });

    return {
      output: response.object,
      usage: {
        component: config.component,
        phase: config.phase,
        model: usedFallback ? 'fallback' : 'primary',
        modelName: this.getModelName(model),
        inputTokens: response.usage?.inputTokens ?? 0,
        outputTokens: response.usage?.outputTokens ?? 0,
        totalTokens: response.usage?.totalTokens ?? 0,
      },
      usedFallback,
    };
  }

  /**
   * Call the LLM and parse its answer with the given schema
   *
   * @throws The primary model's error when there is no fallback model or the call was aborted
   * @throws The fallback model's error when both models fail
   */
  static async call<TOutput>(
    config: LLMCallConfig<TOutput>,
  ): Promise<LLMCallResult<TOutput>> {
    try {
      return await this.generate(config, config.primaryModel, false);
    } catch (primaryError) {
      if (config.abortSignal?.aborted || !config.fallbackModel) {
        throw primaryError;
      }

      return this.generate(config, config.fallbackModel, true);
    }
  }
}
