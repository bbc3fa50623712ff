import type { LoggerMethods } from '@altokit/logger';
import type { TextElement } from '@altokit/model';
import type { Provider } from '../providers/types';
import type { MatchOutcome, MatchStrategy } from './match-strategy';

import { ProviderError } from '../errors/pipeline-error';

/**
 * Base for strategies that delegate to an external provider
 *
 * A provider failure is either recoverable (logged, element counts as no
 * match) or wrapped in ProviderError and rethrown.
 */
export abstract class ProviderStrategy<TProvider extends Provider>
  implements MatchStrategy
{
  abstract readonly id: string;

  constructor(
    protected readonly provider: TProvider,
    protected readonly logger: LoggerMethods,
  ) {}

  abstract evaluate(element: TextElement): MatchOutcome | null;

  protected invoke<TResult>(
    element: TextElement,
    call: () => readonly TResult[],
  ): readonly TResult[] {
    try {
      return call();
    } catch (error) {
      if (this.isRecoverable(error)) {
        this.logger.warn(
          `[${this.constructor.name}] ${this.id} skipped element '${element.id}' of ${element.sourceFile}: ${ProviderError.getErrorMessage(error)}`,
        );
        return [];
      }
      if (error instanceof ProviderError) {
        throw error;
      }
      throw ProviderError.fromError(
        `${this.id} failed on element '${element.id}' of ${element.sourceFile}`,
        error,
      );
    }
  }

  private isRecoverable(error: unknown): boolean {
    if (error instanceof ProviderError && error.recoverable) {
      return true;
    }
    return this.provider.isRecoverable?.(error) ?? false;
  }
}
