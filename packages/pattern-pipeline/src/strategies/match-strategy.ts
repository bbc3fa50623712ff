import type { TextElement } from '@altokit/model';

/**
 * Result of evaluating one element
 */
export interface MatchOutcome {
  /**
   * Value to record under the operation id
   */
  value?: string;

  /**
   * Provisional category offered to a later `categorize()`
   */
  candidate?: string;
}

/**
 * Selection rule run by `PatternPipeline.match`
 *
 * `prepare` runs once before any element is evaluated, so a strategy can
 * reject its own input without touching the corpus. `evaluate` returns null
 * for "no match".
 */
export interface MatchStrategy {
  readonly id: string;
  prepare?(): void;
  evaluate(element: TextElement): MatchOutcome | null;
}
