/**
 * PipelineError
 *
 * Base error class for pattern pipeline failures.
 */
export class PipelineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PipelineError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create PipelineError from unknown error with context
   */
  static fromError(context: string, error: unknown): PipelineError {
    return new PipelineError(
      `${context}: ${PipelineError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * PatternError
 *
 * Thrown by `find` when the regular expression cannot be compiled. Nothing is
 * mutated by the failing call.
 */
export class PatternError extends PipelineError {
  readonly pattern: string;

  constructor(pattern: string, options?: ErrorOptions) {
    const reason =
      options?.cause === undefined
        ? ''
        : `: ${PipelineError.getErrorMessage(options.cause)}`;
    super(`Invalid pattern '${pattern}'${reason}`, options);
    this.name = 'PatternError';
    this.pattern = pattern;
  }
}

/**
 * ProviderError
 *
 * Failure of a dictionary or NER provider. A provider may throw it with
 * `recoverable: true` to have the element treated as "no match".
 */
export class ProviderError extends PipelineError {
  readonly recoverable: boolean;

  constructor(
    message: string,
    options?: ErrorOptions & { recoverable?: boolean },
  ) {
    super(message, options);
    this.name = 'ProviderError';
    this.recoverable = options?.recoverable ?? false;
  }

  /**
   * Create a non-recoverable ProviderError from unknown error with context
   */
  static fromError(context: string, error: unknown): ProviderError {
    return new ProviderError(
      `${context}: ${ProviderError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * ModelIntegrityError
 *
 * Duplicate or missing element ID, duplicate file, or an element that does
 * not belong to the corpus. Fatal: the corpus cannot be used.
 */
export class ModelIntegrityError extends PipelineError {
  readonly filePath?: string;
  readonly elementId?: string;

  constructor(
    message: string,
    options?: ErrorOptions & { filePath?: string; elementId?: string },
  ) {
    super(message, options);
    this.name = 'ModelIntegrityError';
    this.filePath = options?.filePath;
    this.elementId = options?.elementId;
  }
}

/**
 * CategoryError
 *
 * `categorize` was called with an empty label, or without a label on a
 * selection whose elements have no candidate category.
 */
export class CategoryError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CategoryError';
  }
}

/**
 * BatchNotFoundError
 *
 * `batch(name)` was called with a name that has no batch definition.
 */
export class BatchNotFoundError extends PipelineError {
  readonly batchName: string;

  constructor(batchName: string, knownBatches: readonly string[]) {
    const known = knownBatches.length > 0 ? knownBatches.join(', ') : 'none';
    super(`Unknown batch '${batchName}' (known batches: ${known})`);
    this.name = 'BatchNotFoundError';
    this.batchName = batchName;
  }
}
