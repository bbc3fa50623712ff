/**
 * DictionaryLoadError
 *
 * Thrown when a dictionary file cannot be read, is not valid JSON or CSV, or
 * does not match the dictionary schema.
 */
export class DictionaryLoadError extends Error {
  readonly filePath?: string;

  constructor(message: string, options?: ErrorOptions & { filePath?: string }) {
    super(message, options);
    this.name = 'DictionaryLoadError';
    this.filePath = options?.filePath;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create DictionaryLoadError from unknown error with context
   */
  static fromError(
    context: string,
    error: unknown,
    filePath?: string,
  ): DictionaryLoadError {
    return new DictionaryLoadError(
      `${context}: ${DictionaryLoadError.getErrorMessage(error)}`,
      { cause: error, filePath },
    );
  }
}
