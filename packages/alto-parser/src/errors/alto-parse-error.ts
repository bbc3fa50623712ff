/**
 * AltoParseError
 *
 * Thrown when a file cannot be read, is not well-formed XML, carries no known
 * ALTO namespace, or when the parser configuration is invalid.
 */
export class AltoParseError extends Error {
  /**
   * File the error relates to, if any
   */
  readonly filePath?: string;

  constructor(message: string, options?: ErrorOptions & { filePath?: string }) {
    super(message, options);
    this.name = 'AltoParseError';
    this.filePath = options?.filePath;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create AltoParseError from unknown error with context
   */
  static fromError(
    context: string,
    error: unknown,
    filePath?: string,
  ): AltoParseError {
    return new AltoParseError(
      `${context}: ${AltoParseError.getErrorMessage(error)}`,
      { cause: error, filePath },
    );
  }
}
