/**
 * ExportError
 *
 * Thrown when there is nothing to export under `failOnEmpty`, when an output
 * file cannot be written, or when an export cannot be read back.
 */
export class ExportError extends Error {
  readonly filePath?: string;

  constructor(message: string, options?: ErrorOptions & { filePath?: string }) {
    super(message, options);
    this.name = 'ExportError';
    this.filePath = options?.filePath;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ExportError from unknown error with context
   */
  static fromError(
    context: string,
    error: unknown,
    filePath?: string,
  ): ExportError {
    return new ExportError(
      `${context}: ${ExportError.getErrorMessage(error)}`,
      { cause: error, filePath },
    );
  }
}
