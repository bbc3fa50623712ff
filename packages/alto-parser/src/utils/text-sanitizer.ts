/**
 * TextSanitizer - Cleans OCR text before it enters the model
 */
export class TextSanitizer {
  /**
   * Removes line breaks, tabs, carriage returns and byte order marks,
   * then trims leading and trailing whitespace.
   *
   * @example
   * ```typescript
   * TextSanitizer.sanitize('\uFEFF Acme\t& Cie.\n'); // 'Acme& Cie.'
   * ```
   */
  static sanitize(text: string): string {
    if (!text) return '';

    return text.replace(/[\n\r\t\uFEFF]/g, '').trim();
  }

  /**
   * Joins text parts with single spaces, skipping parts that are empty
   * after sanitizing.
   */
  static join(parts: readonly string[]): string {
    return parts
      .map((part) => this.sanitize(part))
      .filter((part) => part.length > 0)
      .join(' ');
  }
}
