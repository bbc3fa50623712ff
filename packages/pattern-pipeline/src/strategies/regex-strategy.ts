import type { TextElement } from '@altokit/model';
import type { MatchOutcome, MatchStrategy } from './match-strategy';

import { PatternError } from '../errors/pipeline-error';

/**
 * Selects elements whose text matches a regular expression
 *
 * The expression is applied with `exec` on the whole text, without implicit
 * anchors. The recorded value is the first capture group when the pattern
 * has one, otherwise the whole match.
 */
export class RegexStrategy implements MatchStrategy {
  readonly id: string;
  private readonly source: string;
  private readonly flags: string;
  private regex: RegExp | null = null;

  constructor(pattern: string | RegExp, flags?: string) {
    this.source = typeof pattern === 'string' ? pattern : pattern.source;
    // global/sticky would make exec stateful across elements
    this.flags = (flags ?? (typeof pattern === 'string' ? '' : pattern.flags))
      .replace(/[gy]/g, '');
    this.id = `find(${this.source})`;
  }

  /**
   * @throws PatternError when the pattern does not compile
   */
  prepare(): void {
    try {
      this.regex = new RegExp(this.source, this.flags);
    } catch (error) {
      throw new PatternError(this.source, { cause: error });
    }
  }

  evaluate(element: TextElement): MatchOutcome | null {
    if (!this.regex) {
      this.prepare();
    }
    const match = this.regex?.exec(element.text);
    if (!match) {
      return null;
    }
    return { value: match.length > 1 ? (match[1] ?? '') : match[0] };
  }
}
