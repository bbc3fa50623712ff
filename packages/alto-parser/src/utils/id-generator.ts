import type { ElementType } from '@altokit/model';

import { ALTO_PARSER } from '../config/constants';

/**
 * Generates sequential IDs for ALTO elements that carry no ID attribute.
 *
 * IDs are formatted as `{prefix}-{number}` with the number zero-padded to 3 digits:
 * - TextBlock: block-001, block-002, ...
 * - TextLine: line-001, line-002, ...
 *
 * Each element type keeps its own counter. The parser creates one generator per
 * file and passes the IDs already present in that file as `reserved`; those
 * numbers are skipped, so generated IDs are unique within a file.
 */
export class IdGenerator {
  private readonly counters: Record<ElementType, number> = {
    TextBlock: 0,
    TextLine: 0,
  };

  constructor(private readonly reserved: ReadonlySet<string> = new Set()) {}

  /**
   * Generate the next free ID for the given element type
   */
  generate(type: ElementType): string {
    const prefix = ALTO_PARSER.GENERATED_ID_PREFIX[type];
    let id: string;
    do {
      this.counters[type]++;
      id = `${prefix}-${this.padNumber(this.counters[type])}`;
    } while (this.reserved.has(id));
    return id;
  }

  private padNumber(num: number): string {
    return num.toString().padStart(3, '0');
  }
}
