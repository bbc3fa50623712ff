/**
 * Granularity of a text element
 *
 * Matches the ALTO element the text was collected from.
 */
export type ElementType = 'TextLine' | 'TextBlock';

/**
 * Value stored by a `mark` operation
 */
export type MarkValue = string | number | boolean;

/**
 * Bounding box of a text element
 *
 * Carried through the pipeline unchanged. Missing or non-numeric ALTO
 * attributes are stored as null.
 *
 * @interface ElementPosition
 */
export interface ElementPosition {
  /**
   * Horizontal offset of the left edge (ALTO `HPOS`)
   * @type {number | null}
   */
  hpos: number | null;

  /**
   * Vertical offset of the top edge (ALTO `VPOS`)
   * @type {number | null}
   */
  vpos: number | null;

  /**
   * @type {number | null}
   */
  width: number | null;

  /**
   * @type {number | null}
   */
  height: number | null;

  /**
   * Raw ALTO `BASELINE` attribute
   *
   * A number in ALTO v1-v3, a point list ("x1,y1 x2,y2") in v4.
   *
   * @type {string | null}
   */
  baseline: string | null;
}

/**
 * Read-only data a parser produces for one text element
 *
 * @interface ElementSeed
 */
export interface ElementSeed {
  /**
   * Identifier, unique within its file (ALTO `ID` attribute)
   * @type {string}
   */
  id: string;

  /**
   * @type {ElementType}
   */
  type: ElementType;

  /**
   * Sanitized text content
   * @type {string}
   */
  text: string;

  /**
   * @type {ElementPosition}
   */
  position: ElementPosition;

  /**
   * ID of the enclosing block (for lines) or page (for blocks), if any
   * @type {string | null}
   */
  parentId: string | null;
}

/**
 * Addressable unit of extracted text with its pipeline state
 *
 * `id`, `type`, `text`, `position`, `sourceFile` and `parentId` never change after
 * parsing. `category`, `matchedBy`, `matchedValues`, `marks` and `removed` are
 * written by pipeline operations:
 *
 * - `removed` only ever goes from false to true
 * - `category` is overwritten by later categorize calls, never cleared
 * - `matchedBy` only grows
 *
 * @interface TextElement
 */
export interface TextElement {
  readonly id: string;
  readonly type: ElementType;
  readonly text: string;
  readonly position: Readonly<ElementPosition>;

  /**
   * Path of the owning ParsedFile (lookup key, not ownership)
   */
  readonly sourceFile: string;

  readonly parentId: string | null;

  /**
   * Committed category label, null until categorized
   */
  category: string | null;

  /**
   * Identifiers of the operations that selected or annotated this element,
   * in application order
   */
  matchedBy: string[];

  /**
   * Value captured by a selecting operation, keyed by operation identifier
   */
  matchedValues: Record<string, string>;

  /**
   * Free annotations written by `mark`
   */
  marks: Record<string, MarkValue>;

  /**
   * Soft-delete flag
   */
  removed: boolean;
}
