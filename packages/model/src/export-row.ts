/**
 * Scalar value of an exported column
 */
export type ExportCell = string | number | boolean | null;

/**
 * Any value an export row holds; list and map values are flattened for
 * delimited output
 */
export type ExportValue = ExportCell | string[] | Record<string, string>;

/**
 * One exported text element
 *
 * Fixed columns first; marks and file metadata are merged in as extra columns
 * when the exporter is asked to include them. A boolean `removed` column is
 * added when removed elements are exported.
 *
 * @interface ExportRow
 */
export interface ExportRow {
  /**
   * File name of the source document
   */
  file: string;

  /**
   * Path the source document was read from; identifies the file on import
   */
  path: string;

  id: string;
  type: string;
  text: string;
  category: string | null;
  hpos: number | null;
  vpos: number | null;
  width: number | null;
  height: number | null;
  baseline: string | null;

  /**
   * Operation identifiers in application order
   */
  matchedBy: string[];

  /**
   * Value captured by each selecting operation, keyed by operation identifier
   */
  matchedValues: Record<string, string>;

  [column: string]: ExportValue;
}
