/**
 * Condition on one file metadata value
 *
 * `values` is either a single value ("22"), an inclusive numeric range
 * ("23-24") or a comma-separated list ("a,b,c").
 *
 * @interface BatchCondition
 */
export interface BatchCondition {
  key: string;
  values: string;
}

/**
 * Named group of files selected by their metadata
 *
 * A file belongs to the batch when every condition holds.
 *
 * @interface BatchDefinition
 */
export interface BatchDefinition {
  name: string;
  conditions: BatchCondition[];
}
