import type {
  BatchCondition,
  BatchDefinition,
  FileMetadata,
} from '@altokit/model';

function toNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!/^-?\d+(?:\.\d+)?$/.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}

/**
 * Whether one metadata value satisfies a condition value expression
 *
 * - "22": equality, numeric when both sides are numbers ("0022" matches)
 * - "23-24": inclusive numeric range
 * - "a,b,c": any of the listed values
 */
export function matchesConditionValue(actual: string, expression: string): boolean {
  const trimmed = expression.trim();

  if (trimmed.includes(',')) {
    return trimmed
      .split(',')
      .some((option) => matchesConditionValue(actual, option));
  }

  const value = toNumber(actual);
  const range = /^(-?\d+(?:\.\d+)?)\s*-\s*(-?\d+(?:\.\d+)?)$/.exec(trimmed);
  if (range) {
    if (value === null) {
      return false;
    }
    const low = Math.min(Number(range[1]), Number(range[2]));
    const high = Math.max(Number(range[1]), Number(range[2]));
    return value >= low && value <= high;
  }

  const expected = toNumber(trimmed);
  if (value !== null && expected !== null) {
    return value === expected;
  }
  return actual.trim() === trimmed;
}

export function matchesCondition(
  metadata: Readonly<FileMetadata>,
  condition: BatchCondition,
): boolean {
  const actual = metadata[condition.key];
  if (actual === undefined) {
    return false;
  }
  return matchesConditionValue(actual, condition.values);
}

/**
 * A file is in the batch when every condition holds. A batch without
 * conditions contains every file.
 */
export function isInBatch(
  metadata: Readonly<FileMetadata>,
  batch: BatchDefinition,
): boolean {
  return batch.conditions.every((condition) =>
    matchesCondition(metadata, condition),
  );
}
