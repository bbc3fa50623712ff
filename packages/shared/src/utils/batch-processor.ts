/**
 * BatchProcessor - Batch processing utility
 *
 * Splits large arrays into batches and runs them through a bounded pool of
 * async workers.
 */
export class BatchProcessor {
  /**
   * Splits an array into batches of specified size.
   *
   * @example
   * ```typescript
   * const batches = BatchProcessor.createBatches([1, 2, 3, 4, 5], 2);
   * // [[1, 2], [3, 4], [5]]
   * ```
   */
  static createBatches<T>(items: readonly T[], batchSize: number): T[][] {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`Batch size must be a positive integer: ${batchSize}`);
    }

    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += batchSize) {
      batches.push(items.slice(i, i + batchSize));
    }
    return batches;
  }

  /**
   * Splits items into batches and processes them with at most `concurrency`
   * batches in flight. When a batch finishes, the worker immediately picks up
   * the next one. Results keep the original item order.
   *
   * @param items - Items to process
   * @param batchSize - Size of each batch
   * @param concurrency - Maximum number of batches processed at once
   * @param processFn - Async function returning one result per batch item
   * @param onBatchComplete - Optional callback fired after each batch
   *
   * @example
   * ```typescript
   * const upper = await BatchProcessor.processConcurrently(
   *   ['a', 'b', 'c'],
   *   2,
   *   4,
   *   async (batch) => batch.map((t) => t.toUpperCase()),
   * );
   * // ['A', 'B', 'C']
   * ```
   */
  static async processConcurrently<T, R>(
    items: readonly T[],
    batchSize: number,
    concurrency: number,
    processFn: (batch: T[], batchIndex: number) => Promise<R[]>,
    onBatchComplete?: (batchIndex: number, batchCount: number) => void,
  ): Promise<R[]> {
    const batches = this.createBatches(items, batchSize);
    const results: R[][] = new Array(batches.length);
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < batches.length) {
        const index = nextIndex++;
        results[index] = await processFn(batches[index], index);
        onBatchComplete?.(index, batches.length);
      }
    };

    const workers = Array.from(
      { length: Math.min(Math.max(concurrency, 1), batches.length) },
      () => worker(),
    );
    await Promise.all(workers);
    return results.flatMap<R>((batch) => batch);
  }
}
