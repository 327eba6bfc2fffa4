/** One group of consecutive items with its zero-based position in the sequence of batches. */
export interface BatchSlice<T> {
  readonly items: readonly T[];
  readonly batchIndex: number;
}

/**
 * Domain service that groups a sequence of items into fixed-size batches.
 *
 * Pure logic: no I/O, no side effects. Order is preserved inside and across batches.
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error('Batch size must be a positive integer');
    }
  }

  /**
   * Split items into batches of `batchSize`.
   *
   * The final batch may contain fewer items than `batchSize`. An empty input yields nothing.
   */
  *split<T>(items: Iterable<T>): Generator<BatchSlice<T>> {
    let buffer: T[] = [];
    let batchIndex = 0;

    for (const item of items) {
      buffer.push(item);

      if (buffer.length >= this.batchSize) {
        yield { items: buffer, batchIndex };
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield { items: buffer, batchIndex };
    }
  }
}
