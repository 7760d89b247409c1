import type { WorkItem } from '../model/WorkItem.js';
import type { Batch } from '../model/Batch.js';
import { createBatch } from '../model/Batch.js';
import { ConfigError } from '../errors.js';

/**
 * Domain service that groups work items into fixed-size batches.
 *
 * Pure logic. Batch `i` holds items
 * `[i * batchSize, min((i + 1) * batchSize, N))`.
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigError('Batch size must be a positive integer');
    }
  }

  /** Number of batches `total` items split into. */
  count(total: number): number {
    return Math.ceil(total / this.batchSize);
  }

  /**
   * Split items into batches of `batchSize`, preserving order.
   * The final batch may contain fewer items than `batchSize`.
   */
  *split<T>(items: readonly WorkItem<T>[]): Iterable<Batch<T>> {
    for (let start = 0, batchIndex = 0; start < items.length; start += this.batchSize, batchIndex++) {
      yield createBatch(batchIndex, items.slice(start, start + this.batchSize));
    }
  }
}
