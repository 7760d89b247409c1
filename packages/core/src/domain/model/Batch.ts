import type { WorkItem } from './WorkItem.js';

/** A contiguous group of work items dispatched together. */
export interface Batch<T> {
  /** Zero-based batch index within the run. */
  readonly index: number;
  /** Items in input order. */
  readonly items: readonly WorkItem<T>[];
}

/** Create a batch from a slice of work items. */
export function createBatch<T>(index: number, items: readonly WorkItem<T>[]): Batch<T> {
  return { index, items };
}

/** Identities of every item in the batch, in order. */
export function batchItemIds<T>(batch: Batch<T>): number[] {
  return batch.items.map((item) => item.index);
}
