import type { Batch } from '../model/Batch.js';
import type { WorkItem } from '../model/WorkItem.js';

/** Context passed to lifecycle hook functions. */
export interface HookContext {
  /** Unique run identifier. */
  readonly runId: string;
  /** Zero-based batch index. */
  readonly batchIndex: number;
  /** Total number of batches in the run. */
  readonly totalBatches: number;
  /** Abort signal for cancellation detection. */
  readonly signal: AbortSignal;
}

/**
 * Lifecycle hooks around batch and unit dispatch.
 *
 * Hooks run outside the per-item retry boundary. If one throws, the error is
 * treated as a batch infrastructure failure: items of the batch that have no
 * outcome yet are recorded as `batch_failed` and the run moves on.
 *
 * Order for each batch:
 * 1. **`beforeBatch`**
 * 2. for every item, concurrently: admit → **`beforeUnit`** → operation (with retries) → release
 * 3. **`afterBatch`**
 */
export interface RunHooks<T> {
  /** Called before any item of the batch is dispatched. */
  beforeBatch?: (batch: Batch<T>, context: HookContext) => Promise<void>;
  /** Called once a concurrency slot is held, before the first attempt for the item. */
  beforeUnit?: (item: WorkItem<T>, context: HookContext) => Promise<void>;
  /** Called after every item of the batch has settled. */
  afterBatch?: (batch: Batch<T>, context: HookContext) => Promise<void>;
}
