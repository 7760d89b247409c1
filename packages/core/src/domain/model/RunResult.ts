import type { UnitFailure, UnitOutcome, UnitSuccess } from './UnitOutcome.js';
import type { RunStatus } from './RunStatus.js';

/** Aggregate counts for a finished run. */
export interface RunSummary {
  /** Number of input items. Always equals `outcomes.length`. */
  readonly total: number;
  /** Items that produced a value, on the first attempt or a retry. */
  readonly succeeded: number;
  /** Subset of `succeeded` that needed at least one retry. */
  readonly retriedSucceeded: number;
  /** Items without a value, whatever the reason. */
  readonly failed: number;
  /** Subset of `failed` that were cut short by cancellation. */
  readonly cancelled: number;
  /** Batches that went through the isolation path. */
  readonly batchesFailed: number;
  readonly elapsedMs: number;
}

/** Progress counters while a run is in flight. */
export interface RunProgress {
  readonly totalItems: number;
  readonly completedItems: number;
  readonly succeededItems: number;
  readonly failedItems: number;
  readonly pendingItems: number;
  /** Integer percentage of items with an outcome. */
  readonly percentage: number;
  readonly completedBatches: number;
  readonly totalBatches: number;
  readonly elapsedMs: number;
}

/** One outcome per input item, in original input order, plus counts. */
export interface RunResult<R> {
  readonly runId: string;
  /** `COMPLETED`, or `CANCELLED` when the run was cut short. */
  readonly status: Extract<RunStatus, 'COMPLETED' | 'CANCELLED'>;
  readonly outcomes: readonly UnitOutcome<R>[];
  readonly summary: RunSummary;
}

/** Successful outcomes in input order. */
export function successes<R>(result: RunResult<R>): UnitSuccess<R>[] {
  return result.outcomes.filter((o): o is UnitSuccess<R> => o.status === 'success');
}

/** Failed outcomes in input order. */
export function failures<R>(result: RunResult<R>): UnitFailure[] {
  return result.outcomes.filter((o): o is UnitFailure => o.status === 'failure');
}
