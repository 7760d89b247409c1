import type { RunResult, RunSummary } from '../domain/model/RunResult.js';
import type { UnitFailure, UnitOutcome } from '../domain/model/UnitOutcome.js';
import { FailureReason } from '../domain/model/UnitOutcome.js';
import { ConsistencyError } from '../domain/errors.js';

/**
 * Collects one outcome per work item into a pre-sized slot array.
 *
 * Outcomes may arrive in any order; slot `i` always holds the outcome of item
 * `i`, so the finalized result is in input order without sorting.
 */
export class ResultAggregator<R> {
  private readonly slots: Array<UnitOutcome<R> | undefined>;
  private recorded = 0;
  private succeededCount = 0;
  private retriedSucceededCount = 0;
  private failedCount = 0;
  private cancelledCount = 0;
  private batchesFailedCount = 0;

  constructor(readonly total: number) {
    this.slots = new Array<UnitOutcome<R> | undefined>(total).fill(undefined);
  }

  get recordedCount(): number {
    return this.recorded;
  }

  get succeeded(): number {
    return this.succeededCount;
  }

  get failed(): number {
    return this.failedCount;
  }

  /** Store the outcome for its item. Each item may be recorded exactly once. */
  record(outcome: UnitOutcome<R>): void {
    const { index } = outcome;
    if (!Number.isInteger(index) || index < 0 || index >= this.total) {
      throw new ConsistencyError(`Outcome index ${String(index)} is outside 0..${String(this.total - 1)}`);
    }
    if (this.slots[index] !== undefined) {
      throw new ConsistencyError(`Item ${String(index)} already has an outcome`);
    }

    this.slots[index] = outcome;
    this.recorded++;

    if (outcome.status === 'success') {
      this.succeededCount++;
      if (outcome.attempts > 1) this.retriedSucceededCount++;
    } else {
      this.failedCount++;
      if (outcome.reason === FailureReason.CANCELLED) this.cancelledCount++;
    }
  }

  has(index: number): boolean {
    return this.slots[index] !== undefined;
  }

  /** Indices that have no outcome yet, ascending. */
  missing(): number[] {
    const result: number[] = [];
    this.slots.forEach((slot, index) => {
      if (slot === undefined) result.push(index);
    });
    return result;
  }

  /** Record a synthesized failure for each of `indices` that has no outcome yet. Returns the indices filled. */
  fillMissing(indices: Iterable<number>, makeFailure: (index: number) => UnitFailure): number[] {
    const filled: number[] = [];
    for (const index of indices) {
      if (this.has(index)) continue;
      this.record(makeFailure(index));
      filled.push(index);
    }
    return filled;
  }

  /** Count a batch that went through the isolation path. */
  markBatchFailed(): void {
    this.batchesFailedCount++;
  }

  summarize(elapsedMs: number): RunSummary {
    return {
      total: this.total,
      succeeded: this.succeededCount,
      retriedSucceeded: this.retriedSucceededCount,
      failed: this.failedCount,
      cancelled: this.cancelledCount,
      batchesFailed: this.batchesFailedCount,
      elapsedMs,
    };
  }

  /**
   * Hand back the ordered outcomes.
   *
   * @throws ConsistencyError if any item has no outcome.
   */
  finalize(runId: string, status: RunResult<R>['status'], elapsedMs: number): RunResult<R> {
    const outcomes: UnitOutcome<R>[] = [];
    for (const [index, slot] of this.slots.entries()) {
      if (slot === undefined) {
        const missing = this.missing();
        throw new ConsistencyError(
          `Cannot finalize: ${String(missing.length)} item(s) without outcome (first: ${String(index)})`,
        );
      }
      outcomes.push(slot);
    }

    return { runId, status, outcomes, summary: this.summarize(elapsedMs) };
  }
}
