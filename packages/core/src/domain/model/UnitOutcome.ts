import type { WorkItem } from './WorkItem.js';

/** Why an item ended without a value. */
export const FailureReason = {
  /** The operation failed on every allowed attempt (or with a non-retryable error). */
  EXHAUSTED: 'exhausted',
  /** An infrastructure error took down the item's batch. */
  BATCH_FAILED: 'batch_failed',
  /** The run was cancelled before the item finished. */
  CANCELLED: 'cancelled',
} as const;

export type FailureReason = (typeof FailureReason)[keyof typeof FailureReason];

/** The operation produced a value. */
export interface UnitSuccess<R> {
  readonly status: 'success';
  /** Index of the originating work item. */
  readonly index: number;
  readonly value: R;
  /** Calls made, including the successful one. `> 1` means the item succeeded on a retry. */
  readonly attempts: number;
}

/** The item ended without a value. */
export interface UnitFailure {
  readonly status: 'failure';
  /** Index of the originating work item. */
  readonly index: number;
  readonly reason: FailureReason;
  /** Last error seen for this item. */
  readonly error: Error;
  /** Calls made to the operation. `0` when the item never started. */
  readonly attempts: number;
}

/** Final result for one work item. Exactly one is created per item. */
export type UnitOutcome<R> = UnitSuccess<R> | UnitFailure;

export function succeeded<R>(item: WorkItem<unknown>, value: R, attempts: number): UnitSuccess<R> {
  return { status: 'success', index: item.index, value, attempts };
}

export function failed(index: number, reason: FailureReason, error: Error, attempts: number): UnitFailure {
  return { status: 'failure', index, reason, error, attempts };
}

export function isSuccess<R>(outcome: UnitOutcome<R>): outcome is UnitSuccess<R> {
  return outcome.status === 'success';
}

export function isFailure<R>(outcome: UnitOutcome<R>): outcome is UnitFailure {
  return outcome.status === 'failure';
}
