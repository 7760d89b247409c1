import type { RunProgress, RunSummary } from '../model/RunResult.js';

/** Emitted when `execute()` starts. */
export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly runId: string;
  readonly totalItems: number;
  readonly totalBatches: number;
  readonly timestamp: number;
}

/** Emitted when a batch begins dispatching its items. */
export interface BatchStartedEvent {
  readonly type: 'batch:started';
  readonly runId: string;
  readonly batchIndex: number;
  readonly itemIds: readonly number[];
  readonly timestamp: number;
}

/** Emitted for each item whose operation returned a value. */
export interface UnitSucceededEvent {
  readonly type: 'unit:succeeded';
  readonly runId: string;
  readonly batchIndex: number;
  readonly itemId: number;
  readonly attempts: number;
  readonly timestamp: number;
}

/** Emitted when a failed attempt is about to be retried. */
export interface UnitRetryEvent {
  readonly type: 'unit:retry';
  readonly runId: string;
  readonly batchIndex: number;
  readonly itemId: number;
  /** Number of the attempt that just failed (1-based). */
  readonly attempt: number;
  /** Maximum retries configured. */
  readonly maxRetries: number;
  /** Backoff before the next attempt. */
  readonly delayMs: number;
  /** Error from the failed attempt. */
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when an item has failed its last allowed attempt. */
export interface UnitExhaustedEvent {
  readonly type: 'unit:exhausted';
  readonly runId: string;
  readonly batchIndex: number;
  readonly itemId: number;
  readonly attempts: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when every item of a batch has an outcome. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly runId: string;
  readonly batchIndex: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly timestamp: number;
}

/** Emitted when an infrastructure error took down a batch. `itemIds` lists the items given a synthetic failure. */
export interface BatchFailedEvent {
  readonly type: 'batch:failed';
  readonly runId: string;
  readonly batchIndex: number;
  readonly itemIds: readonly number[];
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted after each batch with updated counters. */
export interface RunProgressEvent {
  readonly type: 'run:progress';
  readonly runId: string;
  readonly progress: RunProgress;
  readonly timestamp: number;
}

/** Emitted when a cancelled run has accounted for every item. */
export interface RunCancelledEvent {
  readonly type: 'run:cancelled';
  readonly runId: string;
  readonly reason: string;
  readonly progress: RunProgress;
  readonly timestamp: number;
}

/** Emitted when every batch has been processed. */
export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly runId: string;
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly summary: RunSummary;
  readonly timestamp: number;
}

/** Emitted when the run aborts on an internal consistency violation. */
export interface RunFailedEvent {
  readonly type: 'run:failed';
  readonly runId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | RunStartedEvent
  | BatchStartedEvent
  | UnitSucceededEvent
  | UnitRetryEvent
  | UnitExhaustedEvent
  | BatchCompletedEvent
  | BatchFailedEvent
  | RunProgressEvent
  | RunCancelledEvent
  | RunCompletedEvent
  | RunFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
