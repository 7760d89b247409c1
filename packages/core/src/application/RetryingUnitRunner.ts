import type { WorkItem } from '../domain/model/WorkItem.js';
import type { UnitOutcome } from '../domain/model/UnitOutcome.js';
import type { UnitOperation, UnitContext } from '../domain/ports/UnitOperation.js';
import type { ResolvedExecutorConfig } from '../config/ExecutorConfig.js';
import type { EventBus } from './EventBus.js';
import type { RunCancelledError } from '../domain/errors.js';
import { FailureReason, failed, succeeded } from '../domain/model/UnitOutcome.js';
import { ExhaustedRetriesError, toError } from '../domain/errors.js';
import { backoffDelay } from '../config/ExecutorConfig.js';
import { delay } from './delay.js';

/** Decides whether a failed attempt may be retried. */
export type RetryPredicate = (error: Error) => boolean;

export interface RetryingUnitRunnerOptions {
  readonly runId: string;
  readonly config: Pick<ResolvedExecutorConfig, 'maxRetries' | 'backoffBaseMs' | 'maxBackoffMs'>;
  readonly eventBus: EventBus;
  readonly signal: AbortSignal;
  readonly isRetryable?: RetryPredicate;
  /** Error recorded when cancellation stops an item between attempts. */
  readonly cancellationError: () => RunCancelledError;
}

/**
 * Runs one work item through the operation with bounded retries and exponential backoff.
 *
 * Attempting → Success
 *            → Backoff → Attempting
 *            → Exhausted
 *
 * The operation's errors never leave `run()`: they end up in the returned outcome.
 */
export class RetryingUnitRunner {
  private readonly isRetryable: RetryPredicate;

  constructor(private readonly options: RetryingUnitRunnerOptions) {
    this.isRetryable = options.isRetryable ?? (() => true);
  }

  async run<T, R>(item: WorkItem<T>, operation: UnitOperation<T, R>, batchIndex: number): Promise<UnitOutcome<R>> {
    const { runId, config, eventBus, signal } = this.options;
    const maxAttempts = config.maxRetries + 1;
    let attempts = 0;

    for (;;) {
      attempts++;
      const context: UnitContext = { runId, batchIndex, itemIndex: item.index, attempt: attempts, signal };

      let lastError: Error;
      try {
        const value = await operation(item.value, context);
        return succeeded(item, value, attempts);
      } catch (error) {
        lastError = toError(error);
      }

      if (attempts >= maxAttempts || !this.isRetryable(lastError)) {
        eventBus.emit({
          type: 'unit:exhausted',
          runId,
          batchIndex,
          itemId: item.index,
          attempts,
          error: lastError.message,
          timestamp: Date.now(),
        });
        return failed(item.index, FailureReason.EXHAUSTED, new ExhaustedRetriesError(attempts, lastError), attempts);
      }

      // The attempt in flight was allowed to finish; no retry starts after cancellation.
      if (signal.aborted) {
        return failed(item.index, FailureReason.CANCELLED, this.options.cancellationError(), attempts);
      }

      const delayMs = backoffDelay(config, attempts - 1);
      eventBus.emit({
        type: 'unit:retry',
        runId,
        batchIndex,
        itemId: item.index,
        attempt: attempts,
        maxRetries: config.maxRetries,
        delayMs,
        error: lastError.message,
        timestamp: Date.now(),
      });

      const elapsed = await delay(delayMs, signal);
      if (!elapsed) {
        return failed(item.index, FailureReason.CANCELLED, this.options.cancellationError(), attempts);
      }
    }
  }
}
