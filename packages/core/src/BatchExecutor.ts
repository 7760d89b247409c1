import type { RunResult } from './domain/model/RunResult.js';
import type { UnitOperation } from './domain/ports/UnitOperation.js';
import type { RunHooks } from './domain/ports/RunHooks.js';
import type { ItemSource, ResultSink } from './domain/ports/ItemSource.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { ExecutorConfigInput } from './config/ExecutorConfig.js';
import type { RetryPredicate } from './application/RetryingUnitRunner.js';
import type { RunStatusResult } from './application/usecases/GetRunStatus.js';
import { resolveExecutorConfig } from './config/ExecutorConfig.js';
import { RunContext } from './application/RunContext.js';
import { ExecuteRun } from './application/usecases/ExecuteRun.js';
import { CancelRun } from './application/usecases/CancelRun.js';
import { GetRunStatus } from './application/usecases/GetRunStatus.js';

/** Configuration for a batch run. */
export interface BatchExecutorConfig<T> extends ExecutorConfigInput {
  /**
   * Decides whether a failed attempt may be retried.
   * Default: every error is retried until `maxRetries` is reached.
   */
  readonly isRetryable?: RetryPredicate;
  /** Lifecycle hooks around batch and unit dispatch. */
  readonly hooks?: RunHooks<T>;
  /** External cancellation. Aborting it has the same effect as `cancel()`. */
  readonly signal?: AbortSignal;
}

/**
 * Facade that runs an ordered list of items through a slow, failure-prone
 * operation: batch by batch, bounded concurrency within a batch, per-item
 * retries with exponential backoff and batch-level failure isolation.
 *
 * One instance performs one run. The returned result has exactly one outcome
 * per input item, in input order; partial failure never rejects.
 *
 * @example
 * ```typescript
 * const executor = new BatchExecutor(fetchSummary, { batchSize: 20, maxConcurrency: 5 });
 * executor.on('unit:retry', (e) => console.warn(e.itemId, e.error));
 * const result = await executor.execute(urls);
 * ```
 */
export class BatchExecutor<T, R> {
  private readonly ctx: RunContext<T, R>;

  /** @throws ConfigError when the configuration is invalid. */
  constructor(
    private readonly operation: UnitOperation<T, R>,
    config: BatchExecutorConfig<T> = {},
  ) {
    this.ctx = new RunContext<T, R>(resolveExecutorConfig(config), config.hooks ?? null, config.isRetryable, config.signal);
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<E extends EventType>(type: E, handler: (event: EventPayload<E>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<E extends EventType>(type: E, handler: (event: EventPayload<E>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Process every item and resolve with one outcome per item.
   *
   * @throws ConsistencyError on an internal contract violation, or when called twice.
   */
  async execute(items: Iterable<T>): Promise<RunResult<R>> {
    return new ExecuteRun(this.ctx).execute(items, this.operation);
  }

  /** Load items from `source`, execute, and hand the result to `sink` when given. */
  async executeFrom(source: ItemSource<T>, sink?: ResultSink<R>): Promise<RunResult<R>> {
    const items = await source.load();
    const result = await this.execute(items);
    if (sink) await sink.write(result);
    return result;
  }

  /** Stop the run early. The pending `execute()` still resolves with a complete result. */
  cancel(reason?: string): void {
    new CancelRun(this.ctx).execute(reason);
  }

  /** Get current status, progress counters and effective configuration. */
  getStatus(): RunStatusResult {
    return new GetRunStatus(this.ctx).execute();
  }

  /** Get the unique run identifier (UUID). */
  getRunId(): string {
    return this.ctx.runId;
  }
}

/** Functional form: build an executor and run it once. */
export async function executeBatches<T, R>(
  items: Iterable<T>,
  operation: UnitOperation<T, R>,
  config: BatchExecutorConfig<T> = {},
): Promise<RunResult<R>> {
  return new BatchExecutor(operation, config).execute(items);
}
