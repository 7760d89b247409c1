import type { RunProgress } from '../domain/model/RunResult.js';
import type { RunHooks } from '../domain/ports/RunHooks.js';
import type { ResolvedExecutorConfig } from '../config/ExecutorConfig.js';
import type { RetryPredicate } from './RetryingUnitRunner.js';
import { RunStatus, canTransition } from '../domain/model/RunStatus.js';
import { ConsistencyError, RunCancelledError } from '../domain/errors.js';
import { ConcurrencyLimiter } from './ConcurrencyLimiter.js';
import { ResultAggregator } from './ResultAggregator.js';
import { EventBus } from './EventBus.js';

/**
 * Mutable state shared by the use cases of a single run.
 *
 * Internal: the public surface is `BatchExecutor`. The aggregator is created
 * once the input size is known, in `begin()`.
 */
export class RunContext<T, R> {
  readonly runId: string = crypto.randomUUID();
  readonly eventBus = new EventBus();
  readonly abortController = new AbortController();
  readonly limiter: ConcurrencyLimiter;

  status: RunStatus = RunStatus.CREATED;
  totalBatches = 0;
  completedBatches = 0;
  startedAt?: number;
  private resultAggregator: ResultAggregator<R> | null = null;

  constructor(
    readonly config: ResolvedExecutorConfig,
    readonly hooks: RunHooks<T> | null,
    readonly isRetryable: RetryPredicate | undefined,
    readonly externalSignal: AbortSignal | undefined,
  ) {
    this.limiter = new ConcurrencyLimiter(config.maxConcurrency);
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get aggregator(): ResultAggregator<R> {
    if (!this.resultAggregator) {
      throw new ConsistencyError('Result aggregator used before the run started');
    }
    return this.resultAggregator;
  }

  get cancelRequested(): boolean {
    return this.signal.aborted;
  }

  begin(totalItems: number, totalBatches: number): void {
    this.transitionTo(RunStatus.RUNNING);
    this.resultAggregator = new ResultAggregator<R>(totalItems);
    this.totalBatches = totalBatches;
    this.startedAt = Date.now();
  }

  transitionTo(newStatus: RunStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new ConsistencyError(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  /** Stop starting new work. In-flight attempts run to completion. */
  cancel(reason?: string): void {
    if (this.signal.aborted) return;
    this.abortController.abort(new RunCancelledError(reason));
    this.limiter.cancel();
  }

  /** The error recorded on items cut short by cancellation. */
  cancellationError(): RunCancelledError {
    const reason: unknown = this.signal.reason;
    return reason instanceof RunCancelledError ? reason : new RunCancelledError();
  }

  elapsedMs(): number {
    return this.startedAt ? Date.now() - this.startedAt : 0;
  }

  buildProgress(): RunProgress {
    const total = this.resultAggregator?.total ?? 0;
    const succeeded = this.resultAggregator?.succeeded ?? 0;
    const failed = this.resultAggregator?.failed ?? 0;
    const completed = succeeded + failed;

    return {
      totalItems: total,
      completedItems: completed,
      succeededItems: succeeded,
      failedItems: failed,
      pendingItems: Math.max(0, total - completed),
      percentage: total > 0 ? Math.round((completed / total) * 100) : 0,
      completedBatches: this.completedBatches,
      totalBatches: this.totalBatches,
      elapsedMs: this.elapsedMs(),
    };
  }
}
