import type { Batch } from '../../domain/model/Batch.js';
import type { RunResult } from '../../domain/model/RunResult.js';
import type { WorkItem } from '../../domain/model/WorkItem.js';
import type { UnitOperation } from '../../domain/ports/UnitOperation.js';
import type { HookContext } from '../../domain/ports/RunHooks.js';
import type { RunContext } from '../RunContext.js';
import { createWorkItems } from '../../domain/model/WorkItem.js';
import { batchItemIds } from '../../domain/model/Batch.js';
import { FailureReason, failed } from '../../domain/model/UnitOutcome.js';
import { RunStatus } from '../../domain/model/RunStatus.js';
import { BatchInfrastructureError, ConsistencyError, errorMessage } from '../../domain/errors.js';
import { BatchSplitter } from '../../domain/services/BatchSplitter.js';
import { RetryingUnitRunner } from '../RetryingUnitRunner.js';
import { delay } from '../delay.js';

/** Use case: run every item through the operation, batch by batch, and account for each one. */
export class ExecuteRun<T, R> {
  constructor(private readonly ctx: RunContext<T, R>) {}

  async execute(values: Iterable<T>, operation: UnitOperation<T, R>): Promise<RunResult<R>> {
    this.assertCanStart();

    const items = createWorkItems(values);
    const splitter = new BatchSplitter(this.ctx.config.batchSize);
    this.ctx.begin(items.length, splitter.count(items.length));

    const detach = this.followExternalSignal();

    // Yield to next microtask so handlers registered after execute() on the same tick receive this event
    await Promise.resolve();

    this.ctx.eventBus.emit({
      type: 'run:started',
      runId: this.ctx.runId,
      totalItems: items.length,
      totalBatches: this.ctx.totalBatches,
      timestamp: Date.now(),
    });

    const runner = new RetryingUnitRunner({
      runId: this.ctx.runId,
      config: this.ctx.config,
      eventBus: this.ctx.eventBus,
      signal: this.ctx.signal,
      isRetryable: this.ctx.isRetryable,
      cancellationError: () => this.ctx.cancellationError(),
    });

    try {
      for (const batch of splitter.split(items)) {
        if (this.ctx.signal.aborted) break;

        // The pause applies after failed batches too.
        if (batch.index > 0 && !(await delay(this.ctx.config.interBatchDelayMs, this.ctx.signal))) break;

        await this.processBatch(batch, operation, runner);
      }

      return this.finish();
    } catch (error) {
      this.ctx.transitionTo(RunStatus.FAILED);
      this.ctx.eventBus.emit({
        type: 'run:failed',
        runId: this.ctx.runId,
        error: errorMessage(error),
        timestamp: Date.now(),
      });
      throw error;
    } finally {
      detach();
    }
  }

  private assertCanStart(): void {
    if (this.ctx.status !== RunStatus.CREATED) {
      throw new ConsistencyError(`Cannot start run from status '${this.ctx.status}'`);
    }
  }

  private followExternalSignal(): () => void {
    const external = this.ctx.externalSignal;
    if (!external) return () => undefined;

    const onAbort = (): void => {
      const reason: unknown = external.reason;
      this.ctx.cancel(reason === undefined ? undefined : errorMessage(reason));
    };
    if (external.aborted) {
      onAbort();
      return () => undefined;
    }
    external.addEventListener('abort', onAbort, { once: true });
    return () => {
      external.removeEventListener('abort', onAbort);
    };
  }

  private async processBatch(batch: Batch<T>, operation: UnitOperation<T, R>, runner: RetryingUnitRunner): Promise<void> {
    const aggregator = this.ctx.aggregator;
    const hookCtx: HookContext = {
      runId: this.ctx.runId,
      batchIndex: batch.index,
      totalBatches: this.ctx.totalBatches,
      signal: this.ctx.signal,
    };
    const succeededBefore = aggregator.succeeded;
    const failedBefore = aggregator.failed;

    this.ctx.eventBus.emit({
      type: 'batch:started',
      runId: this.ctx.runId,
      batchIndex: batch.index,
      itemIds: batchItemIds(batch),
      timestamp: Date.now(),
    });

    let batchFailed = false;
    try {
      if (this.ctx.hooks?.beforeBatch) {
        await this.ctx.hooks.beforeBatch(batch, hookCtx);
      }

      // allSettled: every unit must stop touching the aggregator before the isolation path fills gaps.
      const settled = await Promise.allSettled(
        batch.items.map((item) => this.processUnit(item, operation, runner, hookCtx)),
      );
      const escaped: unknown[] = [];
      for (const result of settled) {
        if (result.status === 'rejected') escaped.push(result.reason);
      }
      const fatal = escaped.find((error) => error instanceof ConsistencyError);
      if (fatal !== undefined) throw fatal;
      if (escaped.length > 0) throw escaped[0];

      if (this.ctx.hooks?.afterBatch) {
        await this.ctx.hooks.afterBatch(batch, hookCtx);
      }
    } catch (error) {
      if (error instanceof ConsistencyError) throw error;
      batchFailed = true;
      this.isolateBatchFailure(batch, error);
    }

    this.ctx.completedBatches++;

    if (!batchFailed) {
      this.ctx.eventBus.emit({
        type: 'batch:completed',
        runId: this.ctx.runId,
        batchIndex: batch.index,
        succeeded: aggregator.succeeded - succeededBefore,
        failed: aggregator.failed - failedBefore,
        timestamp: Date.now(),
      });
    }

    this.ctx.eventBus.emit({
      type: 'run:progress',
      runId: this.ctx.runId,
      progress: this.ctx.buildProgress(),
      timestamp: Date.now(),
    });
  }

  private async processUnit(
    item: WorkItem<T>,
    operation: UnitOperation<T, R>,
    runner: RetryingUnitRunner,
    hookCtx: HookContext,
  ): Promise<void> {
    const aggregator = this.ctx.aggregator;
    const permit = await this.ctx.limiter.admit();
    if (!permit) {
      aggregator.record(failed(item.index, FailureReason.CANCELLED, this.ctx.cancellationError(), 0));
      return;
    }

    try {
      if (this.ctx.hooks?.beforeUnit) {
        await this.ctx.hooks.beforeUnit(item, hookCtx);
      }
      if (this.ctx.signal.aborted) {
        aggregator.record(failed(item.index, FailureReason.CANCELLED, this.ctx.cancellationError(), 0));
        return;
      }

      const outcome = await runner.run(item, operation, hookCtx.batchIndex);
      aggregator.record(outcome);

      if (outcome.status === 'success') {
        this.ctx.eventBus.emit({
          type: 'unit:succeeded',
          runId: this.ctx.runId,
          batchIndex: hookCtx.batchIndex,
          itemId: item.index,
          attempts: outcome.attempts,
          timestamp: Date.now(),
        });
      }
    } finally {
      this.ctx.limiter.release(permit);
    }
  }

  private isolateBatchFailure(batch: Batch<T>, cause: unknown): void {
    const error = new BatchInfrastructureError(batch.index, cause);
    const filled = this.ctx.aggregator.fillMissing(batchItemIds(batch), (index) =>
      failed(index, FailureReason.BATCH_FAILED, error, 0),
    );
    this.ctx.aggregator.markBatchFailed();

    this.ctx.eventBus.emit({
      type: 'batch:failed',
      runId: this.ctx.runId,
      batchIndex: batch.index,
      itemIds: filled,
      error: error.message,
      timestamp: Date.now(),
    });
  }

  private finish(): RunResult<R> {
    const aggregator = this.ctx.aggregator;

    if (this.ctx.signal.aborted) {
      const cancellation = this.ctx.cancellationError();
      aggregator.fillMissing(aggregator.missing(), (index) => failed(index, FailureReason.CANCELLED, cancellation, 0));
      const result = aggregator.finalize(this.ctx.runId, RunStatus.CANCELLED, this.ctx.elapsedMs());
      this.ctx.transitionTo(RunStatus.CANCELLED);

      this.ctx.eventBus.emit({
        type: 'run:cancelled',
        runId: this.ctx.runId,
        reason: cancellation.message,
        progress: this.ctx.buildProgress(),
        timestamp: Date.now(),
      });
      return result;
    }

    const result = aggregator.finalize(this.ctx.runId, RunStatus.COMPLETED, this.ctx.elapsedMs());
    this.ctx.transitionTo(RunStatus.COMPLETED);

    this.ctx.eventBus.emit({
      type: 'run:completed',
      runId: this.ctx.runId,
      total: result.summary.total,
      succeeded: result.summary.succeeded,
      failed: result.summary.failed,
      summary: result.summary,
      timestamp: Date.now(),
    });
    return result;
  }
}
