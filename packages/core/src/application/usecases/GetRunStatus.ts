import type { RunContext } from '../RunContext.js';
import type { RunStatus } from '../../domain/model/RunStatus.js';
import type { RunProgress } from '../../domain/model/RunResult.js';
import type { ResolvedExecutorConfig } from '../../config/ExecutorConfig.js';

/** Snapshot returned by `BatchExecutor.getStatus()`. */
export interface RunStatusResult {
  readonly runId: string;
  readonly status: RunStatus;
  /** `true` once cancellation was requested, even while in-flight attempts are still finishing. */
  readonly cancelRequested: boolean;
  readonly progress: RunProgress;
  readonly config: ResolvedExecutorConfig;
  /** Unit operations currently holding a concurrency slot. */
  readonly inFlight: number;
}

/** Use case: read current status and progress counters. */
export class GetRunStatus<T, R> {
  constructor(private readonly ctx: RunContext<T, R>) {}

  execute(): RunStatusResult {
    return {
      runId: this.ctx.runId,
      status: this.ctx.status,
      cancelRequested: this.ctx.cancelRequested,
      progress: this.ctx.buildProgress(),
      config: this.ctx.config,
      inFlight: this.ctx.limiter.inFlight,
    };
  }
}
