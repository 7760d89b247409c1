import type { RunContext } from '../RunContext.js';
import { RunStatus } from '../../domain/model/RunStatus.js';
import { ConsistencyError } from '../../domain/errors.js';

/**
 * Use case: stop the run early.
 *
 * In-flight attempts finish; no new attempts, retries or batches start. The
 * pending `execute()` call still resolves with a full result in which every
 * unfinished item is a `cancelled` failure.
 */
export class CancelRun<T, R> {
  constructor(private readonly ctx: RunContext<T, R>) {}

  execute(reason?: string): void {
    if (this.ctx.status !== RunStatus.RUNNING) {
      throw new ConsistencyError(`Cannot cancel run from status '${this.ctx.status}'`);
    }
    this.ctx.cancel(reason);
  }
}
