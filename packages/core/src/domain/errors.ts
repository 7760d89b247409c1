/** Base class for every error raised by the executor. `code` is stable across releases. */
export abstract class UnitBatchError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A failure reported by the unit operation. Operations may throw anything;
 * non-`Error` values are wrapped in this class so outcomes always carry an `Error`.
 */
export class TransientUnitError extends UnitBatchError {
  readonly code = 'TRANSIENT_UNIT_ERROR';
}

/** Terminal per-item condition: the operation kept failing until the retry ceiling. */
export class ExhaustedRetriesError extends UnitBatchError {
  readonly code = 'EXHAUSTED_RETRIES';

  constructor(
    readonly attempts: number,
    readonly lastError: Error,
  ) {
    super(`Gave up after ${String(attempts)} attempt(s): ${lastError.message}`, { cause: lastError });
  }
}

/** An error that escaped the per-item boundary and took down a whole batch. */
export class BatchInfrastructureError extends UnitBatchError {
  readonly code = 'BATCH_INFRASTRUCTURE_ERROR';

  constructor(
    readonly batchIndex: number,
    cause: unknown,
  ) {
    super(`Batch ${String(batchIndex)} failed: ${errorMessage(cause)}`, { cause });
  }
}

/** The run was cancelled before this item reached a final outcome. */
export class RunCancelledError extends UnitBatchError {
  readonly code = 'RUN_CANCELLED';

  constructor(reason?: string) {
    super(reason ? `Run cancelled: ${reason}` : 'Run cancelled');
  }
}

/** Internal contract violation. Indicates a defect in the executor, never bad input data. */
export class ConsistencyError extends UnitBatchError {
  readonly code = 'CONSISTENCY_ERROR';
}

/** Invalid executor configuration. */
export class ConfigError extends UnitBatchError {
  readonly code = 'CONFIG_ERROR';
}

/** Coerce anything thrown into an `Error`. */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  return new TransientUnitError(String(thrown), { cause: thrown });
}

export function errorMessage(thrown: unknown): string {
  return thrown instanceof Error ? thrown.message : String(thrown);
}
