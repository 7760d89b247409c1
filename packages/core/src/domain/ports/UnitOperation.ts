/** Context passed to the unit operation for each call. */
export interface UnitContext {
  /** Unique run identifier. */
  readonly runId: string;
  /** Zero-based batch index. */
  readonly batchIndex: number;
  /** Index of the work item within the whole input. */
  readonly itemIndex: number;
  /** Attempt number for this call (1-based). */
  readonly attempt: number;
  /** Abort signal for the run. Operations may observe it; the executor never kills an attempt. */
  readonly signal: AbortSignal;
}

/**
 * The external call made once per attempt for a work item.
 *
 * Resolve with the derived value; throw (or reject) to report a failure. Every
 * failure is treated as transient and retried up to `maxRetries`, unless the
 * configured `isRetryable` predicate says otherwise.
 */
export type UnitOperation<T, R> = (value: T, context: UnitContext) => Promise<R>;
