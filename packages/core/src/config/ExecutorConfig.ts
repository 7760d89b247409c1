import { z } from 'zod';
import { ConfigError } from '../domain/errors.js';

/**
 * Zod schema for the serializable part of the executor configuration.
 * Each property corresponds to one tuning knob of a run.
 */
export const executorConfigSchema = z.object({
  /**
   * Items per concurrently dispatched group.
   * @default 10
   */
  batchSize: z.number().int().positive().default(10),
  /**
   * Simultaneous in-flight unit operations across the run.
   * Defaults to `batchSize`.
   */
  maxConcurrency: z.number().int().positive().optional(),
  /**
   * Retries per item after the first attempt.
   * @default 3
   */
  maxRetries: z.number().int().nonnegative().default(3),
  /**
   * Delay before the first retry; the k-th retry waits `backoffBaseMs * 2^k`.
   * @default 1000
   */
  backoffBaseMs: z.number().nonnegative().default(1000),
  /** Upper bound for a single backoff delay. Uncapped when omitted. */
  maxBackoffMs: z.number().nonnegative().optional(),
  /**
   * Pause between consecutive batches.
   * @default 0
   */
  interBatchDelayMs: z.number().nonnegative().default(0),
});

export type ExecutorConfigInput = z.input<typeof executorConfigSchema>;

/** Fully defaulted configuration. */
export interface ResolvedExecutorConfig {
  readonly batchSize: number;
  readonly maxConcurrency: number;
  readonly maxRetries: number;
  readonly backoffBaseMs: number;
  readonly maxBackoffMs: number | undefined;
  readonly interBatchDelayMs: number;
}

/** Validate and fill in defaults. `maxConcurrency` falls back to `batchSize`. */
export function resolveExecutorConfig(input: ExecutorConfigInput = {}): ResolvedExecutorConfig {
  const parsed = executorConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid executor configuration: ${details}`, { cause: parsed.error });
  }

  const config = parsed.data;
  return {
    batchSize: config.batchSize,
    maxConcurrency: config.maxConcurrency ?? config.batchSize,
    maxRetries: config.maxRetries,
    backoffBaseMs: config.backoffBaseMs,
    maxBackoffMs: config.maxBackoffMs,
    interBatchDelayMs: config.interBatchDelayMs,
  };
}

/** Backoff before the k-th retry (0-indexed). */
export function backoffDelay(config: Pick<ResolvedExecutorConfig, 'backoffBaseMs' | 'maxBackoffMs'>, retry: number): number {
  const delay = config.backoffBaseMs * Math.pow(2, retry);
  return config.maxBackoffMs === undefined ? delay : Math.min(delay, config.maxBackoffMs);
}
