import { z } from 'zod';
import type { ExecutorConfigInput } from './ExecutorConfig.js';
import { ConfigError } from '../domain/errors.js';

/** Environment variables understood by `loadEnvConfig`. All optional. */
export const envSchema = z.object({
  UNITBATCH_BATCH_SIZE: z.coerce.number().int().positive().optional(),
  UNITBATCH_MAX_CONCURRENCY: z.coerce.number().int().positive().optional(),
  UNITBATCH_MAX_RETRIES: z.coerce.number().int().nonnegative().optional(),
  UNITBATCH_BACKOFF_BASE_MS: z.coerce.number().nonnegative().optional(),
  UNITBATCH_MAX_BACKOFF_MS: z.coerce.number().nonnegative().optional(),
  UNITBATCH_INTER_BATCH_DELAY_MS: z.coerce.number().nonnegative().optional(),
  /**
   * Pino level for the event logger.
   * @default 'info'
   */
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface EnvConfig {
  readonly executor: ExecutorConfigInput;
  readonly logLevel: LogLevel;
}

/**
 * Read executor settings from environment variables.
 * Empty strings count as unset.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid environment configuration: ${details}`, { cause: parsed.error });
  }

  const vars = parsed.data;
  const executor: ExecutorConfigInput = {
    batchSize: vars.UNITBATCH_BATCH_SIZE,
    maxConcurrency: vars.UNITBATCH_MAX_CONCURRENCY,
    maxRetries: vars.UNITBATCH_MAX_RETRIES,
    backoffBaseMs: vars.UNITBATCH_BACKOFF_BASE_MS,
    maxBackoffMs: vars.UNITBATCH_MAX_BACKOFF_MS,
    interBatchDelayMs: vars.UNITBATCH_INTER_BATCH_DELAY_MS,
  };
  return { executor, logLevel: vars.LOG_LEVEL };
}
