import { pino } from 'pino';
import type { Logger, LevelWithSilent, DestinationStream } from 'pino';
import type { DomainEvent } from '../../domain/events/DomainEvents.js';

/** Anything that publishes domain events: a `BatchExecutor` or a bare `EventBus`. */
export interface EventSource {
  onAny(handler: (event: DomainEvent) => void): unknown;
  offAny(handler: (event: DomainEvent) => void): unknown;
}

export interface CreateLoggerOptions {
  /** @default 'info' */
  readonly level?: LevelWithSilent;
  /** @default 'unitbatch' */
  readonly name?: string;
  /** Write somewhere other than stdout (tests, files). */
  readonly destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pinoOptions = { name: options.name ?? 'unitbatch', level: options.level ?? 'info' };
  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

/**
 * Log every event published by `source`.
 *
 * Retries are warnings, exhausted items and failed batches are errors, run
 * lifecycle is info, batch progress is debug and unit successes are trace.
 * Returns a function that detaches the logger.
 */
export function attachEventLogger(source: EventSource, logger: Logger): () => void {
  const handler = (event: DomainEvent): void => {
    logEvent(logger, event);
  };
  source.onAny(handler);
  return () => {
    source.offAny(handler);
  };
}

function logEvent(logger: Logger, event: DomainEvent): void {
  switch (event.type) {
    case 'run:started':
      logger.info(
        { runId: event.runId, totalItems: event.totalItems, totalBatches: event.totalBatches },
        'run started',
      );
      break;
    case 'batch:started':
      logger.debug({ runId: event.runId, batchIndex: event.batchIndex, size: event.itemIds.length }, 'batch started');
      break;
    case 'unit:succeeded':
      logger.trace({ runId: event.runId, itemId: event.itemId, attempts: event.attempts }, 'unit succeeded');
      break;
    case 'unit:retry':
      logger.warn(
        {
          runId: event.runId,
          itemId: event.itemId,
          attempt: event.attempt,
          maxRetries: event.maxRetries,
          delayMs: event.delayMs,
          err: event.error,
        },
        'unit attempt failed, retrying',
      );
      break;
    case 'unit:exhausted':
      logger.error(
        { runId: event.runId, itemId: event.itemId, attempts: event.attempts, err: event.error },
        'unit failed permanently',
      );
      break;
    case 'batch:completed':
      logger.debug(
        { runId: event.runId, batchIndex: event.batchIndex, succeeded: event.succeeded, failed: event.failed },
        'batch completed',
      );
      break;
    case 'batch:failed':
      logger.error(
        { runId: event.runId, batchIndex: event.batchIndex, itemIds: event.itemIds, err: event.error },
        'batch failed',
      );
      break;
    case 'run:progress':
      logger.debug({ runId: event.runId, ...event.progress }, 'run progress');
      break;
    case 'run:cancelled':
      logger.warn({ runId: event.runId, reason: event.reason, ...event.progress }, 'run cancelled');
      break;
    case 'run:completed':
      logger.info(
        { runId: event.runId, total: event.total, succeeded: event.succeeded, failed: event.failed },
        'run completed',
      );
      break;
    case 'run:failed':
      logger.fatal({ runId: event.runId, err: event.error }, 'run failed');
      break;
  }
}
