// Main entry point
export { BatchExecutor, executeBatches } from './BatchExecutor.js';
export type { BatchExecutorConfig } from './BatchExecutor.js';

// Configuration
export { executorConfigSchema, resolveExecutorConfig, backoffDelay } from './config/ExecutorConfig.js';
export type { ExecutorConfigInput, ResolvedExecutorConfig } from './config/ExecutorConfig.js';
export { envSchema, loadEnvConfig } from './config/env.js';
export type { EnvConfig, LogLevel } from './config/env.js';

// Domain model
export type { WorkItem } from './domain/model/WorkItem.js';
export { createWorkItems } from './domain/model/WorkItem.js';
export type { Batch } from './domain/model/Batch.js';
export { createBatch, batchItemIds } from './domain/model/Batch.js';
export type { UnitOutcome, UnitSuccess, UnitFailure } from './domain/model/UnitOutcome.js';
export { FailureReason, succeeded, failed, isSuccess, isFailure } from './domain/model/UnitOutcome.js';
export type { RunResult, RunSummary, RunProgress } from './domain/model/RunResult.js';
export { successes, failures } from './domain/model/RunResult.js';
export { RunStatus, canTransition, isTerminal } from './domain/model/RunStatus.js';

// Errors
export {
  UnitBatchError,
  TransientUnitError,
  ExhaustedRetriesError,
  BatchInfrastructureError,
  RunCancelledError,
  ConsistencyError,
  ConfigError,
  toError,
  errorMessage,
} from './domain/errors.js';

// Domain services
export { BatchSplitter } from './domain/services/BatchSplitter.js';

// Building blocks (for custom executors)
export { EventBus } from './application/EventBus.js';
export { ConcurrencyLimiter } from './application/ConcurrencyLimiter.js';
export type { Permit } from './application/ConcurrencyLimiter.js';
export { RetryingUnitRunner } from './application/RetryingUnitRunner.js';
export type { RetryingUnitRunnerOptions, RetryPredicate } from './application/RetryingUnitRunner.js';
export { ResultAggregator } from './application/ResultAggregator.js';
export { delay } from './application/delay.js';

// Use case result types
export type { RunStatusResult } from './application/usecases/GetRunStatus.js';

// Ports (for custom implementations)
export type { UnitOperation, UnitContext } from './domain/ports/UnitOperation.js';
export type { RunHooks, HookContext } from './domain/ports/RunHooks.js';
export type { ItemSource, ResultSink } from './domain/ports/ItemSource.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  RunStartedEvent,
  BatchStartedEvent,
  UnitSucceededEvent,
  UnitRetryEvent,
  UnitExhaustedEvent,
  BatchCompletedEvent,
  BatchFailedEvent,
  RunProgressEvent,
  RunCancelledEvent,
  RunCompletedEvent,
  RunFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure
export { createLogger, attachEventLogger } from './infrastructure/logging/eventLogger.js';
export type { CreateLoggerOptions, EventSource } from './infrastructure/logging/eventLogger.js';
