import { describe, it, expect } from 'vitest';
import { BatchExecutor } from '../../src/BatchExecutor.js';
import { BatchInfrastructureError, ConsistencyError } from '../../src/domain/errors.js';
import type { BatchFailedEvent, DomainEvent } from '../../src/domain/events/DomainEvents.js';

function range(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}

describe('Batch-level failure isolation', () => {
  it('should fail only the items of a batch whose dispatch raised', async () => {
    const called: number[] = [];
    const executor = new BatchExecutor(
      async (value: number) => {
        called.push(value);
        await Promise.resolve();
        return value + 100;
      },
      {
        batchSize: 4,
        maxRetries: 0,
        hooks: {
          beforeBatch: async (batch) => {
            await Promise.resolve();
            if (batch.index === 1) throw new Error('connection pool closed');
          },
        },
      },
    );
    const failedBatches: BatchFailedEvent[] = [];
    executor.on('batch:failed', (e) => failedBatches.push(e));

    const result = await executor.execute(range(20));

    expect(result.status).toBe('COMPLETED');
    expect(result.outcomes).toHaveLength(20);
    expect(called.sort((a, b) => a - b)).toEqual([...range(4), ...range(12).map((i) => i + 8)]);
    for (const outcome of result.outcomes) {
      if (outcome.index >= 4 && outcome.index < 8) {
        expect(outcome.status).toBe('failure');
        if (outcome.status !== 'failure') continue;
        expect(outcome.reason).toBe('batch_failed');
        expect(outcome.attempts).toBe(0);
        expect(outcome.error).toBeInstanceOf(BatchInfrastructureError);
        expect(outcome.error.message).toBe('Batch 1 failed: connection pool closed');
      } else {
        expect(outcome.status).toBe('success');
      }
    }
    expect(failedBatches).toHaveLength(1);
    expect(failedBatches[0]).toMatchObject({ batchIndex: 1, itemIds: [4, 5, 6, 7] });
    expect(result.summary).toMatchObject({ succeeded: 16, failed: 4, batchesFailed: 1 });
  });

  it('should keep outcomes of items that settled before the batch failed', async () => {
    const executor = new BatchExecutor(async (value: number) => Promise.resolve(value), {
      batchSize: 4,
      maxRetries: 0,
      hooks: {
        beforeUnit: async (item) => {
          await Promise.resolve();
          if (item.index === 6) throw new Error('worker crashed');
        },
      },
    });
    const failedBatches: BatchFailedEvent[] = [];
    executor.on('batch:failed', (e) => failedBatches.push(e));

    const result = await executor.execute(range(12));

    expect(result.outcomes.map((o) => o.status)).toEqual([
      'success',
      'success',
      'success',
      'success',
      'success',
      'success',
      'failure',
      'success',
      'success',
      'success',
      'success',
      'success',
    ]);
    expect(failedBatches[0]).toMatchObject({ batchIndex: 1, itemIds: [6], error: 'Batch 1 failed: worker crashed' });
  });

  it('should count a batch whose afterBatch hook throws without touching its outcomes', async () => {
    const executor = new BatchExecutor(async (value: number) => Promise.resolve(value), {
      batchSize: 2,
      hooks: {
        afterBatch: async (batch) => {
          await Promise.resolve();
          if (batch.index === 0) throw new Error('audit write failed');
        },
      },
    });
    const failedBatches: BatchFailedEvent[] = [];
    executor.on('batch:failed', (e) => failedBatches.push(e));

    const result = await executor.execute(range(4));

    expect(result.summary).toMatchObject({ succeeded: 4, failed: 0, batchesFailed: 1 });
    expect(failedBatches[0]?.itemIds).toEqual([]);
  });

  it('should still wait interBatchDelayMs after a failed batch', async () => {
    const events: DomainEvent[] = [];
    const executor = new BatchExecutor(async (value: number) => Promise.resolve(value), {
      batchSize: 2,
      interBatchDelayMs: 40,
      hooks: {
        beforeBatch: async (batch) => {
          await Promise.resolve();
          if (batch.index === 0) throw new Error('boom');
        },
      },
    });
    executor.onAny((e) => events.push(e));

    await executor.execute(range(4));

    const failedAt = events.find((e) => e.type === 'batch:failed')?.timestamp ?? 0;
    const nextStartedAt = events.find((e) => e.type === 'batch:started' && e.batchIndex === 1)?.timestamp ?? 0;
    expect(nextStartedAt - failedAt).toBeGreaterThanOrEqual(35);
  });

  it('should not let a throwing subscriber disturb the run', async () => {
    const executor = new BatchExecutor(async (value: number) => Promise.resolve(value), { batchSize: 2 });
    executor.on('unit:succeeded', () => {
      throw new Error('subscriber bug');
    });

    const result = await executor.execute(range(4));

    expect(result.summary).toMatchObject({ succeeded: 4, batchesFailed: 0 });
  });

  it('should abort the run on a consistency violation', async () => {
    const executor = new BatchExecutor(async (value: number) => Promise.resolve(value), {
      batchSize: 2,
      hooks: {
        beforeBatch: () => Promise.reject(new ConsistencyError('slot table corrupted')),
      },
    });
    const errors: string[] = [];
    executor.on('run:failed', (e) => errors.push(e.error));

    await expect(executor.execute(range(4))).rejects.toThrow('slot table corrupted');
    expect(executor.getStatus().status).toBe('FAILED');
    expect(errors).toEqual(['slot table corrupted']);
  });
});
