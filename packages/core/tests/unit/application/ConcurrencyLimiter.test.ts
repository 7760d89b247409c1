import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter } from '../../../src/application/ConcurrencyLimiter.js';
import type { Permit } from '../../../src/application/ConcurrencyLimiter.js';
import { ConsistencyError } from '../../../src/domain/errors.js';

function expectPermit(permit: Permit | null): Permit {
  if (!permit) throw new Error('expected a permit');
  return permit;
}

describe('ConcurrencyLimiter', () => {
  it('should admit immediately while slots are free', async () => {
    const limiter = new ConcurrencyLimiter(2);

    const a = await limiter.admit();
    const b = await limiter.admit();

    expect(a).not.toBeNull();
    expect(b).not.toBeNull();
    expect(limiter.inFlight).toBe(2);
    expect(limiter.waiting).toBe(0);
  });

  it('should suspend admit() until a permit is released', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const first = expectPermit(await limiter.admit());

    let admitted = false;
    const pending = limiter.admit().then((permit) => {
      admitted = true;
      return permit;
    });

    await Promise.resolve();
    expect(admitted).toBe(false);
    expect(limiter.waiting).toBe(1);

    limiter.release(first);
    const second = await pending;

    expect(admitted).toBe(true);
    expect(second).not.toBeNull();
    expect(limiter.inFlight).toBe(1);
  });

  it('should hand slots to waiters in FIFO order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const held = expectPermit(await limiter.admit());
    const order: string[] = [];

    const first = limiter.admit().then((p) => {
      order.push('first');
      return expectPermit(p);
    });
    const second = limiter.admit().then((p) => {
      order.push('second');
      return expectPermit(p);
    });

    limiter.release(held);
    limiter.release(await first);
    await second;

    expect(order).toEqual(['first', 'second']);
  });

  it('should never exceed maxConcurrency and track the peak', async () => {
    const limiter = new ConcurrencyLimiter(3);

    const task = async (): Promise<void> => {
      const permit = expectPermit(await limiter.admit());
      expect(limiter.inFlight).toBeLessThanOrEqual(3);
      await new Promise((resolve) => setTimeout(resolve, 5));
      limiter.release(permit);
    };

    await Promise.all(Array.from({ length: 10 }, () => task()));

    expect(limiter.peakInFlight).toBe(3);
    expect(limiter.inFlight).toBe(0);
  });

  it('should resolve blocked admit() calls with null on cancel()', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const held = expectPermit(await limiter.admit());

    const blocked = [limiter.admit(), limiter.admit()];
    limiter.cancel();

    expect(await Promise.all(blocked)).toEqual([null, null]);
    expect(limiter.waiting).toBe(0);
    expect(await limiter.admit()).toBeNull();

    // permits held before cancellation are still returned normally
    limiter.release(held);
    expect(limiter.inFlight).toBe(0);
  });

  it('should reject releasing a permit twice', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const permit = expectPermit(await limiter.admit());

    limiter.release(permit);

    expect(() => {
      limiter.release(permit);
    }).toThrow(ConsistencyError);
  });

  it('should reject a non-positive maxConcurrency', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(ConsistencyError);
  });
});
