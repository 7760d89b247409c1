import { ConsistencyError } from '../domain/errors.js';

/** Proof of a held concurrency slot. Hand it back with `release()`. */
export interface Permit {
  readonly id: number;
}

/**
 * Counting semaphore bounding how many unit operations run at once.
 *
 * Slots are handed to waiters in FIFO order. `admit()` never rejects: under
 * backpressure it waits, and after `cancel()` it resolves `null`.
 */
export class ConcurrencyLimiter {
  private readonly outstanding = new Set<number>();
  private readonly waiters: Array<(permit: Permit | null) => void> = [];
  private nextId = 0;
  private cancelled = false;
  private peak = 0;

  constructor(readonly maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new ConsistencyError(`maxConcurrency must be a positive integer, got ${String(maxConcurrency)}`);
    }
  }

  /** Permits currently held. */
  get inFlight(): number {
    return this.outstanding.size;
  }

  /** Callers blocked in `admit()`. */
  get waiting(): number {
    return this.waiters.length;
  }

  /** Highest `inFlight` observed since construction. */
  get peakInFlight(): number {
    return this.peak;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Wait for a free slot. Resolves `null` if the limiter is (or becomes) cancelled. */
  admit(): Promise<Permit | null> {
    if (this.cancelled) return Promise.resolve(null);
    if (this.outstanding.size < this.maxConcurrency) {
      return Promise.resolve(this.grant());
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Return a slot. The oldest waiter, if any, receives it. */
  release(permit: Permit): void {
    if (!this.outstanding.delete(permit.id)) {
      throw new ConsistencyError(`Permit ${String(permit.id)} is not outstanding`);
    }

    const next = this.waiters.shift();
    if (next) next(this.grant());
  }

  /** Release every blocked `admit()` with `null` and refuse new admissions. Held permits stay valid. */
  cancel(): void {
    this.cancelled = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }

  private grant(): Permit {
    const permit: Permit = { id: this.nextId++ };
    this.outstanding.add(permit.id);
    this.peak = Math.max(this.peak, this.outstanding.size);
    return permit;
  }
}
