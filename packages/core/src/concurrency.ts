/**
 * Concurrency primitives for the probe pool and per-target lanes
 */

import type { Clock } from './types.js';

/**
 * Counting semaphore; waiters are served in FIFO order
 */
export class Semaphore {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  get size(): number {
    return this.capacity;
  }

  /** Permits currently held */
  get inUse(): number {
    return this.capacity - this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Permit passes straight to the next waiter
      next();
      return;
    }
    if (this.available < this.capacity) {
      this.available++;
    }
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Mutex per key. Work for one key runs in submission order; different keys run independently.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();
  private holders = new Map<string, number>();

  isLocked(key: string): boolean {
    return (this.holders.get(key) ?? 0) > 0;
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let releaseLane: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseLane = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    this.holders.set(key, (this.holders.get(key) ?? 0) + 1);

    try {
      await previous;
      return await fn();
    } finally {
      releaseLane();
      const remaining = (this.holders.get(key) ?? 1) - 1;
      if (remaining === 0) {
        this.holders.delete(key);
      } else {
        this.holders.set(key, remaining);
      }
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

/**
 * Wall clock plus `performance.now()` for intervals and cooldowns
 */
export const systemClock: Clock = {
  monotonic: () => performance.now(),
  now: () => new Date(),
};
