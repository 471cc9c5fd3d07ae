/**
 * Concurrency utilities for bounded parallelism.
 *
 * Keeps external calls and file work within configured limits. Both helpers
 * take an AbortSignal: once it fires no new work is started.
 */

import { CancelledError } from "./errors.js";

export interface ConcurrencyOptions {
  signal?: AbortSignal;
  /** Called instead of `fn` for items not started before the signal fired */
  onCancelled?: (index: number) => void;
}

/**
 * Map over items with bounded concurrency.
 *
 * @param items - Items to process
 * @param concurrency - Maximum concurrent operations
 * @param fn - Async function to apply to each item
 * @returns Results in the same order as inputs; items skipped after
 *   cancellation are left out
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
  options: ConcurrencyOptions = {}
): Promise<R[]> {
  const results = new Map<number, R>();
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      if (options.signal?.aborted) {
        options.onCancelled?.(index);
        continue;
      }
      const item = items[index];
      if (item !== undefined) {
        results.set(index, await fn(item, index));
      }
    }
  }

  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    () => worker()
  );

  await Promise.all(workers);
  return [...results.entries()].sort(([a], [b]) => a - b).map(([, value]) => value);
}

/**
 * A simple semaphore for limiting concurrent operations.
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = permits;
  }

  /**
   * Wait for a permit. A waiter whose signal fires is removed from the queue
   * and rejected with CancelledError.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const grant = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      const onAbort = () => {
        this.waiting = this.waiting.filter((w) => w !== grant);
        reject(new CancelledError());
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiting.push(grant);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }

  /**
   * Execute a function with a permit.
   */
  async withPermit<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /** Permits currently free. */
  get available(): number {
    return this.permits;
  }
}
