// Concurrency gate for image generation fan-out
// Bounds in-flight provider calls per request so cost and rate limits stay predictable

/**
 * Counting semaphore. Waiters are released in FIFO order.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  get availablePermits(): number {
    return this.available;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Permit handed straight to the next waiter
      next();
    } else {
      this.available++;
    }
  }

  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/**
 * Maps `items` through `task` with at most `limit` calls in flight.
 * Results keep input order; the first rejection rejects the whole call
 * once every started task has settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const semaphore = new Semaphore(limit);
  const settled = await Promise.allSettled(items.map((item, index) => semaphore.use(() => task(item, index))));

  const results: R[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'rejected') throw outcome.reason;
    results.push(outcome.value);
  }
  return results;
}
