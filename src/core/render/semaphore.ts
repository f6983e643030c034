// src/core/render/semaphore.ts

/**
 * Counting semaphore bounding how many render tasks run at once.
 * Waiters are released in FIFO order.
 */
export class Semaphore {
  private readonly permits: number;
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.permits = permits;
    this.available = permits;
  }

  get capacity(): number {
    return this.permits;
  }

  get inFlight(): number {
    return this.permits - this.available;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    return new Promise<void>((resolve) => {
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
    this.available = Math.min(this.permits, this.available + 1);
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
