/**
 * Async mutex
 * queue-based single-owner lock; waiters are served in arrival order
 *
 * No timeout: a holder that never finishes keeps every waiter queued.
 */

interface QueuedWaiter {
  resolve: () => void;
  enqueueTime: number;
}

export class Mutex {
  private locked = false;
  private queue: QueuedWaiter[] = [];

  /**
   * resolves with the time spent waiting, in milliseconds
   */
  async acquire(): Promise<number> {
    // take the lock immediately if free
    if (!this.locked) {
      this.locked = true;
      return 0;
    }

    const enqueueTime = Date.now();
    await new Promise<void>((resolve) => {
      this.queue.push({ resolve, enqueueTime });
    });
    return Date.now() - enqueueTime;
  }

  release(): void {
    if (!this.locked) {
      throw new Error('Mutex released while not held');
    }

    // hand ownership straight to the next waiter so nobody can cut in
    const next = this.queue.shift();
    if (next) {
      next.resolve();
      return;
    }

    this.locked = false;
  }

  /**
   * run fn while holding the lock; the lock is released on success and failure
   */
  async runExclusive<T>(fn: (waitMs: number) => Promise<T>): Promise<T> {
    const waitMs = await this.acquire();
    try {
      return await fn(waitMs);
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  // for testing/observability
  getStats(): { locked: boolean; queued: number } {
    return {
      locked: this.locked,
      queued: this.queue.length,
    };
  }
}
