/**
 * Promise-chain mutex.
 *
 * Used as the token cache's acquisition lock and as the single serialized
 * writer that funnels per-item database writes from the concurrent
 * validators. Callers run strictly one at a time, in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Number of callers holding or waiting for the lock */
  get queued(): number {
    return this.pending;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }
}
