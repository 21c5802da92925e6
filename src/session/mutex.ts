/**
 * Promise-based mutual exclusion lock
 */

/**
 * FIFO async mutex
 *
 * Callers of `runExclusive` run one at a time in the order they called.
 * A failing callback releases the lock like a successful one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /**
   * Whether a callback is running or queued
   */
  get isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.holders++;

    await previous;
    try {
      return await fn();
    } finally {
      this.holders--;
      release();
    }
  }
}
