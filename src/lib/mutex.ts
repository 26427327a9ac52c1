/**
 * Async Mutex
 *
 * Queues callers so only one critical section runs at a time.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Acquire the lock and return its release function
   */
  async acquire(): Promise<() => void> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
    };
  }

  /**
   * Run `fn` while holding the lock
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
