/**
 * Async mutual exclusion for the event loop. Waiters are granted the lock in
 * the order they asked for it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private async acquire(): Promise<() => void> {
    let unlock: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      unlock = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => next);
    await previous;

    return unlock;
  }
}
