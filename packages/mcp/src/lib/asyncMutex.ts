// async mutex
// - serialize async work (index refresh + save)
// - a failed holder still releases the lock for the next waiter

export type ExclusiveLock = {
  runExclusive<T>(fn: () => Promise<T>): Promise<T>;
};

export class AsyncMutex implements ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const prev = this.tail;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await prev;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
