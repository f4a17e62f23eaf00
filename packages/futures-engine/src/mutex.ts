/**
 * FIFO async lock. Callers queue in arrival order; a failing critical
 * section releases the lock like a successful one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  get locked(): boolean {
    return this.waiting > 0;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.waiting += 1;

    await previous;
    try {
      return await fn();
    } finally {
      this.waiting -= 1;
      release();
    }
  }
}
