/**
 * Serializes whole pipeline runs: a second caller waits for the first to
 * finish instead of running alongside it.
 */
export class BatchLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  get pending(): number {
    return this.waiting;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.waiting++;
    await previous;
    try {
      return await fn();
    } finally {
      this.waiting--;
      release();
    }
  }
}

/** One per process. */
export const pipelineLock = new BatchLock();
