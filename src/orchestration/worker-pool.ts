/**
 * Counting semaphore that bounds how many plugin operations run at once.
 */
export class WorkerPool {
  private current = 0;
  private queue: (() => void)[] = [];

  constructor(private max: number) {
    if (!Number.isInteger(max) || max < 1) throw new Error('WorkerPool concurrency must be an integer >= 1');
  }

  get available(): number {
    return this.max - this.current;
  }

  get waiting(): number {
    return this.queue.length;
  }

  private async acquire(): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // slot passes straight to the next waiter
      next();
    } else {
      this.current--;
    }
  }

  async withSlot<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /** Run fn over every item with bounded concurrency; results keep input order. */
  async map<I, O>(items: readonly I[], fn: (item: I, index: number) => Promise<O>): Promise<O[]> {
    return Promise.all(items.map((item, index) => this.withSlot(() => fn(item, index))));
  }
}
