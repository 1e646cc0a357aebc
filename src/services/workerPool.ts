/**
 * Fixed-size admission gate for asynchronous tasks. At most `size` tasks run at once; the rest wait
 * in FIFO order and are started as running tasks settle.
 */
export class WorkerPool {
  private running = 0;
  private highWater = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, received ${size}.`);
    }
  }

  /** Tasks currently holding a slot. */
  get active(): number {
    return this.running;
  }

  /** Tasks waiting for a slot. */
  get pending(): number {
    return this.waiting.length;
  }

  /** Largest number of tasks that ever held a slot at the same time. */
  get highWaterMark(): number {
    return this.highWater;
  }

  /**
   * Runs `task` once a slot is free and releases the slot when it settles, whether it resolves or
   * rejects.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.running < this.size) {
      this.running += 1;
      this.highWater = Math.max(this.highWater, this.running);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // the slot passes straight to the next task; the running count is unchanged
      next();
      return;
    }
    this.running -= 1;
  }
}
