/**
 * Bounded worker pool.
 *
 * At most `size` tasks run at once; further tasks wait in FIFO order for
 * a free slot. A pool can be shared by several concurrent runs, which
 * then compete for the same slots.
 */

export class WorkerPool {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(public readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  /**
   * Run `task` once a slot is free. The slot is released when the task's
   * promise settles.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Tasks currently holding a slot. */
  get activeCount(): number {
    return this.active;
  }

  /** Tasks waiting for a slot. */
  get pendingCount(): number {
    return this.waiting.length;
  }

  private acquire(): Promise<void> {
    if (this.active < this.size) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // The slot passes straight to the next task; `active` is unchanged.
      next();
    } else {
      this.active--;
    }
  }
}
