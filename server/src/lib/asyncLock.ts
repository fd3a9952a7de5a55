/**
 * FIFO mutual-exclusion lock for async critical sections.
 *
 * `run(fn)` starts `fn` only after every earlier caller's `fn` has settled, so
 * callers observe each other's effects in acquisition order. A rejection from
 * `fn` is propagated to its caller and still releases the lock.
 */
export class AsyncLock {
  private queue: Array<() => void> = [];
  private locked = false;

  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get pending(): number {
    return this.queue.length;
  }

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // ownership passes straight to the next waiter
      next();
    } else {
      this.locked = false;
    }
  }
}
