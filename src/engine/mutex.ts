/**
 * FIFO exclusion lock. Waiters are woken in arrival order and the lock is
 * handed over directly, so a release never lets a newcomer jump the queue.
 */
export class Mutex {
  private locked = false;
  private waitQueue: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  get pending(): number {
    return this.waitQueue.length;
  }

  async acquire(): Promise<() => void> {
    if (this.locked) {
      await new Promise<void>((resolve) => {
        this.waitQueue.push(resolve);
      });
    } else {
      this.locked = true;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  async runExclusive<T>(fn: () => T | PromiseLike<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      // Lock stays held; ownership moves to the next waiter.
      next();
    } else {
      this.locked = false;
    }
  }
}
