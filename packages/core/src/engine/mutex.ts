// packages/core/src/engine/mutex.ts — FIFO async mutual exclusion

/**
 * Single-holder lock with a FIFO wait queue. Holders must keep their
 * critical sections short and never await external I/O while holding it.
 */
export class Mutex {
  private queue: Array<() => void> = [];
  private held = false;

  get isLocked(): boolean {
    return this.held;
  }

  /** Resolves with a release function once the lock is held. */
  async acquire(): Promise<() => void> {
    if (!this.held) {
      this.held = true;
      return this.releaser();
    }
    return new Promise<() => void>((resolve) => {
      this.queue.push(() => resolve(this.releaser()));
    });
  }

  /** Run `fn` while holding the lock; the lock is released even if it throws. */
  async runExclusive<T>(fn: () => T): Promise<T> {
    const release = await this.acquire();
    try {
      return fn();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.held = false;
      }
    };
  }
}
