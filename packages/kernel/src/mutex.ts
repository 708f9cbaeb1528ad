/**
 * FIFO mutual exclusion for async work.
 *
 * Render sessions run every render and every event dispatch through one
 * of these, so at most one of them touches a session's state at a time.
 *
 * @example
 * ```typescript
 * const lock = new Mutex();
 * const message = await lock.runExclusive(() => session.render());
 * ```
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Resolves with a release function once the lock is held.
   * Releasing twice is a no-op.
   */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = (): void => {
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.release();
        });
      };

      if (this.locked) {
        this.waiters.push(grant);
      } else {
        this.locked = true;
        grant();
      }
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // hand the lock straight to the next waiter
      next();
    } else {
      this.locked = false;
    }
  }
}
