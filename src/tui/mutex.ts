/**
 * Async Mutex
 *
 * Serializes access to the terminal between the foreground input loop and
 * any nested modal or prompt loop. Waiters are granted the lock in FIFO order.
 *
 * Not reentrant: a holder that needs to call back into a locked operation
 * passes an explicit "lock already held" option instead of re-acquiring.
 */

/** Releases a previously acquired lock. Calling it twice is a no-op. */
export type Release = () => void;

export class Mutex {
  private locked: boolean = false;
  private waiters: Array<(release: Release) => void> = [];

  /**
   * Wait for the lock.
   *
   * @returns A release function that must be called exactly once
   */
  acquire(): Promise<Release> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<Release>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Run `fn` while holding the lock, releasing it however `fn` settles.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Whether the lock is currently held. */
  get isLocked(): boolean {
    return this.locked;
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Hand over directly; the lock stays held
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
