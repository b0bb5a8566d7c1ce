/**
 * Exclusive lock for async critical sections. Waiters are served in the
 * order they called `acquire`.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** True while a holder is inside the critical section or waiting for it. */
  get isLocked(): boolean {
    return this.pending > 0;
  }

  /** Resolves with the release function once the lock is held. */
  acquire(): Promise<() => void> {
    const prev = this.tail;
    let release: () => void = () => {};
    const next = new Promise<void>(resolve => {
      let released = false;
      release = () => {
        if (released) return;
        released = true;
        this.pending--;
        resolve();
      };
    });
    this.pending++;
    this.tail = prev.then(() => next);
    return prev.then(() => release);
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
