/**
 * Exchange Gate
 *
 * FIFO mutex. Waiters acquire in arrival order; ownership passes straight
 * from the releasing holder to the next waiter.
 */

export class Mutex {
  private locked = false;
  private readonly waiters: Array<(release: () => void) => void> = [];

  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Callers queued behind the current holder.
   */
  get waiting(): number {
    return this.waiters.length;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // still locked, transfer ownership
      next(this.createRelease());
      return;
    }
    this.locked = false;
  }
}
