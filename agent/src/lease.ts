/**
 * Lease: FIFO mutual exclusion around a shared agent.
 */
export class Lease {
  private held = false;
  private readonly waiters: Array<() => void> = [];

  /**
   * Acquire the lease. Returns a release function; calling it more than once
   * has no effect. Waiters are served in arrival order.
   */
  async acquire(): Promise<() => void> {
    if (this.held) {
      // Ownership is handed over directly by the previous holder.
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    } else {
      this.held = true;
    }

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.held = false;
      }
    };
  }

  /** Run `task` while holding the lease. */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  get isHeld(): boolean {
    return this.held;
  }

  get pending(): number {
    return this.waiters.length;
  }
}
