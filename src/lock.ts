/**
 * Many-readers / one-writer lock with FIFO hand-off. A queued writer blocks
 * readers that arrive after it, so a steady stream of queries cannot starve
 * an index update.
 */
export class RwLock {
  private readers = 0;
  private writer = false;
  private readonly queue: { write: boolean; resolve: () => void }[] = [];

  /** Run `fn` while holding the shared side. */
  public async read<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire(false);
    try {
      return await fn();
    } finally {
      this.release(false);
    }
  }

  /** Run `fn` while holding the exclusive side. */
  public async write<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire(true);
    try {
      return await fn();
    } finally {
      this.release(true);
    }
  }

  private canGrant(write: boolean): boolean {
    return write ? !this.writer && this.readers === 0 : !this.writer;
  }

  private grant(write: boolean): void {
    if (write) this.writer = true;
    else this.readers++;
  }

  private acquire(write: boolean): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(write)) {
      this.grant(write);
      return Promise.resolve();
    }
    return new Promise((resolve) => this.queue.push({ write, resolve }));
  }

  private release(write: boolean): void {
    if (write) this.writer = false;
    else this.readers--;
    for (;;) {
      const next = this.queue[0];
      if (!next || !this.canGrant(next.write)) break;
      this.queue.shift();
      this.grant(next.write);
      next.resolve();
    }
  }
}
