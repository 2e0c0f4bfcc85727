type Waiter = { mode: "read" | "write"; resolve: () => void };

/**
 * Async reader/writer lock. Readers share, writers are exclusive, and waiters are granted in
 * arrival order, so a queued writer blocks readers that arrive after it.
 */
export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly queue: Waiter[] = [];

  get readers(): number {
    return this.activeReaders;
  }

  get writing(): boolean {
    return this.writerActive;
  }

  get pending(): number {
    return this.queue.length;
  }

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.activeReaders -= 1;
      this.drain();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.writerActive = false;
      this.drain();
    }
  }

  private acquire(mode: Waiter["mode"]): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.grant(mode);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ mode, resolve });
    });
  }

  private canGrant(mode: Waiter["mode"]): boolean {
    if (this.writerActive) return false;
    return mode === "read" || this.activeReaders === 0;
  }

  private grant(mode: Waiter["mode"]): void {
    if (mode === "write") this.writerActive = true;
    else this.activeReaders += 1;
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!next || !this.canGrant(next.mode)) return;
      this.queue.shift();
      this.grant(next.mode);
      next.resolve();
      if (next.mode === "write") return;
    }
  }
}
