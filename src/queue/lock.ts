type LockMode = "read" | "write";

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

/**
 * Async read/write lock with FIFO admission. Readers share the lock, a writer
 * holds it alone, and a reader that arrives behind a waiting writer waits too.
 */
export class ReadWriteLock {
  private activeReaders = 0;
  private writing = false;
  private readonly waiters: Waiter[] = [];

  async withRead<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await task();
    } finally {
      this.release("read");
    }
  }

  async withWrite<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await task();
    } finally {
      this.release("write");
    }
  }

  get pendingCount(): number {
    return this.waiters.length;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  get readerCount(): number {
    return this.activeReaders;
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push({
        mode,
        grant: () => {
          this.take(mode);
          resolve();
        }
      });
    });
  }

  private canGrant(mode: LockMode): boolean {
    if (mode === "read") {
      return !this.writing;
    }
    return !this.writing && this.activeReaders === 0;
  }

  private take(mode: LockMode): void {
    if (mode === "read") {
      this.activeReaders += 1;
    } else {
      this.writing = true;
    }
  }

  private release(mode: LockMode): void {
    if (mode === "read") {
      this.activeReaders -= 1;
    } else {
      this.writing = false;
    }
    this.dispatch();
  }

  private dispatch(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!next || !this.canGrant(next.mode)) {
        return;
      }
      this.waiters.shift();
      next.grant();
      if (next.mode === "write") {
        return;
      }
    }
  }
}
