interface Waiter {
  exclusive: boolean;
  grant: () => void;
}

/**
 * Async read/write lock with FIFO fairness: a queued writer holds back
 * readers that arrive after it. Not reentrant.
 */
export class RwLock {
  private readers = 0;
  private writer = false;
  private queue: Waiter[] = [];

  /** Run fn while holding the shared lock */
  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(false);
    try {
      return await fn();
    } finally {
      this.release(false);
    }
  }

  /** Run fn while holding the exclusive lock */
  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(true);
    try {
      return await fn();
    } finally {
      this.release(true);
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  private acquire(exclusive: boolean): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(exclusive)) {
      this.take(exclusive);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ exclusive, grant: resolve });
    });
  }

  private canGrant(exclusive: boolean): boolean {
    return exclusive ? !this.writer && this.readers === 0 : !this.writer;
  }

  private take(exclusive: boolean): void {
    if (exclusive) {
      this.writer = true;
    } else {
      this.readers++;
    }
  }

  private release(exclusive: boolean): void {
    if (exclusive) {
      this.writer = false;
    } else {
      this.readers--;
    }

    let next = this.queue[0];
    while (next && this.canGrant(next.exclusive)) {
      this.queue.shift();
      this.take(next.exclusive);
      next.grant();
      if (next.exclusive) break;
      next = this.queue[0];
    }
  }
}
