type Release = () => void;

interface Waiter {
  mode: 'read' | 'write';
  grant: () => void;
}

/**
 * Reader/writer exclusion for async callers.
 *
 * Any number of readers may hold the lock together. A writer waits for the
 * active readers to finish and holds the lock alone. Waiters are served in
 * arrival order, so a queued writer holds back readers that arrive after it.
 */
export class ConnectionLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  async read<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire('read');
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async write<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire('write');
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  private acquire(mode: 'read' | 'write'): Promise<Release> {
    return new Promise<Release>((resolve) => {
      this.queue.push({ mode, grant: () => resolve(this.releaser(mode)) });
      this.dispatch();
    });
  }

  private releaser(mode: 'read' | 'write'): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      if (mode === 'read') {
        this.readers--;
      } else {
        this.writing = false;
      }
      this.dispatch();
    };
  }

  private dispatch(): void {
    while (this.queue.length > 0 && !this.writing) {
      const next = this.queue[0];
      if (next.mode === 'read') {
        this.readers++;
      } else if (this.readers === 0) {
        this.writing = true;
      } else {
        return;
      }
      this.queue.shift();
      next.grant();
    }
  }
}
