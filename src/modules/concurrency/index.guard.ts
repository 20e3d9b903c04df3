/**
 * Read-many / write-exclusive section around the retrieval indexes.
 *
 * Queries enter through `read`, an index rebuild through `exclusive`.
 * A waiting rebuild blocks new readers so it cannot starve; readers that
 * arrive during the rebuild wait for it and then see the rebuilt index.
 */
export class IndexGuard {
  private readers = 0;
  private writing = false;
  private waitingWriters = 0;
  private readQueue: Array<() => void> = [];
  private writeQueue: Array<() => void> = [];

  async read<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  private acquireRead(): Promise<void> {
    if (!this.writing && this.waitingWriters === 0) {
      this.readers++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.readQueue.push(() => {
        this.readers++;
        resolve();
      });
    });
  }

  private releaseRead(): void {
    this.readers--;
    this.processQueue();
  }

  private acquireWrite(): Promise<void> {
    if (!this.writing && this.readers === 0) {
      this.writing = true;
      return Promise.resolve();
    }
    this.waitingWriters++;
    return new Promise<void>((resolve) => {
      this.writeQueue.push(() => {
        this.waitingWriters--;
        this.writing = true;
        resolve();
      });
    });
  }

  private releaseWrite(): void {
    this.writing = false;
    this.processQueue();
  }

  private processQueue(): void {
    if (this.writing) return;

    if (this.writeQueue.length > 0) {
      if (this.readers === 0) {
        const next = this.writeQueue.shift();
        if (next) next();
      }
      return;
    }

    const pending = this.readQueue;
    this.readQueue = [];
    for (const grant of pending) grant();
  }
}
