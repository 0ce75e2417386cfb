/**
 * Promise-based reader/writer lock.
 *
 * Readers share the lock; a writer holds it alone. A waiting writer blocks readers that arrive after it.
 * Waiters are admitted on a later macrotask than the release that freed the lock, so the continuation of
 * the task that released (for example the caller awaiting a signature) runs against the state it used.
 */
export class ReadWriteLock {
  #readers = 0;
  #writing = false;
  #dispatchScheduled = false;
  readonly #waitingReaders: Array<() => void> = [];
  readonly #waitingWriters: Array<() => void> = [];

  async read<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.#acquireRead();
    try {
      return await fn();
    } finally {
      this.#readers--;
      this.#scheduleDispatch();
    }
  }

  async write<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.#acquireWrite();
    try {
      return await fn();
    } finally {
      this.#writing = false;
      this.#scheduleDispatch();
    }
  }

  get readers(): number {
    return this.#readers;
  }

  get writing(): boolean {
    return this.#writing;
  }

  #acquireRead(): Promise<void> {
    if (!this.#writing && this.#waitingWriters.length === 0) {
      this.#readers++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.#waitingReaders.push(() => {
        this.#readers++;
        resolve();
      });
    });
  }

  #acquireWrite(): Promise<void> {
    if (!this.#writing && this.#readers === 0 && this.#waitingWriters.length === 0 && !this.#dispatchScheduled) {
      this.#writing = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.#waitingWriters.push(() => {
        this.#writing = true;
        resolve();
      });
    });
  }

  #scheduleDispatch(): void {
    if (this.#dispatchScheduled || this.#writing || this.#readers > 0) {
      return;
    }
    if (this.#waitingWriters.length === 0 && this.#waitingReaders.length === 0) {
      return;
    }
    this.#dispatchScheduled = true;
    setImmediate(() => {
      this.#dispatchScheduled = false;
      this.#dispatch();
    });
  }

  #dispatch(): void {
    if (this.#writing || this.#readers > 0) {
      return;
    }
    const writer = this.#waitingWriters.shift();
    if (writer) {
      writer();
      return;
    }
    for (const reader of this.#waitingReaders.splice(0)) {
      reader();
    }
  }
}
