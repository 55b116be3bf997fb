/** Serializes async sections: each `run` starts after the previous one settles. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.tail;

    let release!: () => void;
    this.tail = new Promise<void>(r => { release = r; });

    await prev;

    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * Cached time of the most recent backup.
 *
 * The first `get` asks the loader (a scan of backup names); afterwards the value
 * only changes through `set`, until `invalidate` forces the next `get` to rescan.
 * Check-then-act sequences go through `locked` so concurrent callers see each
 * other's `set`.
 */
export class BackupClock {
  private last: Date | null = null;
  private loaded = false;
  private mutex = new Mutex();

  constructor(private load: () => Promise<Date | null>) {}

  async get(): Promise<Date | null> {
    if (!this.loaded) {
      this.last = await this.load();
      this.loaded = true;
    }
    return this.last;
  }

  set(time: Date): void {
    this.last = time;
    this.loaded = true;
  }

  invalidate(): void {
    this.last = null;
    this.loaded = false;
  }

  locked<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.run(fn);
  }
}
