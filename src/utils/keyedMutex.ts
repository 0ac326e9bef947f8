type Release = () => void;

class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  get idle() {
    return !this.locked && this.queue.length === 0;
  }

  async acquire(): Promise<Release> {
    return new Promise((resolve) => {
      let released = false;
      const release = () => {
        if (released) {
          return;
        }
        released = true;
        const next = this.queue.shift();
        if (next) {
          next();
          return;
        }
        this.locked = false;
      };

      if (!this.locked) {
        this.locked = true;
        resolve(release);
        return;
      }

      this.queue.push(() => {
        this.locked = true;
        resolve(release);
      });
    });
  }
}

/**
 * One mutex per key, created on first use and dropped once nobody holds or waits for it.
 * Not reentrant: calling runExclusive for a key from inside its own critical section deadlocks.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }
    const release = await mutex.acquire();
    try {
      return await fn();
    } finally {
      release();
      if (mutex.idle && this.locks.get(key) === mutex) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string) {
    const mutex = this.locks.get(key);
    return mutex !== undefined && !mutex.idle;
  }

  get size() {
    return this.locks.size;
  }
}
