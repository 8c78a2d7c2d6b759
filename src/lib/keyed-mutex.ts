import { Mutex } from 'async-mutex';

/**
 * Per-key mutexes: operations on different keys run in parallel, operations
 * on the same key are serialized.
 */
export class KeyedMutex {
  private mutexes = new Map<string, Mutex>();

  get(key: string): Mutex {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }
    return mutex;
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const mutex = this.get(key);
    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.isLocked()) {
        this.mutexes.delete(key);
      }
    }
  }

  size(): number {
    return this.mutexes.size;
  }
}
