/**
 * Keyed Lock
 * 
 * Mutual exclusion per key. Work queued under one key runs strictly one
 * at a time and in arrival order; different keys never wait on each other.
 */

import pLimit from 'p-limit';

type Limit = ReturnType<typeof pLimit>;

interface LockEntry {
  limit: Limit;
  holders: number;
}

export class KeyedLock {
  private readonly entries = new Map<string, LockEntry>();

  /**
   * Run `fn` once every earlier task queued under `key` has settled
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { limit: pLimit(1), holders: 0 };
      this.entries.set(key, entry);
    }

    entry.holders++;
    try {
      return await entry.limit(fn);
    } finally {
      entry.holders--;
      if (entry.holders === 0) {
        this.entries.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.entries.has(key);
  }

  /** Number of keys with running or queued work */
  get size(): number {
    return this.entries.size;
  }
}
