/**
 * Keyed store whose entries expire a fixed time after their last write.
 *
 * `update()` is the only write path: it reads the live value, applies the
 * function and stores the result in one synchronous step, so concurrent
 * async callers in the same process can never interleave a read and a write.
 */

export interface TtlStoreOptions {
  /** Millisecond clock; defaults to Date.now. */
  now?: () => number;
}

interface Entry<V> {
  value: V;
  expiresAt: number;
}

export class TtlStore<V> {
  private entries = new Map<string, Entry<V>>();
  private readonly now: () => number;

  constructor(options: TtlStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  /**
   * Replace the value for `key` with `fn(current)`. Returning undefined
   * deletes the entry. The TTL restarts on every write.
   */
  update(key: string, ttlMs: number, fn: (current: V | undefined) => V | undefined): V | undefined {
    const next = fn(this.get(key));
    if (next === undefined) {
      this.entries.delete(key);
    } else {
      this.entries.set(key, { value: next, expiresAt: this.now() + ttlMs });
    }
    return next;
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  /** Drop every expired entry. */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
