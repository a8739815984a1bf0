/**
 * @petledger/ledger — Per-key mutual exclusion.
 *
 * Serializes work per key while letting work on disjoint keys run
 * concurrently. Multi-key acquisition takes keys in sorted order, so two
 * callers locking overlapping key sets cannot deadlock.
 */

export class KeyedMutex {
  /** Tail of the wait queue for each held key */
  private readonly _tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` while holding every key in `keys`.
   * Duplicate keys are locked once.
   */
  async runExclusive<T>(keys: readonly string[], fn: () => T | Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: (() => void)[] = [];

    try {
      for (const key of ordered) {
        releases.push(await this._acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  isLocked(key: string): boolean {
    return this._tails.has(key);
  }

  /** Number of keys currently held or waited on. */
  get size(): number {
    return this._tails.size;
  }

  private async _acquire(key: string): Promise<() => void> {
    const previous = this._tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });

    const tail = previous.then(() => held);
    this._tails.set(key, tail);

    await previous;

    return () => {
      unlock();
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    };
  }
}
