/**
 * Per-key exclusive scopes built on promise chaining. Callers queue behind the current holder of a key
 * in arrival order. Not reentrant: a holder must not request a key it already owns.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Acquires `keys` one after another in the order given. Callers keep a single global order across scopes. */
  async withLocks<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    const ordered = Array.from(new Set(keys));
    const acquire = (index: number): Promise<T> => {
      if (index >= ordered.length) return fn();
      return this.withLock(ordered[index], () => acquire(index + 1));
    };
    return acquire(0);
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
