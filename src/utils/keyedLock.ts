/**
 * In-process serialization locks keyed by string.
 *
 * Each key holds the tail of a promise chain; acquiring waits for the tail and
 * appends a new link that resolves on release.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Acquire several keys in sorted order (deadlock-free across callers)
   */
  async acquireAll(keys: Iterable<string>): Promise<() => void> {
    const ordered = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];
    for (const key of ordered) {
      releases.push(await this.acquire(key));
    }
    return () => {
      for (const release of releases.reverse()) {
        release();
      }
    };
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

/**
 * Locks taken during one unit of work and released together when it ends
 */
export class LockScope {
  private releases: Array<() => void> = [];
  private held = new Set<string>();

  constructor(private readonly lock: KeyedLock) {}

  /**
   * Acquire the keys not already held by this scope, in sorted order
   */
  async hold(keys: Iterable<string>): Promise<void> {
    const missing = [...new Set(keys)].filter((key) => !this.held.has(key));
    if (missing.length === 0) return;
    this.releases.push(await this.lock.acquireAll(missing));
    for (const key of missing) {
      this.held.add(key);
    }
  }

  releaseAll(): void {
    for (const release of this.releases.reverse()) {
      release();
    }
    this.releases = [];
    this.held.clear();
  }
}
