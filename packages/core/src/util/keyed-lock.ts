/**
 * Keyed Lock
 * ==========
 *
 * Promise-based mutual exclusion scoped to a key. Waiters are served
 * in FIFO order per key. Multi-key acquisition always takes keys in
 * ascending order, so two callers can never hold-and-wait in a cycle.
 */

type Release = () => void;

export class KeyedLock<K extends string | number> {
  private held = new Set<K>();
  private waiters = new Map<K, Array<() => void>>();

  /**
   * Acquire a single key
   */
  async acquire(key: K): Promise<Release> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return () => this.release(key);
    }

    return new Promise((resolve) => {
      const queue = this.waiters.get(key) ?? [];
      queue.push(() => resolve(() => this.release(key)));
      this.waiters.set(key, queue);
    });
  }

  /**
   * Acquire several keys in ascending order
   */
  async acquireAll(keys: Iterable<K>): Promise<Release> {
    const ordered = Array.from(new Set(keys)).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    const releases: Release[] = [];
    for (const key of ordered) {
      releases.push(await this.acquire(key));
    }
    return () => {
      for (const release of releases.reverse()) {
        release();
      }
    };
  }

  /**
   * Run fn while holding the key
   */
  async run<T>(key: K, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isHeld(key: K): boolean {
    return this.held.has(key);
  }

  get size(): number {
    return this.held.size;
  }

  private release(key: K): void {
    const queue = this.waiters.get(key);
    const next = queue?.shift();
    if (queue && queue.length === 0) {
      this.waiters.delete(key);
    }
    if (next) {
      // Ownership passes straight to the next waiter
      next();
      return;
    }
    this.held.delete(key);
  }
}
