/**
 * Bounded async queue feeding the dispatch workers.
 *
 * Producers never wait: `offer` returns false when the queue is full. A
 * caller may offer against a higher limit to use headroom above capacity.
 * Consumers await `take`, which resolves undefined once the queue is closed.
 */
export class DispatchQueue<T> {
  private items: T[] = [];
  private resolvers: ((value: T | undefined) => void)[] = [];
  private closed = false;

  constructor(readonly capacity: number = 256) {}

  offer(item: T, limit: number = this.capacity): boolean {
    if (this.closed) return false;

    const resolve = this.resolvers.shift();
    if (resolve) {
      resolve(item);
      return true;
    }

    if (this.items.length >= limit) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  take(): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise(resolve => {
      this.resolvers.push(resolve);
    });
  }

  /**
   * Stop accepting work and wake idle consumers. Queued items still drain.
   */
  close(): void {
    this.closed = true;
    for (const resolve of this.resolvers.splice(0)) {
      resolve(undefined);
    }
  }

  reopen(): void {
    this.closed = false;
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
