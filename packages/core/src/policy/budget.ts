/**
 * Resource Budget
 * ===============
 *
 * Process-wide counter for automated response capacity. Dispatching an
 * action consumes its cost; a fixed-interval timer tops the counter back
 * up. The counter never goes negative.
 */

import { logger } from '../util/logger.js';

export class ResourceBudget {
  private _available: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private listeners: Array<(available: number) => void> = [];

  constructor(
    readonly capacity: number,
    private replenishAmount: number = capacity,
    private intervalMs = 60_000
  ) {
    this._available = capacity;
  }

  get available(): number {
    return this._available;
  }

  get exhausted(): boolean {
    return this._available <= 0;
  }

  canAfford(cost: number): boolean {
    return cost <= 0 || cost <= this._available;
  }

  /**
   * Consume cost if it fits; all or nothing
   */
  tryConsume(cost: number): boolean {
    if (cost <= 0) return true;
    if (cost > this._available) return false;
    this._available -= cost;
    return true;
  }

  /**
   * Give back what a refused dispatch consumed, bounded by capacity
   */
  refund(cost: number): number {
    this._available = Math.min(this.capacity, this._available + Math.max(0, cost));
    return this._available;
  }

  /**
   * Top up, bounded by capacity
   */
  replenish(amount = this.replenishAmount): number {
    const before = this._available;
    this._available = Math.min(this.capacity, this._available + Math.max(0, amount));
    if (this._available !== before) {
      for (const listener of this.listeners) {
        listener(this._available);
      }
    }
    return this._available;
  }

  onReplenish(listener: (available: number) => void): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      const available = this.replenish();
      logger.debug('resource budget replenished', { available });
    }, this.intervalMs);
    this.timer.unref?.();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
