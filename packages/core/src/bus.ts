/**
 * Signal Bus
 * ==========
 *
 * Validates, normalizes and buffers sensor signals, then delivers them
 * to subscribers in arrival order per source entity. Each entity has a
 * bounded buffer: on overflow the oldest unconsumed signal of that entity
 * is dropped and reported, never lost silently.
 */

import { z } from 'zod';
import {
  EntityId,
  IngestRejection,
  IngestResult,
  Signal,
  SignalDropped,
  DefenseConfig,
  DEFAULT_CONFIG,
} from './types/index.js';
import { nowMs } from './util/hash.js';
import { logger } from './util/logger.js';

const AttributeValueZ = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

export const SignalZ = z.object({
  id: z.string().min(1),
  sourceEntity: z.string().trim().min(1),
  kind: z.string().min(1),
  timestamp: z.number().finite(),
  attributes: z.record(AttributeValueZ).default({}),
  confidence: z.number().min(0).max(1),
});

const IP_ATTRIBUTES = ['source_ip', 'dest_ip'];

export type SignalSubscriber = (signal: Signal) => void | Promise<void>;

export interface SignalBusCallbacks {
  onAccepted?: (signal: Signal) => void;
  onRejected?: (input: unknown, reason: IngestRejection, detail: string) => void;
  onDropped?: (event: SignalDropped) => void;
}

export interface SignalBusStats {
  accepted: number;
  duplicate: number;
  malformed: number;
  dropped: number;
  delivered: number;
  pending: number;
}

/**
 * Parse and normalize a raw sensor record
 */
export function parseSignal(input: unknown): { ok: true; signal: Signal } | { ok: false; detail: string } {
  const parsed = SignalZ.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, detail };
  }

  const attributes = { ...parsed.data.attributes };
  for (const key of IP_ATTRIBUTES) {
    if (attributes[key] === 'localhost') {
      attributes[key] = '127.0.0.1';
    }
  }

  const signal: Signal = Object.freeze({
    id: parsed.data.id,
    sourceEntity: parsed.data.sourceEntity,
    kind: parsed.data.kind,
    timestamp: parsed.data.timestamp,
    attributes: Object.freeze(attributes),
    confidence: parsed.data.confidence,
  });
  return { ok: true, signal };
}

export class SignalBus {
  private seen = new Set<string>();
  private pending = new Map<EntityId, Signal[]>();
  private drains = new Map<EntityId, Promise<void>>();
  private subscribers: SignalSubscriber[] = [];
  private callbacks: SignalBusCallbacks = {};
  private config: DefenseConfig;
  private autoDeliver = false;
  private stats = { accepted: 0, duplicate: 0, malformed: 0, dropped: 0, delivered: 0 };

  constructor(config: Partial<DefenseConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Set callbacks
   */
  setCallbacks(callbacks: SignalBusCallbacks): void {
    this.callbacks = { ...this.callbacks, ...callbacks };
  }

  /**
   * Register a consumer; returns an unsubscribe function
   */
  subscribe(subscriber: SignalSubscriber): () => void {
    this.subscribers.push(subscriber);
    return () => {
      this.subscribers = this.subscribers.filter(s => s !== subscriber);
    };
  }

  /**
   * Deliver automatically as signals arrive
   */
  start(): void {
    if (this.autoDeliver) return;
    this.autoDeliver = true;
    for (const entity of this.pending.keys()) {
      void this.drainEntity(entity);
    }
  }

  stop(): void {
    this.autoDeliver = false;
  }

  /**
   * Accept or reject one signal
   */
  ingest(input: unknown): IngestResult {
    const parsed = parseSignal(input);
    if (!parsed.ok) {
      this.stats.malformed++;
      this.callbacks.onRejected?.(input, 'MalformedSignal', parsed.detail);
      return { accepted: false, reason: 'MalformedSignal', detail: parsed.detail };
    }

    const signal = parsed.signal;
    if (this.seen.has(signal.id)) {
      const detail = `Signal ${signal.id} already ingested`;
      this.stats.duplicate++;
      this.callbacks.onRejected?.(input, 'DuplicateSignal', detail);
      return { accepted: false, reason: 'DuplicateSignal', detail };
    }
    this.markSeen(signal.id);

    const queue = this.pending.get(signal.sourceEntity) ?? [];
    queue.push(signal);
    this.pending.set(signal.sourceEntity, queue);
    this.stats.accepted++;
    this.callbacks.onAccepted?.(signal);

    if (queue.length > this.config.maxPendingPerEntity) {
      const oldest = queue.shift();
      if (oldest) {
        this.stats.dropped++;
        const event: SignalDropped = {
          signalId: oldest.id,
          sourceEntity: oldest.sourceEntity,
          droppedAt: nowMs(),
          pending: queue.length,
        };
        logger.warn('signal dropped under backpressure', { ...event });
        this.callbacks.onDropped?.(event);
      }
    }

    if (this.autoDeliver) {
      void this.drainEntity(signal.sourceEntity);
    }

    return { accepted: true, signal };
  }

  /**
   * Deliver everything pending; resolves once all queues are empty
   */
  async flush(): Promise<number> {
    const before = this.stats.delivered;
    while (this.pending.size > 0 || this.drains.size > 0) {
      const entities = new Set([...this.pending.keys(), ...this.drains.keys()]);
      await Promise.all(Array.from(entities, entity => this.drainEntity(entity)));
    }
    return this.stats.delivered - before;
  }

  /**
   * Drain one entity's queue, one signal at a time
   */
  private drainEntity(entity: EntityId): Promise<void> {
    const existing = this.drains.get(entity);
    if (existing) return existing;

    const run = (async () => {
      try {
        for (;;) {
          const queue = this.pending.get(entity);
          const next = queue?.shift();
          if (!queue || !next) {
            this.pending.delete(entity);
            break;
          }
          if (queue.length === 0) {
            this.pending.delete(entity);
          }
          await this.deliver(next);
        }
      } finally {
        this.drains.delete(entity);
      }
    })();

    this.drains.set(entity, run);
    return run;
  }

  private async deliver(signal: Signal): Promise<void> {
    for (const subscriber of this.subscribers) {
      try {
        await subscriber(signal);
      } catch (error) {
        logger.error('signal subscriber failed', error, { signalId: signal.id });
      }
    }
    this.stats.delivered++;
  }

  private markSeen(id: string): void {
    this.seen.add(id);

    // Crude eviction when too large
    if (this.seen.size > this.config.maxSeenSignals) {
      const arr = Array.from(this.seen);
      this.seen = new Set(arr.slice(arr.length - Math.floor(this.config.maxSeenSignals * 0.9)));
    }
  }

  /**
   * Pending count for one entity, or overall
   */
  pendingCount(entity?: EntityId): number {
    if (entity !== undefined) {
      return this.pending.get(entity)?.length ?? 0;
    }
    let total = 0;
    for (const queue of this.pending.values()) total += queue.length;
    return total;
  }

  getStats(): SignalBusStats {
    return { ...this.stats, pending: this.pendingCount() };
  }
}
