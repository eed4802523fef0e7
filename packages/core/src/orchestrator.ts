/**
 * Response Orchestrator
 * =====================
 *
 * Delivers response actions to the handler registered for their kind.
 *
 * - Work goes through a bounded queue drained by a fixed worker pool, so
 *   ingestion never waits on a handler.
 * - The action id is the idempotency key. A success is remembered and
 *   returned again without calling the handler.
 * - Transient failures retry with exponential backoff.
 * - A full queue fails the dispatch and raises the saturation signal;
 *   it clears once the queue is back under half capacity. Alerts may use a
 *   reserve above capacity so a throttled node can still page someone.
 * - Without running workers nothing is queued: the dispatch is refused.
 */

import {
  ActionKind,
  DefenseConfig,
  DEFAULT_CONFIG,
  DispatchRecord,
  DispatchRefusal,
  Outcome,
  ResponseAction,
} from './types/index.js';
import { FaultLog, describeError } from './errors.js';
import { DispatchQueue } from './dispatch-queue.js';
import { nowMs } from './util/hash.js';
import { logger } from './util/logger.js';

export interface ActionHandler {
  apply(action: ResponseAction, idempotencyKey: string): Promise<Outcome>;
}

export type Delay = (ms: number) => Promise<void>;

export interface OrchestratorCallbacks {
  onSaturated?: () => void;
  onDrained?: () => void;
  onDispatched?: (record: DispatchRecord) => void;
}

interface Job {
  action: ResponseAction;
  resolve: (outcome: Outcome) => void;
}

export const MAX_RECORDS = 1_000;

const sleep: Delay = ms => new Promise(resolve => setTimeout(resolve, ms));

export class ResponseOrchestrator {
  private handlers = new Map<ActionKind, ActionHandler>();
  private queue: DispatchQueue<Job>;
  private workers: Promise<void>[] = [];
  private completed = new Map<string, Outcome>();
  private inflight = new Map<string, Promise<Outcome>>();
  private records: DispatchRecord[] = [];
  private callbacks: OrchestratorCallbacks = {};
  private saturated = false;
  private config: DefenseConfig;
  private faults?: FaultLog;
  private delay: Delay;
  private maxRecords: number;
  private alertReserve: number;

  constructor(
    config: Partial<DefenseConfig> = {},
    options: { faults?: FaultLog; delay?: Delay; maxRecords?: number } = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.queue = new DispatchQueue<Job>(this.config.dispatchQueueSize);
    this.faults = options.faults;
    this.delay = options.delay ?? sleep;
    this.maxRecords = options.maxRecords ?? MAX_RECORDS;
    this.alertReserve = Math.max(1, Math.ceil(this.config.dispatchQueueSize / 4));
  }

  setCallbacks(callbacks: OrchestratorCallbacks): void {
    this.callbacks = { ...this.callbacks, ...callbacks };
  }

  registerHandler(kind: ActionKind, handler: ActionHandler): void {
    this.handlers.set(kind, handler);
  }

  /**
   * Spawn the worker pool
   */
  start(): void {
    if (this.workers.length > 0) return;
    this.queue.reopen();
    for (let i = 0; i < this.config.dispatchConcurrency; i++) {
      this.workers.push(this.work());
    }
  }

  /**
   * Stop taking new work and wait for queued actions to finish
   */
  async stop(): Promise<void> {
    this.queue.close();
    const workers = this.workers;
    this.workers = [];
    await Promise.all(workers);
  }

  get running(): boolean {
    return this.workers.length > 0;
  }

  get isSaturated(): boolean {
    return this.saturated;
  }

  get queued(): number {
    return this.queue.size;
  }

  /**
   * Queue an action; resolves with its final outcome
   */
  dispatch(action: ResponseAction): Promise<Outcome> {
    if (action.kind === 'noaction') {
      const outcome: Outcome = { status: 'success' };
      this.finish(action, outcome, 0);
      return Promise.resolve(outcome);
    }

    const done = this.completed.get(action.id);
    if (done) {
      return Promise.resolve(done);
    }
    const pending = this.inflight.get(action.id);
    if (pending) {
      return pending;
    }

    if (!this.handlers.has(action.kind)) {
      return Promise.resolve(this.fail(action, `no handler for ${action.kind}`, 0));
    }
    if (!this.running) {
      return Promise.resolve(this.refuse(action, 'stopped'));
    }

    let resolveJob: (outcome: Outcome) => void = () => undefined;
    const promise = new Promise<Outcome>(resolve => {
      resolveJob = resolve;
    });

    const limit = action.kind === 'alert' ? this.queue.capacity + this.alertReserve : this.queue.capacity;
    if (!this.queue.offer({ action, resolve: resolveJob }, limit)) {
      if (this.queue.isClosed) {
        return Promise.resolve(this.refuse(action, 'stopped'));
      }
      this.setSaturated(true);
      return Promise.resolve(this.refuse(action, 'saturated'));
    }

    this.inflight.set(action.id, promise);
    return promise;
  }

  /**
   * Recent dispatch records, oldest first
   */
  history(incidentId?: number): DispatchRecord[] {
    if (incidentId === undefined) return [...this.records];
    return this.records.filter(r => r.incidentId === incidentId);
  }

  // ---------------------------------------------------------------------------

  private async work(): Promise<void> {
    for (;;) {
      const job = await this.queue.take();
      if (job === undefined) return;

      if (this.saturated && this.queue.size < this.queue.capacity / 2) {
        this.setSaturated(false);
      }

      const { outcome, attempts } = await this.execute(job.action);
      this.inflight.delete(job.action.id);
      if (outcome.status === 'failed') {
        this.fail(job.action, outcome.reason ?? 'handler reported failure', attempts, outcome);
      } else {
        this.remember(job.action.id, outcome);
        this.finish(job.action, outcome, attempts);
      }
      job.resolve(outcome);
    }
  }

  private async execute(action: ResponseAction): Promise<{ outcome: Outcome; attempts: number }> {
    const handler = this.handlers.get(action.kind);
    if (!handler) {
      return { outcome: { status: 'failed', reason: `no handler for ${action.kind}` }, attempts: 0 };
    }

    let attempt = 0;
    for (;;) {
      attempt++;
      let outcome: Outcome;
      try {
        outcome = await handler.apply(action, action.id);
      } catch (error) {
        outcome = { status: 'failed', reason: describeError(error), transient: true };
      }

      const retryable = outcome.status === 'failed' && outcome.transient === true;
      if (!retryable || attempt > this.config.maxRetries) {
        return { outcome, attempts: attempt };
      }

      const backoff = this.config.retryBaseDelayMs * Math.pow(2, attempt - 1);
      logger.debug('retrying dispatch', { actionId: action.id, attempt, backoff });
      await this.delay(backoff);
    }
  }

  private refuse(action: ResponseAction, refusal: DispatchRefusal): Outcome {
    const reason = refusal === 'saturated' ? 'dispatch queue saturated' : 'orchestrator stopped';
    return this.fail(action, reason, 0, { status: 'failed', reason, refusal });
  }

  private remember(actionId: string, outcome: Outcome): void {
    this.completed.set(actionId, outcome);
    if (this.completed.size > this.maxRecords) {
      const oldest = this.completed.keys().next();
      if (!oldest.done) this.completed.delete(oldest.value);
    }
  }

  private fail(action: ResponseAction, reason: string, attempts: number, outcome?: Outcome): Outcome {
    const final: Outcome = outcome ?? { status: 'failed', reason };
    this.faults?.record('DispatchFailed', `Dispatch of ${action.id} failed: ${reason}`, {
      incidentId: action.incidentId,
      details: { kind: action.kind, attempts },
    });
    logger.warn('dispatch failed', { actionId: action.id, kind: action.kind, reason, attempts });
    this.finish(action, final, attempts);
    return final;
  }

  private finish(action: ResponseAction, outcome: Outcome, attempts: number): void {
    const record: DispatchRecord = {
      actionId: action.id,
      incidentId: action.incidentId,
      kind: action.kind,
      outcome,
      attempts,
      completedAt: nowMs(),
    };
    this.records.push(record);
    if (this.records.length > this.maxRecords) {
      this.records.splice(0, this.records.length - this.maxRecords);
    }
    this.callbacks.onDispatched?.(record);
  }

  private setSaturated(saturated: boolean): void {
    if (this.saturated === saturated) return;
    this.saturated = saturated;
    if (saturated) {
      logger.warn('dispatch queue saturated', { capacity: this.queue.capacity });
      this.callbacks.onSaturated?.();
    } else {
      this.callbacks.onDrained?.();
    }
  }
}
