/**
 * Correlator
 * ==========
 *
 * Groups signals into incidents using a sliding time window per entity.
 *
 * A signal touches its source entity plus any entity named in the
 * configured attributes. It attaches to every open incident sharing an
 * entity whose [firstSeen - W, lastSeen + W] span contains it. Touching
 * several incidents merges them into the lowest id.
 *
 * Mutations hold a keyed lock over the candidate incident ids, taken in
 * ascending order. If the candidates change while waiting (a concurrent
 * merge got there first) the locks are dropped and the attach retries.
 */

import {
  CloseReason,
  DefenseConfig,
  DEFAULT_CONFIG,
  EntityId,
  Incident,
  IncidentId,
  IncidentState,
  Signal,
} from './types/index.js';
import { KeyedLock } from './util/keyed-lock.js';
import { ClosedIncidentError, InvalidTransitionError, UnknownIncidentError } from './errors.js';
import { canTransition } from './policy/lifecycle.js';

interface IncidentRecord {
  id: IncidentId;
  members: Set<string>;
  firstSeen: number;
  lastSeen: number;
  entities: Set<EntityId>;
  state: IncidentState;
  version: number;
}

export interface CorrelatorCallbacks {
  onOpened?: (incident: Incident) => void;
  onUpdated?: (incident: Incident, signal: Signal) => void;
  onMerged?: (survivor: Incident, absorbed: IncidentId[]) => void;
  onClosed?: (incident: Incident) => void;
  onEvicted?: (id: IncidentId) => void;
}

export interface CorrelatorStats {
  opened: number;
  merged: number;
  closed: number;
  retries: number;
}

function compareSignals(a: Signal, b: Signal): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function sameIds(a: IncidentId[], b: IncidentId[]): boolean {
  return a.length === b.length && a.every((id, i) => id === b[i]);
}

export class Correlator {
  private open = new Map<IncidentId, IncidentRecord>();
  private closed = new Map<IncidentId, Incident>();
  private closedOrder: IncidentId[] = [];
  private byEntity = new Map<EntityId, Set<IncidentId>>();
  private aliases = new Map<IncidentId, IncidentId>();
  private signalIncident = new Map<string, IncidentId>();
  private signals = new Map<string, Signal>();
  private locks = new KeyedLock<IncidentId>();
  private nextId = 1;
  private config: DefenseConfig;
  private callbacks: CorrelatorCallbacks = {};
  private stats: CorrelatorStats = { opened: 0, merged: 0, closed: 0, retries: 0 };

  constructor(config: Partial<DefenseConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Set callbacks
   */
  setCallbacks(callbacks: CorrelatorCallbacks): void {
    this.callbacks = { ...this.callbacks, ...callbacks };
  }

  /**
   * Entities a signal touches
   */
  entitiesOf(signal: Signal): EntityId[] {
    const out = new Set<EntityId>([signal.sourceEntity]);
    for (const key of this.config.entityAttributes) {
      const value = signal.attributes[key];
      if (typeof value === 'string' && value.length > 0) {
        out.add(value);
      } else if (Array.isArray(value)) {
        for (const v of value) {
          if (v.length > 0) out.add(v);
        }
      }
    }
    return Array.from(out).sort();
  }

  /**
   * Attach a signal, opening or merging incidents as needed
   */
  async attach(signal: Signal): Promise<Incident> {
    for (;;) {
      const candidates = this.candidatesFor(signal);
      const release = await this.locks.acquireAll(candidates);
      try {
        const current = this.candidatesFor(signal);
        if (sameIds(candidates, current)) {
          return this.applyAttach(signal, current);
        }
      } finally {
        release();
      }
      this.stats.retries++;
    }
  }

  /**
   * Attach signals that arrived together. Canonical (timestamp, id) order
   * makes the resulting partition independent of input order.
   */
  async attachBatch(signals: Signal[]): Promise<Incident[]> {
    const ordered = [...signals].sort(compareSignals);
    const touched = new Set<IncidentId>();
    for (const signal of ordered) {
      const incident = await this.attach(signal);
      touched.add(incident.id);
    }

    const out = new Map<IncidentId, Incident>();
    for (const id of touched) {
      const incident = this.get(id);
      if (incident) out.set(incident.id, incident);
    }
    return Array.from(out.values()).sort((a, b) => a.id - b.id);
  }

  /**
   * Run fn with the incident's member set held still
   */
  async withIncident<T>(id: IncidentId, fn: (incident: Incident) => Promise<T> | T): Promise<T> {
    for (;;) {
      const target = this.resolve(id);
      const release = await this.locks.acquire(target);
      try {
        if (this.resolve(id) === target) {
          const incident = this.get(target);
          if (!incident) throw new UnknownIncidentError(id);
          return await fn(incident);
        }
      } finally {
        release();
      }
      this.stats.retries++;
    }
  }

  /**
   * Close incidents whose window has passed
   */
  async sweep(now: number): Promise<Incident[]> {
    const expired: IncidentId[] = [];
    for (const rec of this.open.values()) {
      if (now - rec.lastSeen > this.config.windowMs) {
        expired.push(rec.id);
      }
    }

    const closed: Incident[] = [];
    for (const id of expired.sort((a, b) => a - b)) {
      const incident = await this.locks.run(id, () => {
        const rec = this.open.get(id);
        // Re-check: a signal may have extended the window while we waited
        if (!rec || now - rec.lastSeen <= this.config.windowMs) return null;
        return this.closeRecord(rec, 'window_expired');
      });
      if (incident) closed.push(incident);
    }
    return closed;
  }

  /**
   * Close an incident early
   */
  async close(id: IncidentId, reason: CloseReason): Promise<Incident> {
    return this.withIncident(id, (incident) => {
      const rec = this.open.get(incident.id);
      if (!rec) return incident;
      return this.closeRecord(rec, reason);
    });
  }

  /**
   * Close everything still open
   */
  async closeAll(reason: CloseReason): Promise<Incident[]> {
    const ids = Array.from(this.open.keys()).sort((a, b) => a - b);
    const out: Incident[] = [];
    for (const id of ids) {
      out.push(await this.close(id, reason));
    }
    return out;
  }

  /**
   * Move an open incident through its lifecycle
   */
  transition(id: IncidentId, to: IncidentState): Incident {
    const target = this.resolve(id);
    const rec = this.open.get(target);
    if (!rec) {
      if (this.closed.has(target)) throw new ClosedIncidentError(target);
      throw new UnknownIncidentError(id);
    }
    if (to === IncidentState.CLOSED || !canTransition(rec.state, to)) {
      throw new InvalidTransitionError(target, rec.state, to);
    }
    rec.state = to;
    return this.view(rec);
  }

  /**
   * Current view of an incident (follows merges)
   */
  get(id: IncidentId): Incident | undefined {
    const target = this.resolve(id);
    const rec = this.open.get(target);
    if (rec) return this.view(rec);
    return this.closed.get(target);
  }

  /**
   * Follow merge aliases to the surviving id
   */
  resolve(id: IncidentId): IncidentId {
    let current = id;
    let next = this.aliases.get(current);
    while (next !== undefined) {
      current = next;
      next = this.aliases.get(current);
    }
    return current;
  }

  incidentOf(signalId: string): Incident | undefined {
    const id = this.signalIncident.get(signalId);
    return id === undefined ? undefined : this.get(id);
  }

  /**
   * Member signals in (timestamp, id) order
   */
  membersOf(id: IncidentId): Signal[] {
    const incident = this.get(id);
    if (!incident) return [];
    const out: Signal[] = [];
    for (const signalId of incident.memberSignalIds) {
      const signal = this.signals.get(signalId);
      if (signal) out.push(signal);
    }
    return out.sort(compareSignals);
  }

  openIncidents(): Incident[] {
    return Array.from(this.open.values(), rec => this.view(rec)).sort((a, b) => a.id - b.id);
  }

  closedIncidents(): Incident[] {
    return this.closedOrder.flatMap(id => {
      const incident = this.closed.get(id);
      return incident ? [incident] : [];
    });
  }

  isLocked(id: IncidentId): boolean {
    return this.locks.isHeld(this.resolve(id));
  }

  get openCount(): number {
    return this.open.size;
  }

  get closedCount(): number {
    return this.closed.size;
  }

  getStats(): CorrelatorStats {
    return { ...this.stats };
  }

  // ---------------------------------------------------------------------------

  private candidatesFor(signal: Signal): IncidentId[] {
    const ids = new Set<IncidentId>();
    for (const entity of this.entitiesOf(signal)) {
      for (const id of this.byEntity.get(entity) ?? []) {
        const rec = this.open.get(id);
        if (rec && this.withinWindow(rec, signal.timestamp)) {
          ids.add(id);
        }
      }
    }
    return Array.from(ids).sort((a, b) => a - b);
  }

  private withinWindow(rec: IncidentRecord, ts: number): boolean {
    const w = this.config.windowMs;
    return ts >= rec.firstSeen - w && ts <= rec.lastSeen + w;
  }

  private applyAttach(signal: Signal, candidates: IncidentId[]): Incident {
    const known = this.signalIncident.get(signal.id);
    if (known !== undefined) {
      const existing = this.get(known);
      if (existing) return existing;
    }

    const entities = this.entitiesOf(signal);
    const [survivorId, ...absorbed] = candidates;
    let rec = survivorId === undefined ? undefined : this.open.get(survivorId);

    if (!rec) {
      rec = {
        id: this.nextId++,
        members: new Set([signal.id]),
        firstSeen: signal.timestamp,
        lastSeen: signal.timestamp,
        entities: new Set(entities),
        state: IncidentState.OPEN,
        version: 1,
      };
      this.open.set(rec.id, rec);
      this.index(rec.id, entities);
      this.record(signal, rec.id);
      this.stats.opened++;
      const view = this.view(rec);
      this.callbacks.onOpened?.(view);
      return view;
    }

    for (const loserId of absorbed) {
      this.absorb(rec, loserId);
    }

    rec.members.add(signal.id);
    rec.firstSeen = Math.min(rec.firstSeen, signal.timestamp);
    rec.lastSeen = Math.max(rec.lastSeen, signal.timestamp);
    for (const entity of entities) rec.entities.add(entity);
    rec.version++;
    this.index(rec.id, entities);
    this.record(signal, rec.id);

    const view = this.view(rec);
    if (absorbed.length > 0) {
      this.stats.merged += absorbed.length;
      this.callbacks.onMerged?.(view, absorbed);
    }
    this.callbacks.onUpdated?.(view, signal);
    return view;
  }

  private absorb(survivor: IncidentRecord, loserId: IncidentId): void {
    const loser = this.open.get(loserId);
    if (!loser) return;

    for (const signalId of loser.members) {
      survivor.members.add(signalId);
      this.signalIncident.set(signalId, survivor.id);
    }
    for (const entity of loser.entities) {
      survivor.entities.add(entity);
      const ids = this.byEntity.get(entity);
      ids?.delete(loserId);
      ids?.add(survivor.id);
    }
    survivor.firstSeen = Math.min(survivor.firstSeen, loser.firstSeen);
    survivor.lastSeen = Math.max(survivor.lastSeen, loser.lastSeen);

    this.open.delete(loserId);
    this.aliases.set(loserId, survivor.id);
  }

  private closeRecord(rec: IncidentRecord, reason: CloseReason): Incident {
    rec.state = IncidentState.CLOSED;
    this.open.delete(rec.id);
    for (const entity of rec.entities) {
      const ids = this.byEntity.get(entity);
      ids?.delete(rec.id);
      if (ids && ids.size === 0) this.byEntity.delete(entity);
    }

    const frozen: Incident = Object.freeze({
      ...this.view(rec),
      closeReason: reason,
    });
    this.closed.set(rec.id, frozen);
    this.closedOrder.push(rec.id);
    this.stats.closed++;
    this.evictClosed();

    this.callbacks.onClosed?.(frozen);
    return frozen;
  }

  private evictClosed(): void {
    while (this.closedOrder.length > this.config.maxClosedIncidents) {
      const id = this.closedOrder.shift();
      if (id === undefined) break;
      const incident = this.closed.get(id);
      this.closed.delete(id);
      if (!incident) continue;
      for (const signalId of incident.memberSignalIds) {
        this.signals.delete(signalId);
        this.signalIncident.delete(signalId);
      }
      for (const [alias, target] of this.aliases) {
        if (target === id) this.aliases.delete(alias);
      }
      this.callbacks.onEvicted?.(id);
    }
  }

  private index(id: IncidentId, entities: EntityId[]): void {
    for (const entity of entities) {
      const ids = this.byEntity.get(entity) ?? new Set<IncidentId>();
      ids.add(id);
      this.byEntity.set(entity, ids);
    }
  }

  private record(signal: Signal, id: IncidentId): void {
    this.signals.set(signal.id, signal);
    this.signalIncident.set(signal.id, id);
  }

  private view(rec: IncidentRecord): Incident {
    return Object.freeze({
      id: rec.id,
      memberSignalIds: new Set(rec.members),
      firstSeen: rec.firstSeen,
      lastSeen: rec.lastSeen,
      affectedEntities: new Set(rec.entities),
      state: rec.state,
      version: rec.version,
    });
  }
}
