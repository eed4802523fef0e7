/**
 * Audit Log
 * =========
 *
 * Hash-chained record of every engine decision: accepted and rejected
 * signals, incident lifecycle, scores, decisions, dispatch outcomes,
 * faults and federation traffic.
 */

import { z } from 'zod';
import {
  IncidentId,
  LogEntry,
  LogKind,
  PolicyDecision,
  DispatchRecord,
  Incident,
  ThreatScore,
} from '../types/index.js';
import { Fault } from '../errors.js';
import { hashJson, nowMs } from '../util/hash.js';

const LogKindZ = z.enum([
  'SIGNAL_ACCEPTED',
  'SIGNAL_REJECTED',
  'SIGNAL_DROPPED',
  'INCIDENT_OPENED',
  'INCIDENT_MERGED',
  'INCIDENT_CLOSED',
  'SCORE',
  'DECISION',
  'DISPATCH',
  'FAULT',
  'FED_OUT',
  'FED_IN',
  'FED_REJECTED',
  'ACTION',
]);

const LogEntryZ = z.object({
  i: z.number().int().nonnegative(),
  ts: z.number(),
  kind: LogKindZ,
  incidentId: z.number().int().optional(),
  data: z.unknown(),
  prev: z.string().nullable(),
  hash: z.string(),
});

export interface IncidentTrail {
  incidentId: IncidentId;
  entries: Array<{
    i: number;
    ts: number;
    kind: LogKind;
    data: unknown;
  }>;
}

function entryHash(entry: Omit<LogEntry, 'hash'>): string {
  return hashJson({
    i: entry.i,
    ts: entry.ts,
    kind: entry.kind,
    incidentId: entry.incidentId,
    data: entry.data,
    prev: entry.prev,
  });
}

export class AuditLog {
  private entries: LogEntry[] = [];
  private lastHash: string | null = null;
  private counter = 0;
  // Merged-away incident ids -> survivor, so traces follow merges
  private aliases = new Map<IncidentId, IncidentId>();

  /**
   * Append an entry to the log
   */
  append(kind: LogKind, data: unknown, incidentId?: IncidentId): LogEntry {
    const partial: Omit<LogEntry, 'hash'> = {
      i: this.counter++,
      ts: nowMs(),
      kind,
      incidentId,
      data,
      prev: this.lastHash,
    };
    const entry: LogEntry = { ...partial, hash: entryHash(partial) };

    this.lastHash = entry.hash;
    this.entries.push(entry);
    return entry;
  }

  // Convenience methods for common log types

  logIncidentOpened(incident: Incident): LogEntry {
    return this.append('INCIDENT_OPENED', {
      firstSeen: incident.firstSeen,
      entities: Array.from(incident.affectedEntities).sort(),
    }, incident.id);
  }

  logMerge(survivor: IncidentId, absorbed: IncidentId[]): LogEntry {
    for (const id of absorbed) this.aliases.set(id, survivor);
    return this.append('INCIDENT_MERGED', { absorbed }, survivor);
  }

  logIncidentClosed(incident: Incident): LogEntry {
    return this.append('INCIDENT_CLOSED', {
      reason: incident.closeReason,
      signals: incident.memberSignalIds.size,
      lastSeen: incident.lastSeen,
    }, incident.id);
  }

  logScore(score: ThreatScore): LogEntry {
    return this.append('SCORE', {
      scoreId: score.id,
      value: score.value,
      version: score.incidentVersion,
      degraded: score.degraded,
    }, score.incidentId);
  }

  logDecision(decision: PolicyDecision): LogEntry {
    return this.append('DECISION', {
      actionId: decision.action.id,
      kind: decision.action.kind,
      cost: decision.cost,
      justification: decision.action.justification,
      withheld: decision.withheld,
    }, decision.incidentId);
  }

  logDispatch(record: DispatchRecord): LogEntry {
    return this.append('DISPATCH', {
      actionId: record.actionId,
      kind: record.kind,
      status: record.outcome.status,
      reason: record.outcome.reason,
      attempts: record.attempts,
    }, record.incidentId);
  }

  logFault(fault: Fault): LogEntry {
    return this.append('FAULT', { code: fault.code, message: fault.message }, fault.incidentId);
  }

  logAction(action: string, details: unknown): LogEntry {
    return this.append('ACTION', { action, details });
  }

  /**
   * Verify chain integrity
   */
  verify(): { valid: boolean; brokenAt?: number } {
    let prevHash: string | null = null;

    for (const entry of this.entries) {
      if (entry.prev !== prevHash) {
        return { valid: false, brokenAt: entry.i };
      }
      if (entryHash(entry) !== entry.hash) {
        return { valid: false, brokenAt: entry.i };
      }
      prevHash = entry.hash;
    }

    return { valid: true };
  }

  /**
   * Every entry about an incident, including those logged under ids it absorbed
   */
  traceIncident(incidentId: IncidentId): IncidentTrail {
    const target = this.resolve(incidentId);
    return {
      incidentId: target,
      entries: this.entries
        .filter(e => e.incidentId !== undefined && this.resolve(e.incidentId) === target)
        .map(e => ({ i: e.i, ts: e.ts, kind: e.kind, data: e.data })),
    };
  }

  /**
   * Get entries by kind
   */
  byKind(kind: LogKind): LogEntry[] {
    return this.entries.filter(e => e.kind === kind);
  }

  get(index: number): LogEntry | undefined {
    return this.entries[index];
  }

  latest(): LogEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  all(): LogEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Export to JSONL format
   */
  toJSONL(): string {
    return this.entries.map(e => JSON.stringify(e)).join('\n');
  }

  /**
   * Import from JSONL format. Malformed lines throw.
   */
  static fromJSONL(jsonl: string): AuditLog {
    const log = new AuditLog();
    const lines = jsonl.trim().split('\n').filter(l => l);

    for (const line of lines) {
      const parsed = LogEntryZ.parse(JSON.parse(line));
      const entry: LogEntry = { ...parsed, data: parsed.data };
      log.entries.push(entry);
      log.lastHash = entry.hash;
      log.counter = entry.i + 1;
      if (entry.kind === 'INCIDENT_MERGED' && entry.incidentId !== undefined) {
        const absorbed = z.object({ absorbed: z.array(z.number()) }).safeParse(entry.data);
        if (absorbed.success) {
          for (const id of absorbed.data.absorbed) log.aliases.set(id, entry.incidentId);
        }
      }
    }

    return log;
  }

  export(): {
    entries: LogEntry[];
    lastHash: string | null;
  } {
    return {
      entries: this.all(),
      lastHash: this.lastHash,
    };
  }

  private resolve(id: IncidentId): IncidentId {
    let current = id;
    for (let next = this.aliases.get(current); next !== undefined; next = this.aliases.get(current)) {
      current = next;
    }
    return current;
  }
}
