/**
 * Errors & Faults
 * ===============
 *
 * Typed errors raised inside the engine, and the fault log that
 * records recovered faults for operator visibility.
 */

import { IncidentId, IncidentState } from './types/index.js';
import { nowMs } from './util/hash.js';

export type FaultCode =
  | 'MalformedSignal'
  | 'DuplicateSignal'
  | 'ScoringUnavailable'
  | 'DispatchFailed'
  | 'VerificationFailed'
  | 'ClosedIncident'
  | 'InvalidTransition'
  | 'PolicyConfig'
  | 'InternalFault';

export class DefenseError extends Error {
  constructor(
    readonly code: FaultCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ClosedIncidentError extends DefenseError {
  constructor(readonly incidentId: IncidentId) {
    super('ClosedIncident', `Incident ${incidentId} is closed`);
  }
}

export class InvalidTransitionError extends DefenseError {
  constructor(
    readonly incidentId: IncidentId,
    readonly from: IncidentState,
    readonly to: IncidentState
  ) {
    super('InvalidTransition', `Incident ${incidentId}: ${from} -> ${to} is not allowed`);
  }
}

export class PolicyConfigError extends DefenseError {
  constructor(detail: string) {
    super('PolicyConfig', detail);
  }
}

export class UnknownIncidentError extends DefenseError {
  constructor(readonly incidentId: IncidentId) {
    super('InternalFault', `Unknown incident ${incidentId}`);
  }
}

export interface Fault {
  code: FaultCode;
  message: string;
  at: number;
  incidentId?: IncidentId;
  details?: Record<string, unknown>;
}

export class FaultLog {
  private counts = new Map<FaultCode, number>();
  private recent: Fault[] = [];
  private listeners: Array<(fault: Fault) => void> = [];

  constructor(private maxRecent = 200) {}

  record(
    code: FaultCode,
    message: string,
    context: { incidentId?: IncidentId; details?: Record<string, unknown> } = {}
  ): Fault {
    const fault: Fault = { code, message, at: nowMs(), ...context };
    this.counts.set(code, (this.counts.get(code) ?? 0) + 1);
    this.recent.push(fault);
    if (this.recent.length > this.maxRecent) {
      this.recent.shift();
    }
    for (const listener of this.listeners) {
      listener(fault);
    }
    return fault;
  }

  onFault(listener: (fault: Fault) => void): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  count(code: FaultCode): number {
    return this.counts.get(code) ?? 0;
  }

  counters(): Partial<Record<FaultCode, number>> {
    const out: Partial<Record<FaultCode, number>> = {};
    for (const [code, n] of this.counts) out[code] = n;
    return out;
  }

  latest(n = 20): Fault[] {
    return this.recent.slice(-n);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
