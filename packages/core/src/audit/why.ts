/**
 * Why Query
 * =========
 *
 * Operator-legible explanation of an incident: what it contains, how it
 * was scored, what the policy decided and what happened on dispatch.
 */

import { IncidentId, IncidentState, CloseReason, NodeId, OutcomeStatus, ActionKind } from '../types/index.js';
import { Correlator } from '../correlator.js';
import { Scorer } from '../scorer.js';
import { PolicyEngine } from '../policy/engine.js';
import { ResponseOrchestrator } from '../orchestrator.js';
import { ThreatIntelStore } from '../federation/intel.js';

export interface WhyResult {
  incidentId: IncidentId;
  state: IncidentState;
  closeReason?: CloseReason;
  firstSeen: number;
  lastSeen: number;
  entities: string[];
  signals: string[];
  scores: Array<{ id: string; value: number; version: number; degraded: boolean }>;
  decisions: Array<{
    actionId: string;
    kind: ActionKind;
    ruleId: string;
    policyVersion: string;
    reason: string;
    cost: number;
  }>;
  dispatches: Array<{ actionId: string; status: OutcomeStatus; attempts: number; reason?: string }>;
  corroboratedBy: NodeId[];
}

export function why(
  sources: {
    correlator: Correlator;
    scorer: Scorer;
    policy: PolicyEngine;
    orchestrator: ResponseOrchestrator;
    intel?: ThreatIntelStore;
  },
  incidentId: IncidentId
): WhyResult | null {
  const incident = sources.correlator.get(incidentId);
  if (!incident) return null;

  const entities = Array.from(incident.affectedEntities).sort();
  const decisions = sources.policy.decisions(incident.id);
  // Decisions follow merges; dispatch records keep the id they were issued under
  const actionIds = new Set(decisions.map(d => d.action.id));

  return {
    incidentId: incident.id,
    state: incident.state,
    closeReason: incident.closeReason,
    firstSeen: incident.firstSeen,
    lastSeen: incident.lastSeen,
    entities,
    signals: sources.correlator.membersOf(incident.id).map(s => s.id),
    scores: sources.scorer.history(incident.id).map(s => ({
      id: s.id,
      value: s.value,
      version: s.incidentVersion,
      degraded: s.degraded,
    })),
    decisions: decisions.map(d => ({
      actionId: d.action.id,
      kind: d.action.kind,
      ruleId: d.action.justification.ruleId,
      policyVersion: d.action.justification.policyVersion,
      reason: d.action.justification.reason,
      cost: d.cost,
    })),
    dispatches: sources.orchestrator
      .history()
      .filter(r => actionIds.has(r.actionId) || r.incidentId === incident.id)
      .map(r => ({
        actionId: r.actionId,
        status: r.outcome.status,
        attempts: r.attempts,
        reason: r.outcome.reason,
      })),
    corroboratedBy: sources.intel?.reporters(entities) ?? [],
  };
}
