/**
 * Policy Engine
 * =============
 *
 * Maps (incident, score, budget, jurisdiction) to one proportional
 * response action.
 *
 * Selection:
 * 1. the rule whose range contains the score (lowest id on overlap)
 * 2. actions the jurisdiction forbids are downgraded toward noaction
 * 3. the cheapest affordable automated action wins
 * 4. no affordable action, or a saturated dispatch queue: alert
 * 5. with autonomous response off, or at the passive defense level, the
 *    chosen automated action is withheld and an alert goes out instead
 * 6. never noaction at or above the alert threshold
 * 7. an incident is not sent an action it already received (or milder)
 *
 * At the paranoid level the severity used for rule selection is boosted.
 */

import {
  ACTION_SEVERITY_ORDER,
  ActionKind,
  DefenseConfig,
  DefenseLevel,
  DEFAULT_CONFIG,
  Incident,
  IncidentId,
  IncidentState,
  OutcomeStatus,
  PolicyDecision,
  PolicyRule,
  PolicySet,
  ResponseAction,
  Signal,
  ThreatScore,
} from '../types/index.js';
import { ClosedIncidentError, DefenseError } from '../errors.js';
import { nowMs } from '../util/hash.js';
import { logger } from '../util/logger.js';
import { ResourceBudget } from './budget.js';
import { isAutomated, selectRule } from './rules.js';

interface CommittedAction {
  actionId: string;
  kind: ActionKind;
  cost: number;
  status: OutcomeStatus | 'pending';
}

interface Choice {
  kind: ActionKind;
  cost: number;
  reason: string;
  withheld?: ActionKind;
}

interface IncidentPolicyRecord {
  decisions: PolicyDecision[];
  committed: CommittedAction[];
}

export function rank(kind: ActionKind): number {
  return ACTION_SEVERITY_ORDER.indexOf(kind);
}

/**
 * Most frequent value, ties broken by lexical order
 */
function dominant(values: string[]): string | undefined {
  const counts = new Map<string, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  let best: string | undefined;
  let bestCount = 0;
  for (const [v, n] of counts) {
    if (n > bestCount || (n === bestCount && best !== undefined && v < best)) {
      best = v;
      bestCount = n;
    }
  }
  return best;
}

/**
 * The entity an action should target: the busiest source entity
 */
export function primaryEntity(incident: Incident, members: Signal[]): string {
  const fromMembers = dominant(members.map(s => s.sourceEntity));
  if (fromMembers !== undefined) return fromMembers;
  const sorted = Array.from(incident.affectedEntities).sort();
  return sorted[0] ?? 'unknown';
}

export class PolicyEngine {
  private records = new Map<IncidentId, IncidentPolicyRecord>();
  private enabledTags: Set<string>;
  private throttled = false;
  private autonomous: boolean;
  private level: DefenseLevel;
  private counter = 0;
  private config: DefenseConfig;

  constructor(
    private policy: PolicySet,
    readonly budget: ResourceBudget,
    config: Partial<DefenseConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.enabledTags = new Set(this.config.enabledLegalTags);
    this.autonomous = this.config.autonomousResponse;
    this.level = this.config.defenseLevel;
  }

  get version(): string {
    return this.policy.version;
  }

  get rules(): readonly PolicyRule[] {
    return this.policy.rules;
  }

  /**
   * Dispatch queue saturation signal from the orchestrator
   */
  setThrottled(throttled: boolean): void {
    if (this.throttled !== throttled) {
      logger.info(throttled ? 'policy throttled to alerts' : 'policy throttle cleared');
    }
    this.throttled = throttled;
  }

  get isThrottled(): boolean {
    return this.throttled;
  }

  /**
   * Replace the jurisdiction's enabled legal tags
   */
  setJurisdiction(tags: Iterable<string>): void {
    this.enabledTags = new Set(tags);
  }

  jurisdiction(): string[] {
    return Array.from(this.enabledTags).sort();
  }

  /**
   * Off: automated actions are decided and recorded but only alerts go out
   */
  setAutonomous(autonomous: boolean): void {
    if (this.autonomous !== autonomous) {
      logger.info(autonomous ? 'autonomous response enabled' : 'autonomous response disabled');
    }
    this.autonomous = autonomous;
  }

  get isAutonomous(): boolean {
    return this.autonomous;
  }

  setDefenseLevel(level: DefenseLevel): void {
    this.level = level;
  }

  get defenseLevel(): DefenseLevel {
    return this.level;
  }

  /**
   * Severity used for rule selection at the current defense level
   */
  effectiveSeverity(value: number): number {
    if (this.level !== 'paranoid') return value;
    return Math.min(1, value + this.config.paranoidSeverityBoost);
  }

  selectRule(value: number): PolicyRule {
    return selectRule(this.policy, value);
  }

  /**
   * Whether the jurisdiction permits an action under a rule
   */
  isPermitted(kind: ActionKind, rule: PolicyRule): boolean {
    if (!isAutomated(kind)) return true;
    if (!this.enabledTags.has(rule.legalConstraintTag)) return false;
    const tag = this.config.actionLegalTags[kind];
    return tag === undefined || this.enabledTags.has(tag);
  }

  /**
   * Allowed actions after legal downgrades
   */
  legalActions(rule: PolicyRule): ActionKind[] {
    const out = new Set<ActionKind>();
    for (const kind of rule.allowedActions) {
      out.add(this.isPermitted(kind, rule) ? kind : this.downgrade(kind, rule));
    }
    return Array.from(out).sort((a, b) => rank(a) - rank(b));
  }

  costOf(kind: ActionKind, rule: PolicyRule): number {
    if (!isAutomated(kind)) return 0;
    return rule.resourceCost * this.config.actionCostWeights[kind];
  }

  /**
   * Decide an action for a fresh score. Does not touch the budget.
   */
  evaluate(incident: Incident, score: ThreatScore, members: Signal[] = [], now = nowMs()): PolicyDecision {
    if (incident.state === IncidentState.CLOSED) {
      throw new ClosedIncidentError(incident.id);
    }
    if (score.incidentId !== incident.id) {
      throw new DefenseError(
        'InternalFault',
        `Score ${score.id} belongs to incident ${score.incidentId}, not ${incident.id}`
      );
    }

    const severity = this.effectiveSeverity(score.value);
    const rule = this.selectRule(severity);
    const choice = this.choose(rule, severity, incident.id);
    const action = this.buildAction(choice, incident, score, rule, members, now);

    const decision: PolicyDecision = {
      incidentId: incident.id,
      score,
      rule,
      action,
      cost: choice.cost,
      decidedAt: now,
    };
    if (choice.withheld !== undefined) decision.withheld = choice.withheld;
    return decision;
  }

  /**
   * Pay for a decision. Falls back to alert if the budget moved underneath.
   */
  commit(decision: PolicyDecision): PolicyDecision {
    let final = decision;
    if (decision.cost > 0 && !this.budget.tryConsume(decision.cost)) {
      final = {
        ...decision,
        cost: 0,
        action: this.rebuildAsAlert(decision, 'budget-exhausted'),
      };
    }

    const record = this.recordFor(final.incidentId);
    record.decisions.push(final);
    if (final.action.kind !== 'noaction') {
      record.committed.push({ actionId: final.action.id, kind: final.action.kind, cost: final.cost, status: 'pending' });
    }
    return final;
  }

  /**
   * A dispatch was turned away before any handler ran: it no longer counts
   * as applied and its cost goes back to the budget. Returns the refund.
   */
  refund(incidentId: IncidentId, actionId: string): number {
    const entry = this.records.get(incidentId)?.committed.find(c => c.actionId === actionId);
    if (!entry || entry.status !== 'pending') return 0;
    entry.status = 'failed';
    const cost = entry.cost;
    entry.cost = 0;
    this.budget.refund(cost);
    return cost;
  }

  /**
   * Follow-up alert for a decision whose action could not be dispatched
   */
  reissueAsAlert(incidentId: IncidentId, actionId: string, reason: string, now = nowMs()): PolicyDecision | null {
    const record = this.records.get(incidentId);
    const original = record?.decisions.find(d => d.action.id === actionId);
    if (!record || !original) return null;

    const decision: PolicyDecision = {
      ...original,
      action: this.rebuildAsAlert(original, reason, this.nextActionId(incidentId), now),
      cost: 0,
      decidedAt: now,
    };
    record.decisions.push(decision);
    record.committed.push({ actionId: decision.action.id, kind: 'alert', cost: 0, status: 'pending' });
    return decision;
  }

  /**
   * Emergency decision used when a pipeline stage faults
   */
  faultAlert(incident: Incident, score: ThreatScore | undefined, reason: string, now = nowMs()): ResponseAction {
    return {
      id: this.nextActionId(incident.id),
      incidentId: incident.id,
      kind: 'alert',
      severity: score?.value ?? 0,
      summary: `Incident ${incident.id}: internal fault (${reason})`,
      issuedAt: now,
      justification: {
        scoreId: score?.id ?? 'none',
        ruleId: 'none',
        policyVersion: this.policy.version,
        reason: 'internal-fault',
      },
    };
  }

  /**
   * Outcome feedback; failed actions no longer count as applied
   */
  recordOutcome(incidentId: IncidentId, actionId: string, status: OutcomeStatus): void {
    const record = this.records.get(incidentId);
    const entry = record?.committed.find(c => c.actionId === actionId);
    if (entry) entry.status = status;
  }

  isTerminal(kind: ActionKind): boolean {
    return this.config.terminalActions.includes(kind);
  }

  /**
   * Strongest action already applied (or in flight) for an incident
   */
  strongestApplied(incidentId: IncidentId): ActionKind | undefined {
    let best: ActionKind | undefined;
    for (const c of this.records.get(incidentId)?.committed ?? []) {
      if (c.status === 'failed') continue;
      if (best === undefined || rank(c.kind) > rank(best)) best = c.kind;
    }
    return best;
  }

  decisions(incidentId: IncidentId): PolicyDecision[] {
    return [...(this.records.get(incidentId)?.decisions ?? [])];
  }

  merge(survivor: IncidentId, absorbed: IncidentId): void {
    const from = this.records.get(absorbed);
    if (!from) return;
    const into = this.recordFor(survivor);
    into.decisions.push(...from.decisions);
    into.committed.push(...from.committed);
    this.records.delete(absorbed);
  }

  forget(incidentId: IncidentId): void {
    this.records.delete(incidentId);
  }

  // ---------------------------------------------------------------------------

  private choose(rule: PolicyRule, value: number, incidentId: IncidentId): Choice {
    const legal = this.legalActions(rule);
    const automated = legal.filter(isAutomated);

    let kind: ActionKind;
    let cost = 0;
    let reason = 'rule-match';
    let withheld: ActionKind | undefined;

    if (automated.length > 0) {
      if (this.throttled) {
        kind = 'alert';
        reason = 'dispatch-throttled';
      } else {
        const affordable = automated
          .map(k => ({ kind: k, cost: this.costOf(k, rule) }))
          .filter(c => this.budget.canAfford(c.cost))
          .sort((a, b) => a.cost - b.cost || rank(a.kind) - rank(b.kind));
        const cheapest = affordable[0];
        if (cheapest) {
          kind = cheapest.kind;
          cost = cheapest.cost;
        } else {
          kind = 'alert';
          reason = 'budget-exhausted';
        }
      }
    } else if (legal.includes('alert')) {
      kind = 'alert';
    } else {
      kind = 'noaction';
    }

    if (isAutomated(kind) && (!this.autonomous || this.level === 'passive')) {
      withheld = kind;
      kind = 'alert';
      cost = 0;
      reason = this.autonomous ? 'defense-passive' : 'autonomy-disabled';
    }

    if (kind === 'noaction' && value >= this.config.alertThreshold) {
      kind = 'alert';
      reason = 'alert-floor';
    }

    const prior = this.strongestApplied(incidentId);
    if (kind !== 'noaction' && prior !== undefined && rank(kind) <= rank(prior)) {
      return { kind: 'noaction', cost: 0, reason: 'already-actioned' };
    }

    return withheld === undefined ? { kind, cost, reason } : { kind, cost, reason, withheld };
  }

  /**
   * Next less restrictive action that is both allowed and permitted
   */
  private downgrade(kind: ActionKind, rule: PolicyRule): ActionKind {
    for (let r = rank(kind) - 1; r >= 0; r--) {
      const candidate = ACTION_SEVERITY_ORDER[r];
      if (candidate === undefined) continue;
      if (isAutomated(candidate) && rule.allowedActions.has(candidate) && this.isPermitted(candidate, rule)) {
        return candidate;
      }
    }
    return 'alert';
  }

  private buildAction(
    choice: Choice,
    incident: Incident,
    score: ThreatScore,
    rule: PolicyRule,
    members: Signal[],
    now: number
  ): ResponseAction {
    const { kind, reason, withheld } = choice;
    const base = {
      id: this.nextActionId(incident.id),
      incidentId: incident.id,
      issuedAt: now,
      justification: {
        scoreId: score.id,
        ruleId: rule.id,
        policyVersion: this.policy.version,
        reason,
      },
    };
    const target = primaryEntity(incident, members);

    switch (kind) {
      case 'alert':
        return {
          ...base,
          kind,
          severity: score.value,
          summary: `Incident ${incident.id} severity ${score.value.toFixed(2)} under ${rule.id} (${reason})` +
            (withheld !== undefined ? `, recommends ${withheld}` : ''),
        };
      case 'isolate':
        return { ...base, kind, targetEntity: target, durationMs: this.config.isolationDurationMs };
      case 'deceive': {
        const topKind = dominant(members.map(s => s.kind));
        const profileId = (topKind !== undefined ? this.config.deceptionProfiles[topKind] : undefined)
          ?? this.config.defaultDeceptionProfile;
        return { ...base, kind, targetEntity: target, profileId };
      }
      case 'block':
        return { ...base, kind, targetEntity: target, scope: rule.blockScope ?? 'host' };
      case 'noaction':
        return { ...base, kind };
    }
  }

  private rebuildAsAlert(
    decision: PolicyDecision,
    reason: string,
    id = decision.action.id,
    issuedAt = decision.action.issuedAt
  ): ResponseAction {
    const { action, score, rule } = decision;
    return {
      id,
      incidentId: action.incidentId,
      issuedAt,
      justification: { ...action.justification, reason },
      kind: 'alert',
      severity: score.value,
      summary: `Incident ${action.incidentId} severity ${score.value.toFixed(2)} under ${rule.id} (${reason})`,
    };
  }

  private recordFor(incidentId: IncidentId): IncidentPolicyRecord {
    let record = this.records.get(incidentId);
    if (!record) {
      record = { decisions: [], committed: [] };
      this.records.set(incidentId, record);
    }
    return record;
  }

  private nextActionId(incidentId: IncidentId): string {
    return `act-${incidentId}-${++this.counter}`;
  }
}
