/**
 * Defense Node
 * ============
 *
 * The main orchestrator that ties all components together.
 * This is the thing you instantiate to defend a network segment.
 *
 *   ingest → SignalBus → Correlator → Scorer → PolicyEngine → ResponseOrchestrator
 *                                        ↑
 *                FederationCoordinator → ThreatIntelStore
 *
 * Per incident the pipeline runs under the incident's lock, so an incident
 * is never scored while its member set changes. Dispatch happens after the
 * lock is released; terminal actions close the incident when they finish.
 * A dispatch the orchestrator turns away is refunded and, when saturation
 * refused it, replaced by an alert.
 *
 * Every tick the defense level follows load and threat volume.
 */

import {
  ActionKind,
  DefenseConfig,
  DefenseLevel,
  DEFAULT_CONFIG,
  FederationTransport,
  Incident,
  IncidentId,
  IncidentState,
  IngestResult,
  NodeId,
  Outcome,
  PolicySet,
  ResponseAction,
  Signal,
  ThreatScore,
} from './types/index.js';

// Pipeline
import { SignalBus, SignalBusStats } from './bus.js';
import { Correlator, CorrelatorStats } from './correlator.js';
import { Scorer, ScoringCapability } from './scorer.js';
import { HeuristicThreatModel } from './model.js';
import { ResourceBudget } from './policy/budget.js';
import { PolicyEngine } from './policy/engine.js';
import { DEFAULT_POLICY, compilePolicySet } from './policy/rules.js';
import { ActionHandler, Delay, ResponseOrchestrator } from './orchestrator.js';
import { AlertHandler } from './handlers.js';

// Federation
import { FederationCoordinator, FederationStats } from './federation/coordinator.js';
import { SignatureCapability, Ed25519Signer } from './federation/signature.js';
import { ThreatIntelStore } from './federation/intel.js';
import { TrustStore } from './federation/trust.js';
import { withLogging } from './transports/logged.js';

// Audit
import { AuditLog } from './audit/log.js';
import { WhyResult, why } from './audit/why.js';

import { DefenseError, FaultCode, FaultLog, describeError } from './errors.js';
import { nowMs } from './util/hash.js';
import { Logger, logger } from './util/logger.js';

export interface DefenseNodeOptions {
  signer: SignatureCapability;
  transport?: FederationTransport;
  scoring?: ScoringCapability;
  policy?: PolicySet;
  handlers?: Partial<Record<ActionKind, ActionHandler>>;
  config?: Partial<DefenseConfig>;
  systemId?: string;
  /** Backoff sleeper for dispatch retries */
  delay?: Delay;
  /** Random source for gossip peer selection */
  random?: () => number;
}

export interface DefenseNodeCallbacks {
  onDecision?: (action: ResponseAction, score: ThreatScore | undefined) => void;
  onOutcome?: (action: ResponseAction, outcome: Outcome) => void;
  onIncidentClosed?: (incident: Incident) => void;
}

export interface DefenseNodeStatus {
  nodeId: NodeId;
  systemId: string;
  started: boolean;
  incidents: { open: number; closed: number };
  budget: { available: number; capacity: number };
  throttled: boolean;
  autonomous: boolean;
  defenseLevel: DefenseLevel;
  jurisdiction: string[];
  policyVersion: string;
  metrics: { eventsProcessed: number; threatsDetected: number; avgProcessingMs: number };
  bus: SignalBusStats;
  correlator: CorrelatorStats;
  faults: Partial<Record<FaultCode, number>>;
  federation: {
    reachable: NodeId[];
    unreachable: NodeId[];
    stats: FederationStats;
  } | null;
}

export class DefenseNode {
  // Core identity
  readonly id: NodeId;
  readonly systemId: string;

  // Config
  private config: DefenseConfig;

  // Components
  readonly faults: FaultLog;
  readonly audit: AuditLog;
  readonly bus: SignalBus;
  readonly correlator: Correlator;
  readonly scorer: Scorer;
  readonly budget: ResourceBudget;
  readonly policy: PolicyEngine;
  readonly orchestrator: ResponseOrchestrator;
  readonly trust: TrustStore;
  readonly intel: ThreatIntelStore;
  readonly federation: FederationCoordinator | null;

  // State
  private started = false;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private inflight = new Set<Promise<void>>();
  private callbacks: DefenseNodeCallbacks = {};
  private log: Logger;
  private metrics = { eventsProcessed: 0, threatsDetected: 0, processingMs: 0 };
  private recentThreats: number[] = [];

  constructor(options: DefenseNodeOptions) {
    this.id = options.signer.nodeId;
    if (options.transport && options.transport.id !== this.id) {
      throw new DefenseError('PolicyConfig', `Transport id ${options.transport.id} does not match node id ${this.id}`);
    }
    this.systemId = options.systemId ?? `node-${this.id.slice(0, 8)}`;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.log = logger.child({ node: this.systemId });

    this.faults = new FaultLog();
    this.audit = new AuditLog();

    this.bus = new SignalBus(this.config);
    this.correlator = new Correlator(this.config);
    this.trust = new TrustStore(this.config);
    this.intel = new ThreatIntelStore(this.config);
    this.scorer = new Scorer(options.scoring ?? new HeuristicThreatModel(), this.correlator, {
      corroboration: this.intel,
      faults: this.faults,
      config: this.config,
    });
    this.budget = new ResourceBudget(
      this.config.resourceCapacity,
      this.config.replenishAmount,
      this.config.replenishIntervalMs
    );
    this.policy = new PolicyEngine(
      options.policy ?? compilePolicySet(DEFAULT_POLICY),
      this.budget,
      this.config
    );
    this.orchestrator = new ResponseOrchestrator(this.config, {
      faults: this.faults,
      delay: options.delay,
    });

    this.orchestrator.registerHandler('alert', new AlertHandler());
    for (const [kind, handler] of Object.entries(options.handlers ?? {})) {
      const parsed = parseActionKind(kind);
      if (parsed && handler) this.orchestrator.registerHandler(parsed, handler);
    }

    this.federation = options.transport
      ? new FederationCoordinator(
          withLogging(options.transport, this.audit),
          options.signer,
          this.trust,
          this.intel,
          { config: this.config, faults: this.faults, random: options.random }
        )
      : null;

    this.wireCallbacks();
  }

  /**
   * Generate a fresh Ed25519 identity and build a node around it
   */
  static async create(options: Omit<DefenseNodeOptions, 'signer'> = {}): Promise<DefenseNode> {
    const signer = await Ed25519Signer.generate();
    return new DefenseNode({ ...options, signer });
  }

  /**
   * Set external callbacks
   */
  setCallbacks(callbacks: DefenseNodeCallbacks): void {
    this.callbacks = { ...this.callbacks, ...callbacks };
  }

  /**
   * Wire internal component callbacks
   */
  private wireCallbacks(): void {
    this.faults.onFault(fault => {
      this.audit.logFault(fault);
    });

    // Ingestion
    this.bus.setCallbacks({
      onAccepted: (signal) => {
        this.audit.append('SIGNAL_ACCEPTED', {
          signalId: signal.id,
          sourceEntity: signal.sourceEntity,
          kind: signal.kind,
        });
      },
      onRejected: (_input, reason, detail) => {
        this.audit.append('SIGNAL_REJECTED', { reason, detail });
        this.faults.record(reason, detail);
      },
      onDropped: (event) => {
        this.audit.append('SIGNAL_DROPPED', event);
      },
    });
    this.bus.subscribe(signal => this.process(signal));

    // Incident lifecycle
    this.correlator.setCallbacks({
      onOpened: (incident) => {
        this.audit.logIncidentOpened(incident);
      },
      onMerged: (survivor, absorbed) => {
        this.audit.logMerge(survivor.id, absorbed);
        for (const id of absorbed) {
          this.scorer.merge(survivor.id, id);
          this.policy.merge(survivor.id, id);
        }
      },
      onClosed: (incident) => {
        this.audit.logIncidentClosed(incident);
        const peak = Math.max(0, ...this.scorer.history(incident.id).map(s => s.value));
        this.federation?.noteClosed(incident, this.correlator.membersOf(incident.id), peak);
        this.callbacks.onIncidentClosed?.(incident);
      },
      onEvicted: (id) => {
        this.scorer.forget(id);
        this.policy.forget(id);
      },
    });

    // Dispatch
    this.orchestrator.setCallbacks({
      onSaturated: () => this.policy.setThrottled(true),
      onDrained: () => this.policy.setThrottled(false),
      onDispatched: (record) => {
        this.audit.logDispatch(record);
      },
    });

    this.budget.onReplenish(available => {
      this.audit.logAction('budget_replenished', { available });
    });

    // Federation
    this.federation?.setCallbacks({
      onRejected: (_envelope, from, reason) => {
        this.audit.append('FED_REJECTED', { from, reason });
      },
      onPublished: (message, peers) => {
        this.log.debug('summary published', { messageId: message.messageId, peers: peers.length });
      },
    });
  }

  /**
   * Start the node
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.orchestrator.start();
    this.budget.start();
    this.federation?.start();
    this.bus.start();

    this.sweepTimer = setInterval(() => {
      this.processTick().catch(error => {
        this.log.error('tick failed', error);
      });
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();

    this.audit.logAction('node_started', { id: this.id, systemId: this.systemId });
    this.log.info('defense node started', { policyVersion: this.policy.version });
  }

  /**
   * Drain pending work, close what is open and stop every timer
   */
  async stop(): Promise<void> {
    if (!this.started) return;

    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.bus.stop();
    await this.flush();

    this.federation?.stop();
    this.budget.stop();
    await this.orchestrator.stop();
    await this.correlator.closeAll('shutdown');

    this.started = false;
    this.audit.logAction('node_stopped', { id: this.id });
    this.log.info('defense node stopped');
  }

  /**
   * Push one sensor record
   */
  ingest(input: unknown): IngestResult {
    return this.bus.ingest(input);
  }

  /**
   * Deliver everything pending and wait for dispatches to settle
   */
  async flush(): Promise<void> {
    await this.bus.flush();
    await this.settle();
  }

  /**
   * Wait for in-flight dispatches and their follow-up transitions
   */
  async settle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight));
    }
  }

  /**
   * Periodic work: close expired incidents, drop stale intel and adjust the
   * defense level
   */
  async processTick(now = nowMs()): Promise<Incident[]> {
    const closed = await this.correlator.sweep(now);
    this.intel.prune(now);
    this.adjustDefenses(now);
    return closed;
  }

  /**
   * Passive while the budget is nearly spent or dispatch is saturated,
   * paranoid while recent threats exceed the limit (paranoid wins), the
   * configured level otherwise.
   */
  adjustDefenses(now = nowMs()): DefenseLevel {
    this.pruneThreats(now);
    if (!this.config.adaptiveDefense) return this.policy.defenseLevel;

    let level = this.config.defenseLevel;
    const { available, capacity } = this.budget;
    if (this.orchestrator.isSaturated || (capacity > 0 && available / capacity < this.config.passiveBudgetRatio)) {
      level = 'passive';
    }
    if (this.recentThreats.length > this.config.paranoidThreatCount) {
      level = 'paranoid';
    }

    const previous = this.policy.defenseLevel;
    if (level !== previous) {
      this.policy.setDefenseLevel(level);
      this.audit.logAction('defense_level_changed', {
        from: previous,
        to: level,
        recentThreats: this.recentThreats.length,
      });
      this.log.warn('defense level changed', { from: previous, to: level });
    }
    return level;
  }

  /**
   * Score and decide an incident. Returns the action issued, or null when
   * the incident is already closed.
   */
  async evaluate(incidentId: IncidentId): Promise<ResponseAction | null> {
    return this.correlator.withIncident(incidentId, async (incident) => {
      if (incident.state === IncidentState.CLOSED) return null;

      let score: ThreatScore | undefined;
      try {
        score = await this.scorer.score(incident);
        this.audit.logScore(score);

        const decision = this.policy.commit(
          this.policy.evaluate(incident, score, this.correlator.membersOf(incident.id))
        );
        this.audit.logDecision(decision);
        this.correlator.transition(incident.id, IncidentState.EVALUATED);

        if (score.value >= this.config.alertThreshold) {
          this.metrics.threatsDetected++;
          this.recentThreats.push(decision.decidedAt);
          this.pruneThreats(decision.decidedAt);
        }
        this.callbacks.onDecision?.(decision.action, score);
        if (decision.action.kind !== 'noaction') {
          this.launch(decision.action);
        }
        return decision.action;
      } catch (error) {
        return this.internalFault(incident, score, error);
      }
    });
  }

  /**
   * Explain an incident for an operator
   */
  explain(incidentId: IncidentId): WhyResult | null {
    return why(
      {
        correlator: this.correlator,
        scorer: this.scorer,
        policy: this.policy,
        orchestrator: this.orchestrator,
        intel: this.intel,
      },
      incidentId
    );
  }

  /**
   * Get current status
   */
  status(): DefenseNodeStatus {
    const processed = this.metrics.eventsProcessed;
    return {
      nodeId: this.id,
      systemId: this.systemId,
      started: this.started,
      incidents: {
        open: this.correlator.openCount,
        closed: this.correlator.closedCount,
      },
      budget: {
        available: this.budget.available,
        capacity: this.budget.capacity,
      },
      throttled: this.policy.isThrottled,
      autonomous: this.policy.isAutonomous,
      defenseLevel: this.policy.defenseLevel,
      jurisdiction: this.policy.jurisdiction(),
      policyVersion: this.policy.version,
      metrics: {
        eventsProcessed: processed,
        threatsDetected: this.metrics.threatsDetected,
        avgProcessingMs: processed === 0 ? 0 : this.metrics.processingMs / processed,
      },
      bus: this.bus.getStats(),
      correlator: this.correlator.getStats(),
      faults: this.faults.counters(),
      federation: this.federation
        ? {
            reachable: this.federation.reachablePeers(),
            unreachable: this.federation.unreachablePeers(),
            stats: this.federation.getStats(),
          }
        : null,
    };
  }

  /**
   * Export full state for audit
   */
  export(): {
    status: DefenseNodeStatus;
    incidents: Incident[];
    trust: ReturnType<TrustStore['export']>;
    audit: ReturnType<AuditLog['export']>;
  } {
    return {
      status: this.status(),
      incidents: [...this.correlator.closedIncidents(), ...this.correlator.openIncidents()],
      trust: this.trust.export(),
      audit: this.audit.export(),
    };
  }

  // ---------------------------------------------------------------------------

  private async process(signal: Signal): Promise<void> {
    const begin = performance.now();
    try {
      const incident = await this.correlator.attach(signal);
      await this.evaluate(incident.id);
    } catch (error) {
      this.faults.record('InternalFault', `Could not correlate signal ${signal.id}: ${describeError(error)}`);
      this.log.error('correlation fault', error, { signalId: signal.id });
    }
    this.metrics.eventsProcessed++;
    this.metrics.processingMs += performance.now() - begin;
  }

  private launch(action: ResponseAction): void {
    const task: Promise<void> = this.orchestrator
      .dispatch(action)
      .then(outcome => this.afterDispatch(action, outcome))
      .catch(error => {
        this.log.error('post-dispatch handling failed', error, { actionId: action.id });
      })
      .then(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  private async afterDispatch(action: ResponseAction, outcome: Outcome): Promise<void> {
    if (outcome.refusal !== undefined) {
      await this.afterRefusal(action, outcome);
      return;
    }

    this.policy.recordOutcome(action.incidentId, action.id, outcome.status);
    this.callbacks.onOutcome?.(action, outcome);

    // Failed or not, the incident was acted on
    const terminal = await this.correlator.withIncident(action.incidentId, (incident) => {
      if (incident.state === IncidentState.CLOSED) return false;
      if (incident.state === IncidentState.OPEN) {
        this.correlator.transition(incident.id, IncidentState.EVALUATED);
      }
      this.correlator.transition(incident.id, IncidentState.ACTIONED);
      return this.policy.isTerminal(action.kind);
    });

    if (terminal) {
      await this.correlator.close(action.incidentId, 'terminal_action');
    }
  }

  /**
   * No handler ran, so the incident was not acted on and stays where it is
   */
  private async afterRefusal(action: ResponseAction, outcome: Outcome): Promise<void> {
    const refunded = this.policy.refund(action.incidentId, action.id);
    if (refunded > 0) {
      this.audit.logAction('budget_refunded', { actionId: action.id, amount: refunded });
    }
    this.callbacks.onOutcome?.(action, outcome);
    if (outcome.refusal !== 'saturated' || action.kind === 'alert') return;

    const fallback = await this.correlator.withIncident(action.incidentId, (incident) => {
      if (incident.state === IncidentState.CLOSED) return null;
      return this.policy.reissueAsAlert(incident.id, action.id, 'dispatch-throttled');
    });
    if (!fallback) return;

    this.audit.logDecision(fallback);
    this.callbacks.onDecision?.(fallback.action, fallback.score);
    this.launch(fallback.action);
  }

  private pruneThreats(now: number): void {
    const cutoff = now - this.config.threatVolumeWindowMs;
    while (this.recentThreats.length > 0 && (this.recentThreats[0] ?? now) <= cutoff) {
      this.recentThreats.shift();
    }
  }

  private internalFault(incident: Incident, score: ThreatScore | undefined, error: unknown): ResponseAction {
    const message = `Pipeline fault on incident ${incident.id}: ${describeError(error)}`;
    this.faults.record('InternalFault', message, { incidentId: incident.id });
    this.log.error('pipeline fault', error, { incidentId: incident.id });

    const action = this.policy.faultAlert(incident, score, describeError(error));
    this.audit.append('DECISION', {
      actionId: action.id,
      kind: action.kind,
      cost: 0,
      justification: action.justification,
    }, incident.id);
    this.callbacks.onDecision?.(action, score);
    this.launch(action);
    return action;
  }
}

function parseActionKind(kind: string): ActionKind | undefined {
  switch (kind) {
    case 'noaction':
    case 'alert':
    case 'deceive':
    case 'isolate':
    case 'block':
      return kind;
    default:
      return undefined;
  }
}
