/**
 * Core Types for the Defense Mesh
 * ===============================
 *
 * These types define the signals, incidents, scores, actions and
 * federation messages that flow through a defense node.
 */

// =============================================================================
// IDENTITY
// =============================================================================

export type NodeId = string;
export type EntityId = string;
export type IncidentId = number;

// =============================================================================
// SIGNALS
// =============================================================================

export type AttributeValue = string | number | boolean | string[];

export interface Signal {
  id: string;
  sourceEntity: EntityId;
  kind: string;
  timestamp: number;
  attributes: Readonly<Record<string, AttributeValue>>;
  confidence: number;      // 0.0 - 1.0
}

export type IngestRejection = 'DuplicateSignal' | 'MalformedSignal';

export type IngestResult =
  | { accepted: true; signal: Signal }
  | { accepted: false; reason: IngestRejection; detail: string };

export interface SignalDropped {
  signalId: string;
  sourceEntity: EntityId;
  droppedAt: number;
  pending: number;
}

// =============================================================================
// INCIDENTS
// =============================================================================

/**
 * Lifecycle driven by the policy engine. Closed is terminal.
 */
export enum IncidentState {
  OPEN = 'open',
  EVALUATED = 'evaluated',
  ACTIONED = 'actioned',
  CLOSED = 'closed',
}

export type CloseReason = 'window_expired' | 'terminal_action' | 'shutdown';

/**
 * Read-only view handed out by the correlator.
 */
export interface Incident {
  readonly id: IncidentId;
  readonly memberSignalIds: ReadonlySet<string>;
  readonly firstSeen: number;
  readonly lastSeen: number;
  readonly affectedEntities: ReadonlySet<EntityId>;
  readonly state: IncidentState;
  readonly version: number;
  readonly closeReason?: CloseReason;
}

// =============================================================================
// SCORING
// =============================================================================

export type FeatureMap = Record<string, number>;

export interface ScoreFactor {
  name: string;
  value: number;
  weight: number;
}

export interface ThreatScore {
  id: string;
  incidentId: IncidentId;
  incidentVersion: number;
  value: number;           // 0.0 - 1.0
  contributingFactors: ScoreFactor[];
  computedAt: number;
  degraded: boolean;       // true when the scoring capability failed
}

// =============================================================================
// RESPONSE ACTIONS
// =============================================================================

export type ActionKind = 'noaction' | 'alert' | 'deceive' | 'isolate' | 'block';

/**
 * Restrictiveness order. Legal downgrades move left, never right.
 */
export const ACTION_SEVERITY_ORDER: readonly ActionKind[] = [
  'noaction',
  'alert',
  'deceive',
  'isolate',
  'block',
];

export type BlockScope = 'host' | 'segment' | 'network';

export interface Justification {
  scoreId: string;
  ruleId: string;
  policyVersion: string;
  reason: string;
}

interface ActionBase {
  id: string;
  incidentId: IncidentId;
  justification: Justification;
  issuedAt: number;
}

export type ResponseAction =
  | (ActionBase & { kind: 'alert'; severity: number; summary: string })
  | (ActionBase & { kind: 'isolate'; targetEntity: EntityId; durationMs: number })
  | (ActionBase & { kind: 'deceive'; targetEntity: EntityId; profileId: string })
  | (ActionBase & { kind: 'block'; targetEntity: EntityId; scope: BlockScope })
  | (ActionBase & { kind: 'noaction' });

export type OutcomeStatus = 'success' | 'failed' | 'partially_applied';

/**
 * Why a dispatch was turned away before any handler ran
 */
export type DispatchRefusal = 'saturated' | 'stopped';

export interface Outcome {
  status: OutcomeStatus;
  reason?: string;
  transient?: boolean;
  refusal?: DispatchRefusal;
}

export interface DispatchRecord {
  actionId: string;
  incidentId: IncidentId;
  kind: ActionKind;
  outcome: Outcome;
  attempts: number;
  completedAt: number;
}

// =============================================================================
// POLICY
// =============================================================================

export interface PolicyRule {
  id: string;
  minSeverity: number;
  maxSeverity: number;
  allowedActions: ReadonlySet<ActionKind>;
  resourceCost: number;
  legalConstraintTag: string;
  blockScope?: BlockScope;
}

export interface PolicySet {
  version: string;
  rules: readonly PolicyRule[];
}

export interface PolicyDecision {
  incidentId: IncidentId;
  score: ThreatScore;
  rule: PolicyRule;
  action: ResponseAction;
  cost: number;
  decidedAt: number;
  /** Automated action the policy chose but did not dispatch */
  withheld?: ActionKind;
}

/**
 * Response intensity. Passive withholds automated actions, paranoid biases
 * rule selection upward.
 */
export type DefenseLevel = 'passive' | 'standard' | 'paranoid';

// =============================================================================
// FEDERATION
// =============================================================================

export interface IncidentDigest {
  incidentId: IncidentId;
  entityHashes: string[];
  kinds: string[];
  signalCount: number;
  firstSeen: number;
  lastSeen: number;
  peakScore: number;
}

export interface ScoreSummary {
  closedCount: number;
  meanScore: number;
  maxScore: number;
}

export interface FederationMessage {
  messageId: string;
  nodeId: NodeId;
  sentAt: number;
  incidentDigest: IncidentDigest[];
  scoreSummary: ScoreSummary;
  signature: string;
}

export interface FederationEnvelope {
  type: 'FEDERATION_SUMMARY';
  from: NodeId;
  hops: number;
  message: FederationMessage;
}

export interface FederationTransport {
  id: NodeId;
  send(to: NodeId, envelope: FederationEnvelope): void;
  onMessage(handler: (envelope: FederationEnvelope) => void): void;
  peers(): NodeId[];
}

export interface TrustScore {
  nodeId: NodeId;
  score: number;           // 0.0 - 1.0
  accepted: number;
  rejected: number;
  lastUpdated: number;
}

// =============================================================================
// AUDIT
// =============================================================================

export type LogKind =
  | 'SIGNAL_ACCEPTED'
  | 'SIGNAL_REJECTED'
  | 'SIGNAL_DROPPED'
  | 'INCIDENT_OPENED'
  | 'INCIDENT_MERGED'
  | 'INCIDENT_CLOSED'
  | 'SCORE'
  | 'DECISION'
  | 'DISPATCH'
  | 'FAULT'
  | 'FED_OUT'
  | 'FED_IN'
  | 'FED_REJECTED'
  | 'ACTION';

export interface LogEntry {
  i: number;
  ts: number;
  kind: LogKind;
  incidentId?: IncidentId;
  data: unknown;
  prev: string | null;
  hash: string;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface DefenseConfig {
  // Signal bus
  maxPendingPerEntity: number;
  maxSeenSignals: number;

  // Correlation
  windowMs: number;
  sweepIntervalMs: number;
  entityAttributes: string[];
  maxClosedIncidents: number;

  // Scoring
  maxScoreHistory: number;

  // Policy
  alertThreshold: number;
  resourceCapacity: number;
  replenishIntervalMs: number;
  replenishAmount: number;
  enabledLegalTags: string[];
  actionLegalTags: Partial<Record<ActionKind, string>>;
  actionCostWeights: Record<ActionKind, number>;
  terminalActions: ActionKind[];
  isolationDurationMs: number;
  deceptionProfiles: Record<string, string>;
  defaultDeceptionProfile: string;
  autonomousResponse: boolean;

  // Defense level
  defenseLevel: DefenseLevel;
  adaptiveDefense: boolean;
  paranoidSeverityBoost: number;
  passiveBudgetRatio: number;
  paranoidThreatCount: number;
  threatVolumeWindowMs: number;

  // Dispatch
  dispatchQueueSize: number;
  dispatchConcurrency: number;
  maxRetries: number;
  retryBaseDelayMs: number;

  // Federation
  gossipIntervalMs: number;
  gossipFanout: number;
  gossipHops: number;
  maxSeenMessages: number;
  newPeerTrust: number;
  corroborationTtlMs: number;
  outboundHistory: number;
}

export const DEFAULT_CONFIG: DefenseConfig = {
  maxPendingPerEntity: 1_000,
  maxSeenSignals: 100_000,
  windowMs: 60_000,
  sweepIntervalMs: 1_000,
  entityAttributes: ['targetEntity', 'dest_ip'],
  maxClosedIncidents: 10_000,
  maxScoreHistory: 50,
  alertThreshold: 0.5,
  resourceCapacity: 100,
  replenishIntervalMs: 60_000,
  replenishAmount: 100,
  enabledLegalTags: ['standard', 'active-deception', 'network-block'],
  actionLegalTags: {
    deceive: 'active-deception',
    block: 'network-block',
  },
  actionCostWeights: {
    noaction: 0,
    alert: 0,
    deceive: 1,
    isolate: 1,
    block: 2,
  },
  terminalActions: ['isolate', 'block'],
  isolationDurationMs: 15 * 60_000,
  deceptionProfiles: {},
  defaultDeceptionProfile: 'generic-decoy',
  autonomousResponse: true,
  defenseLevel: 'standard',
  adaptiveDefense: true,
  paranoidSeverityBoost: 0.1,
  passiveBudgetRatio: 0.1,
  paranoidThreatCount: 20,
  threatVolumeWindowMs: 5 * 60_000,
  dispatchQueueSize: 256,
  dispatchConcurrency: 4,
  maxRetries: 3,
  retryBaseDelayMs: 200,
  gossipIntervalMs: 5_000,
  gossipFanout: 3,
  gossipHops: 4,
  maxSeenMessages: 50_000,
  newPeerTrust: 0.5,
  corroborationTtlMs: 30 * 60_000,
  outboundHistory: 16,
};
