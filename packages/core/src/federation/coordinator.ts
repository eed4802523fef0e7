/**
 * Federation Coordinator
 * ======================
 *
 * Gossips signed summaries of closed incidents between nodes.
 *
 * Outbound: on its own timer, digests of incidents closed since the last
 * publish are signed and sent to a random subset of reachable peers.
 *
 * Inbound: exact duplicates drop silently; unverifiable messages are discarded,
 * counted, and cost the relaying peer trust; verified messages feed the
 * threat intel store and travel on while hops remain.
 *
 * A failed send marks the peer unreachable. When it is heard from again,
 * recent outbound history is replayed to it.
 */

import { z } from 'zod';
import {
  DefenseConfig,
  DEFAULT_CONFIG,
  FederationEnvelope,
  FederationMessage,
  FederationTransport,
  Incident,
  IncidentDigest,
  NodeId,
  ScoreSummary,
  Signal,
} from '../types/index.js';
import { FaultLog, describeError } from '../errors.js';
import { hashJson, nowMs } from '../util/hash.js';
import { logger } from '../util/logger.js';
import { SignatureCapability, signMessage, verifyMessage } from './signature.js';
import { ThreatIntelStore, hashEntity } from './intel.js';
import { TrustStore } from './trust.js';

const IncidentDigestZ = z.object({
  incidentId: z.number(),
  entityHashes: z.array(z.string()),
  kinds: z.array(z.string()),
  signalCount: z.number().int().nonnegative(),
  firstSeen: z.number(),
  lastSeen: z.number(),
  peakScore: z.number().min(0).max(1),
});

const FederationEnvelopeZ = z.object({
  type: z.literal('FEDERATION_SUMMARY'),
  from: z.string().min(1),
  hops: z.number().int(),
  message: z.object({
    messageId: z.string().min(1),
    nodeId: z.string().min(1),
    sentAt: z.number(),
    incidentDigest: z.array(IncidentDigestZ),
    scoreSummary: z.object({
      closedCount: z.number().int().nonnegative(),
      meanScore: z.number(),
      maxScore: z.number(),
    }),
    signature: z.string(),
  }),
});

export type EnvelopeVerdict = 'accepted' | 'duplicate' | 'rejected';

export interface FederationCallbacks {
  onPublished?: (message: FederationMessage, peers: NodeId[]) => void;
  onAccepted?: (message: FederationMessage, from: NodeId) => void;
  onRejected?: (envelope: unknown, from: NodeId, reason: string) => void;
  onPeerUnreachable?: (peer: NodeId) => void;
  onPeerReachable?: (peer: NodeId) => void;
}

export interface FederationStats {
  published: number;
  accepted: number;
  rejected: number;
  duplicates: number;
  forwarded: number;
  sendFailures: number;
  replayed: number;
}

export class FederationCoordinator {
  private pending: IncidentDigest[] = [];
  private history: FederationMessage[] = [];
  private seen = new Set<string>();
  private unreachable = new Set<NodeId>();
  private callbacks: FederationCallbacks = {};
  private timer: ReturnType<typeof setInterval> | null = null;
  private counter = 0;
  private config: DefenseConfig;
  private faults?: FaultLog;
  private random: () => number;
  private stats: FederationStats = {
    published: 0,
    accepted: 0,
    rejected: 0,
    duplicates: 0,
    forwarded: 0,
    sendFailures: 0,
    replayed: 0,
  };

  constructor(
    private transport: FederationTransport,
    private signer: SignatureCapability,
    readonly trust: TrustStore,
    readonly intel: ThreatIntelStore,
    options: { config?: Partial<DefenseConfig>; faults?: FaultLog; random?: () => number } = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.faults = options.faults;
    this.random = options.random ?? Math.random;

    this.transport.onMessage(envelope => {
      this.handleEnvelope(envelope).catch(error => {
        logger.error('federation handler failed', error);
      });
    });
  }

  get nodeId(): NodeId {
    return this.signer.nodeId;
  }

  setCallbacks(callbacks: FederationCallbacks): void {
    this.callbacks = { ...this.callbacks, ...callbacks };
  }

  /**
   * Start the gossip timer
   */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.publish().catch(error => {
        logger.error('federation publish failed', error);
      });
    }, this.config.gossipIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Queue a locally closed incident for the next publish
   */
  noteClosed(incident: Incident, members: Signal[], peakScore: number): IncidentDigest {
    const digest: IncidentDigest = {
      incidentId: incident.id,
      entityHashes: Array.from(incident.affectedEntities).sort().map(hashEntity),
      kinds: Array.from(new Set(members.map(s => s.kind))).sort(),
      signalCount: incident.memberSignalIds.size,
      firstSeen: incident.firstSeen,
      lastSeen: incident.lastSeen,
      peakScore: Math.max(0, Math.min(1, peakScore)),
    };
    this.pending.push(digest);
    return digest;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Sign and gossip what closed since the last publish. Nothing to say, nothing sent.
   */
  async publish(now = nowMs()): Promise<FederationMessage | null> {
    if (this.pending.length === 0) return null;

    const digests = this.pending;
    this.pending = [];

    const message = await signMessage(
      {
        messageId: `${this.nodeId.slice(0, 8)}-${++this.counter}-${now}`,
        nodeId: this.nodeId,
        sentAt: now,
        incidentDigest: digests,
        scoreSummary: summarize(digests),
      },
      this.signer
    );

    this.markSeen(this.seenKey(message));
    this.history.push(message);
    if (this.history.length > this.config.outboundHistory) {
      this.history.splice(0, this.history.length - this.config.outboundHistory);
    }

    const envelope: FederationEnvelope = {
      type: 'FEDERATION_SUMMARY',
      from: this.nodeId,
      hops: this.config.gossipHops,
      message,
    };
    const sentTo = this.fanout(envelope, new Set([this.nodeId]));

    this.stats.published++;
    logger.debug('federation summary published', { messageId: message.messageId, peers: sentTo.length });
    this.callbacks.onPublished?.(message, sentTo);
    return message;
  }

  /**
   * Process one inbound envelope
   */
  async handleEnvelope(input: unknown, now = nowMs()): Promise<EnvelopeVerdict> {
    const parsed = FederationEnvelopeZ.safeParse(input);
    if (!parsed.success) {
      const from = z.object({ from: z.string() }).safeParse(input);
      const sender = from.success ? from.data.from : 'unknown';
      this.reject(input, sender, `malformed envelope: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return 'rejected';
    }

    const envelope: FederationEnvelope = parsed.data;
    const { message, from } = envelope;

    if (this.unreachable.has(from)) {
      this.reconnect(from);
    }

    const key = this.seenKey(message);
    if (this.seen.has(key) || message.nodeId === this.nodeId) {
      this.stats.duplicates++;
      return 'duplicate';
    }
    this.markSeen(key);

    let verified = false;
    try {
      verified = await verifyMessage(message, this.signer);
    } catch (error) {
      logger.warn('signature capability failed', { error: describeError(error) });
    }
    if (!verified) {
      this.trust.recordRejected(from, now);
      this.reject(envelope, from, 'signature verification failed');
      return 'rejected';
    }

    this.trust.recordAccepted(message.nodeId, now);
    this.intel.record(message, this.trust.trust(message.nodeId), now);
    this.stats.accepted++;

    if (envelope.hops > 1) {
      const forwarded: FederationEnvelope = { ...envelope, from: this.nodeId, hops: envelope.hops - 1 };
      this.stats.forwarded += this.fanout(forwarded, new Set([this.nodeId, from, message.nodeId])).length;
    }

    this.callbacks.onAccepted?.(message, from);
    return 'accepted';
  }

  reachablePeers(): NodeId[] {
    return this.transport.peers().filter(p => !this.unreachable.has(p)).sort();
  }

  unreachablePeers(): NodeId[] {
    return Array.from(this.unreachable).sort();
  }

  getStats(): FederationStats {
    return { ...this.stats };
  }

  // ---------------------------------------------------------------------------

  /**
   * Send to a random subset of reachable peers; returns who got it
   */
  private fanout(envelope: FederationEnvelope, exclude: Set<NodeId>): NodeId[] {
    const candidates = this.reachablePeers().filter(p => !exclude.has(p));

    // Fisher-Yates, drawing from the injected source
    for (let i = candidates.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      const a = candidates[i];
      const b = candidates[j];
      if (a === undefined || b === undefined) continue;
      candidates[i] = b;
      candidates[j] = a;
    }

    const sent: NodeId[] = [];
    for (const peer of candidates.slice(0, this.config.gossipFanout)) {
      if (this.sendTo(peer, envelope)) sent.push(peer);
    }
    return sent;
  }

  private sendTo(peer: NodeId, envelope: FederationEnvelope): boolean {
    try {
      this.transport.send(peer, envelope);
      return true;
    } catch (error) {
      this.stats.sendFailures++;
      if (!this.unreachable.has(peer)) {
        this.unreachable.add(peer);
        logger.warn('peer unreachable', { peer: peer.slice(0, 8), error: describeError(error) });
        this.callbacks.onPeerUnreachable?.(peer);
      }
      return false;
    }
  }

  /**
   * A peer we had given up on spoke again: replay what it missed
   */
  private reconnect(peer: NodeId): void {
    this.unreachable.delete(peer);
    logger.info('peer reachable again', { peer: peer.slice(0, 8), replay: this.history.length });
    this.callbacks.onPeerReachable?.(peer);

    for (const message of this.history) {
      const envelope: FederationEnvelope = {
        type: 'FEDERATION_SUMMARY',
        from: this.nodeId,
        hops: this.config.gossipHops,
        message,
      };
      if (!this.sendTo(peer, envelope)) break;
      this.stats.replayed++;
    }
  }

  private reject(envelope: unknown, from: NodeId, reason: string): void {
    this.stats.rejected++;
    this.faults?.record('VerificationFailed', `Federation message from ${from.slice(0, 8)} discarded: ${reason}`, {
      details: { from },
    });
    logger.warn('federation message rejected', { from: from.slice(0, 8), reason });
    this.callbacks.onRejected?.(envelope, from, reason);
  }

  /**
   * Keyed on the whole signed content: a tampered copy never shares a key
   * with the genuine message it imitates.
   */
  private seenKey(message: FederationMessage): string {
    return hashJson(message);
  }

  private markSeen(key: string): void {
    this.seen.add(key);

    // Crude eviction when too large
    if (this.seen.size > this.config.maxSeenMessages) {
      const arr = Array.from(this.seen);
      this.seen = new Set(arr.slice(arr.length - Math.floor(this.config.maxSeenMessages * 0.9)));
    }
  }
}

export function summarize(digests: IncidentDigest[]): ScoreSummary {
  if (digests.length === 0) {
    return { closedCount: 0, meanScore: 0, maxScore: 0 };
  }
  let sum = 0;
  let max = 0;
  for (const d of digests) {
    sum += d.peakScore;
    max = Math.max(max, d.peakScore);
  }
  return { closedCount: digests.length, meanScore: sum / digests.length, maxScore: max };
}
