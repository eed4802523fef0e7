/**
 * Peer Trust
 * ==========
 *
 * Tracks how far a peer's intelligence is believed. New peers start at
 * `newPeerTrust`; verified messages nudge trust up, unverifiable ones
 * cut it down. Trust only weights corroboration, it never excludes.
 */

import {
  DefenseConfig,
  DEFAULT_CONFIG,
  NodeId,
  TrustScore,
} from '../types/index.js';

const ACCEPT_REWARD = 0.02;
const REJECT_PENALTY = 0.2;

export class TrustStore {
  private scores = new Map<NodeId, TrustScore>();
  private config: DefenseConfig;

  constructor(config: Partial<DefenseConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Initialize or touch tracking for a peer
   */
  track(nodeId: NodeId, now = Date.now()): TrustScore {
    const existing = this.scores.get(nodeId);
    if (existing) {
      existing.lastUpdated = now;
      return existing;
    }

    const score: TrustScore = {
      nodeId,
      score: this.config.newPeerTrust,
      accepted: 0,
      rejected: 0,
      lastUpdated: now,
    };
    this.scores.set(nodeId, score);
    return score;
  }

  /**
   * A message from this peer verified
   */
  recordAccepted(nodeId: NodeId, now = Date.now()): void {
    const score = this.track(nodeId, now);
    score.accepted++;
    score.score = Math.min(1.0, score.score + ACCEPT_REWARD);
  }

  /**
   * A message relayed by this peer failed verification
   */
  recordRejected(nodeId: NodeId, now = Date.now()): void {
    const score = this.track(nodeId, now);
    score.rejected++;
    score.score = Math.max(0, score.score - REJECT_PENALTY);
  }

  trust(nodeId: NodeId): number {
    return this.scores.get(nodeId)?.score ?? this.config.newPeerTrust;
  }

  get(nodeId: NodeId): TrustScore | undefined {
    const score = this.scores.get(nodeId);
    return score ? { ...score } : undefined;
  }

  /**
   * Prune peers not heard from in maxAge
   */
  prune(maxAge: number, now = Date.now()): NodeId[] {
    const pruned: NodeId[] = [];
    for (const [nodeId, score] of this.scores) {
      if (now - score.lastUpdated > maxAge) {
        this.scores.delete(nodeId);
        pruned.push(nodeId);
      }
    }
    return pruned;
  }

  /**
   * All tracked peers, most trusted first
   */
  getAll(): TrustScore[] {
    return Array.from(this.scores.values())
      .map(s => ({ ...s }))
      .sort((a, b) => b.score - a.score || (a.nodeId < b.nodeId ? -1 : 1));
  }

  export(): TrustScore[] {
    return this.getAll();
  }
}
