/**
 * Threat Intel Store
 * ==================
 *
 * Verified peer digests, indexed by entity hash. Feeds the scorer's
 * `peer_corroboration` feature and nothing else.
 *
 * Per entity each peer keeps its latest report. A peer contributes
 * peakScore × trust for the entities it has seen; contributions from
 * different peers combine as 1 - Π(1 - c).
 */

import {
  DefenseConfig,
  DEFAULT_CONFIG,
  EntityId,
  FederationMessage,
  NodeId,
} from '../types/index.js';
import { CorroborationSource } from '../scorer.js';
import { hashString, nowMs } from '../util/hash.js';

interface PeerReport {
  nodeId: NodeId;
  peakScore: number;
  trust: number;
  receivedAt: number;
}

/**
 * Entity identifiers never leave the node in the clear
 */
export function hashEntity(entity: EntityId): string {
  return hashString(`entity:${entity}`);
}

export class ThreatIntelStore implements CorroborationSource {
  private byEntity = new Map<string, Map<NodeId, PeerReport>>();
  private config: DefenseConfig;

  constructor(config: Partial<DefenseConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Index a verified message, weighted by the origin's trust
   */
  record(message: FederationMessage, trust: number, now = nowMs()): number {
    let indexed = 0;
    for (const digest of message.incidentDigest) {
      for (const entityHash of digest.entityHashes) {
        let reports = this.byEntity.get(entityHash);
        if (!reports) {
          reports = new Map();
          this.byEntity.set(entityHash, reports);
        }
        reports.set(message.nodeId, {
          nodeId: message.nodeId,
          peakScore: digest.peakScore,
          trust,
          receivedAt: now,
        });
        indexed++;
      }
    }
    return indexed;
  }

  corroboration(entities: Iterable<EntityId>, now = nowMs()): number {
    const perPeer = new Map<NodeId, number>();

    for (const entity of entities) {
      const reports = this.byEntity.get(hashEntity(entity));
      if (!reports) continue;
      for (const report of reports.values()) {
        if (now - report.receivedAt > this.config.corroborationTtlMs) continue;
        const c = Math.max(0, Math.min(1, report.peakScore * report.trust));
        perPeer.set(report.nodeId, Math.max(perPeer.get(report.nodeId) ?? 0, c));
      }
    }

    let miss = 1;
    for (const c of perPeer.values()) miss *= 1 - c;
    return 1 - miss;
  }

  /**
   * Peers that reported on any of these entities, still within TTL
   */
  reporters(entities: Iterable<EntityId>, now = nowMs()): NodeId[] {
    const out = new Set<NodeId>();
    for (const entity of entities) {
      for (const report of this.byEntity.get(hashEntity(entity))?.values() ?? []) {
        if (now - report.receivedAt <= this.config.corroborationTtlMs) out.add(report.nodeId);
      }
    }
    return Array.from(out).sort();
  }

  /**
   * Drop expired reports
   */
  prune(now = nowMs()): number {
    let removed = 0;
    for (const [entityHash, reports] of this.byEntity) {
      for (const [nodeId, report] of reports) {
        if (now - report.receivedAt > this.config.corroborationTtlMs) {
          reports.delete(nodeId);
          removed++;
        }
      }
      if (reports.size === 0) this.byEntity.delete(entityHash);
    }
    return removed;
  }

  get size(): number {
    return this.byEntity.size;
  }
}
