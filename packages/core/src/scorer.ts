/**
 * Scorer
 * ======
 *
 * Turns an incident into a ThreatScore. Features are assembled from the
 * member signals and peer corroboration; the value itself comes from an
 * injected scoring capability (the model lives outside the engine).
 *
 * A capability that throws, rejects or returns a non-finite value yields
 * a degraded score of 0 and a ScoringUnavailable fault.
 */

import {
  DefenseConfig,
  DEFAULT_CONFIG,
  EntityId,
  FeatureMap,
  Incident,
  IncidentId,
  IncidentState,
  ScoreFactor,
  Signal,
  ThreatScore,
} from './types/index.js';
import { ClosedIncidentError, FaultLog, describeError } from './errors.js';
import { nowMs } from './util/hash.js';
import { logger } from './util/logger.js';

export interface ScoringCapability {
  evaluate(features: FeatureMap): number | Promise<number>;
  /** Optional per-feature weights, reported as contributing factors */
  weights?(): Record<string, number>;
}

export interface CorroborationSource {
  corroboration(entities: Iterable<EntityId>, now?: number): number;
}

export interface MemberSource {
  membersOf(id: IncidentId): Signal[];
}

interface CacheEntry {
  version: number;
  corroboration: number;
  score: ThreatScore;
}

function clamp01(x: number): number {
  return Math.max(0, Math.min(1, x));
}

/**
 * Build the feature map for an incident
 */
export function assembleFeatures(
  incident: Incident,
  members: Signal[],
  corroboration: number
): FeatureMap {
  const n = members.length;
  const features: FeatureMap = {
    signal_count: n,
    entity_count: incident.affectedEntities.size,
    duration_ms: incident.lastSeen - incident.firstSeen,
    peer_corroboration: corroboration,
  };

  let sum = 0;
  let max = 0;
  const kinds = new Map<string, number>();
  const numeric = new Map<string, { sum: number; count: number }>();

  for (const signal of members) {
    sum += signal.confidence;
    max = Math.max(max, signal.confidence);
    kinds.set(signal.kind, (kinds.get(signal.kind) ?? 0) + 1);

    for (const [key, value] of Object.entries(signal.attributes)) {
      if (typeof value !== 'number' || !Number.isFinite(value)) continue;
      const acc = numeric.get(key) ?? { sum: 0, count: 0 };
      acc.sum += value;
      acc.count++;
      numeric.set(key, acc);
    }
  }

  features.mean_confidence = n > 0 ? sum / n : 0;
  features.max_confidence = max;
  for (const [kind, count] of kinds) {
    features[`kind:${kind}`] = count / n;
  }
  for (const [key, acc] of numeric) {
    features[`attr:${key}`] = acc.sum / acc.count;
  }
  return features;
}

export class Scorer {
  private cache = new Map<IncidentId, CacheEntry>();
  private histories = new Map<IncidentId, ThreatScore[]>();
  private counter = 0;
  private config: DefenseConfig;

  constructor(
    private capability: ScoringCapability,
    private members: MemberSource,
    private options: {
      corroboration?: CorroborationSource;
      faults?: FaultLog;
      config?: Partial<DefenseConfig>;
    } = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
  }

  /**
   * Score an incident; rejects for closed incidents
   */
  async score(incident: Incident, now = nowMs()): Promise<ThreatScore> {
    if (incident.state === IncidentState.CLOSED) {
      throw new ClosedIncidentError(incident.id);
    }

    const corroboration = clamp01(
      this.options.corroboration?.corroboration(incident.affectedEntities, now) ?? 0
    );

    const cached = this.cache.get(incident.id);
    if (cached && cached.version === incident.version && cached.corroboration === corroboration) {
      return cached.score;
    }

    const features = assembleFeatures(incident, this.members.membersOf(incident.id), corroboration);

    let value = 0;
    let degraded = false;
    try {
      const raw = await this.capability.evaluate(features);
      if (!Number.isFinite(raw)) {
        throw new Error(`non-finite score ${raw}`);
      }
      value = clamp01(raw);
    } catch (error) {
      degraded = true;
      const message = `Scoring unavailable for incident ${incident.id}: ${describeError(error)}`;
      this.options.faults?.record('ScoringUnavailable', message, { incidentId: incident.id });
      logger.warn('scoring capability failed', { incidentId: incident.id, error: describeError(error) });
    }

    const score: ThreatScore = Object.freeze({
      id: `score-${incident.id}-${++this.counter}`,
      incidentId: incident.id,
      incidentVersion: incident.version,
      value,
      contributingFactors: this.factors(features),
      computedAt: now,
      degraded,
    });

    // Degraded scores are retried next time rather than cached
    if (!degraded) {
      this.cache.set(incident.id, { version: incident.version, corroboration, score });
    }
    this.remember(score);
    return score;
  }

  /**
   * Score history for an incident, oldest first
   */
  history(id: IncidentId): ThreatScore[] {
    return [...(this.histories.get(id) ?? [])];
  }

  latest(id: IncidentId): ThreatScore | undefined {
    const h = this.histories.get(id);
    return h?.[h.length - 1];
  }

  /**
   * Fold an absorbed incident's history into the survivor's
   */
  merge(survivor: IncidentId, absorbed: IncidentId): void {
    const from = this.histories.get(absorbed) ?? [];
    const into = this.histories.get(survivor) ?? [];
    this.histories.set(
      survivor,
      [...into, ...from].sort((a, b) => a.computedAt - b.computedAt).slice(-this.config.maxScoreHistory)
    );
    this.histories.delete(absorbed);
    this.cache.delete(absorbed);
    this.cache.delete(survivor);
  }

  forget(id: IncidentId): void {
    this.cache.delete(id);
    this.histories.delete(id);
  }

  private factors(features: FeatureMap): ScoreFactor[] {
    const weights = this.capability.weights?.() ?? {};
    return Object.keys(features)
      .sort()
      .map(name => ({ name, value: features[name] ?? 0, weight: weights[name] ?? 1 }));
  }

  private remember(score: ThreatScore): void {
    const h = this.histories.get(score.incidentId) ?? [];
    h.push(score);
    if (h.length > this.config.maxScoreHistory) {
      h.splice(0, h.length - this.config.maxScoreHistory);
    }
    this.histories.set(score.incidentId, h);
  }
}
