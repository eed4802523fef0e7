/**
 * Heuristic Threat Model
 * ======================
 *
 * Default scoring capability used when no model is injected: a weighted
 * average of confidence, volume, spread and peer corroboration.
 */

import { FeatureMap } from './types/index.js';
import { ScoringCapability } from './scorer.js';

export type HeuristicWeights = {
  mean_confidence: number;
  max_confidence: number;
  signal_count: number;
  entity_count: number;
  peer_corroboration: number;
};

export const DEFAULT_HEURISTIC_WEIGHTS: HeuristicWeights = {
  mean_confidence: 0.35,
  max_confidence: 0.15,
  signal_count: 0.2,
  entity_count: 0.1,
  peer_corroboration: 0.2,
};

export class HeuristicThreatModel implements ScoringCapability {
  private weightTable: HeuristicWeights;

  constructor(
    weights: Partial<HeuristicWeights> = {},
    private kindSeverity: Record<string, number> = {}
  ) {
    this.weightTable = { ...DEFAULT_HEURISTIC_WEIGHTS, ...weights };
  }

  evaluate(features: FeatureMap): number {
    const w = this.weightTable;
    const count = features.signal_count ?? 0;
    const entities = features.entity_count ?? 0;

    // Volume and spread saturate: 5 signals or 5 entities count as "a lot"
    const volume = Math.min(1, count / 5);
    const spread = Math.min(1, Math.max(0, entities - 1) / 4);

    const totalWeight =
      w.mean_confidence + w.max_confidence + w.signal_count + w.entity_count + w.peer_corroboration;
    const base = totalWeight === 0 ? 0 : (
      (features.mean_confidence ?? 0) * w.mean_confidence +
      (features.max_confidence ?? 0) * w.max_confidence +
      volume * w.signal_count +
      spread * w.entity_count +
      (features.peer_corroboration ?? 0) * w.peer_corroboration
    ) / totalWeight;

    const kindScore = this.maxKindSeverity(features);
    if (kindScore === null) {
      return base;
    }
    return 0.7 * base + 0.3 * kindScore;
  }

  weights(): Record<string, number> {
    return { ...this.weightTable };
  }

  private maxKindSeverity(features: FeatureMap): number | null {
    let best: number | null = null;
    for (const [name, share] of Object.entries(features)) {
      if (!name.startsWith('kind:') || share <= 0) continue;
      const severity = this.kindSeverity[name.slice('kind:'.length)];
      if (severity === undefined) continue;
      best = best === null ? severity : Math.max(best, severity);
    }
    return best;
  }
}
