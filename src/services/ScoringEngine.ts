/**
 * Weighted total score for classified items.
 * total = sum(rating[dim] * weight[dim]) * multiplier[taxonomy], clamped to 0–100, one decimal.
 * Informational only: routing uses the maximum rating, not this score.
 */

import type { RatingMap } from '../types/models.js';

export interface ScoringConfig {
  weights: Record<string, number>;
  multipliers: Record<string, number>;
  /** Applied to taxonomies missing from `multipliers`. */
  defaultMultiplier: number;
}

export const DEFAULT_SCORING: ScoringConfig = {
  weights: {
    impact_severity: 3.5,
    impact_scope: 3.0,
    evolution_potential: 2.0,
    sentiment_potential: 1.0,
    novelty: 0.5,
    actionability: 0,
  },
  multipliers: {
    politics_security: 1.2,
    economy_finance: 1.1,
    technology_cyber: 1.0,
    society_environment: 1.0,
    non_intelligence: 0,
  },
  defaultMultiplier: 1.0,
};

export class ScoringEngine {
  constructor(private readonly config: ScoringConfig = DEFAULT_SCORING) {}

  score(rate: RatingMap, taxonomy: string | null): number {
    let raw = 0;
    for (const [dimension, weight] of Object.entries(this.config.weights)) {
      raw += (rate[dimension] ?? 0) * weight;
    }

    const multiplier =
      taxonomy !== null && Object.hasOwn(this.config.multipliers, taxonomy)
        ? this.config.multipliers[taxonomy]
        : this.config.defaultMultiplier;

    const total = Math.round(raw * multiplier * 10) / 10;
    return Math.min(100, Math.max(0, total));
  }
}
