/**
 * Threshold evaluation and partition routing for classified items.
 * Pure: the threshold is always passed in, taken from the policy the item was claimed under.
 */

import type { RatingMap, TerminalPartition } from '../types/models.js';

export interface RatingSummary {
  /** Highest rating, 0 for an empty mapping. */
  maxRateScore: number;
  /** Dimension holding the highest rating (first on ties), '' for an empty mapping. */
  maxRateClass: string;
}

export interface RouteDecision extends RatingSummary {
  partition: TerminalPartition;
}

export function summarizeRating(rate: RatingMap): RatingSummary {
  let maxRateScore = 0;
  let maxRateClass = '';
  for (const [dimension, score] of Object.entries(rate)) {
    if (maxRateClass === '' || score > maxRateScore) {
      maxRateScore = score;
      maxRateClass = dimension;
    }
  }
  return { maxRateScore, maxRateClass };
}

export function route(rate: RatingMap, threshold: number): RouteDecision {
  const summary = summarizeRating(rate);
  return {
    ...summary,
    partition: summary.maxRateScore >= threshold ? 'archived' : 'low_value',
  };
}
