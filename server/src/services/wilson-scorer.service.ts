/**
 * Wilson Scorer
 *
 * Wilson score interval for a success probability given (possibly decayed)
 * success/failure counts. Pure and total: every non-negative input, including
 * zero observations, yields a valid interval.
 */

import type { WilsonBounds } from '../types/selection.js';

const Z_SCORES: Record<string, number> = {
  '0.9': 1.645,
  '0.95': 1.96,
  '0.99': 2.576,
};

const DEFAULT_Z = 1.96;

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function sanitize(count: number): number {
  return Number.isFinite(count) && count > 0 ? count : 0;
}

export class WilsonScorer {
  /**
   * Two-sided normal critical value for a confidence level
   */
  static zForConfidence(confidence: number): number {
    return Z_SCORES[String(confidence)] ?? DEFAULT_Z;
  }

  static bounds(successes: number, failures: number, confidence = 0.95): WilsonBounds {
    const s = sanitize(successes);
    const n = s + sanitize(failures);

    if (n === 0) {
      return { lower: 0, upper: 1, exploration_bonus: 1 };
    }
    if (n === 1) {
      return { lower: 0, upper: 1, exploration_bonus: 0.7 };
    }

    const z = this.zForConfidence(confidence);
    const z2 = z * z;
    const pHat = s / n;
    const centre = pHat + z2 / (2 * n);
    const margin = z * Math.sqrt((pHat * (1 - pHat)) / n + z2 / (4 * n * n));
    const denominator = 1 + z2 / n;

    const lower = clamp01((centre - margin) / denominator);
    const upper = clamp01((centre + margin) / denominator);

    return {
      lower: Math.min(lower, upper),
      upper,
      exploration_bonus: 1 / Math.sqrt(n + 1),
    };
  }
}
