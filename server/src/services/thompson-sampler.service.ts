/**
 * Thompson Sampler
 *
 * Approximates a Beta(successes+1, failures+1) draw with a normal sample
 * (Box-Muller) and blends it with the 95% Wilson lower bound.
 */

import { defaultRandom, type RandomSource } from '../utils/random.js';
import { WilsonScorer } from './wilson-scorer.service.js';

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export class ThompsonSampler {
  constructor(private readonly random: RandomSource = defaultRandom) {}

  /**
   * Standard normal variate from two uniform draws
   */
  standardNormal(): number {
    // 1 - U keeps u1 in (0, 1] so the log is finite
    const u1 = 1 - this.random();
    const u2 = this.random();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }

  sample(successes: number, failures: number, explorationRate: number): number {
    const alpha = Math.max(0, successes) + 1;
    const beta = Math.max(0, failures) + 1;
    const total = alpha + beta;

    const mean = alpha / total;
    const variance = (alpha * beta) / (total * total * (total + 1));
    const draw = clamp01(mean + Math.sqrt(variance) * this.standardNormal());

    const rate = clamp01(explorationRate);
    const { lower } = WilsonScorer.bounds(successes, failures, 0.95);

    return clamp01(draw * rate + lower * (1 - rate));
  }
}
