/**
 * Bandit Stat Store
 *
 * Per (caption, creator) ledger of decayed outcome counts. Counts shrink
 * toward zero between observations, which the sampler reads as the uniform
 * Beta(1,1) prior; rows are never deleted.
 */

import type { BanditStat } from '../types/models.js';
import type { BanditStatRepository } from './store/types.js';
import { WilsonScorer } from './wilson-scorer.service.js';

export interface BatchObservation {
  new_successes: number;
  new_failures: number;
  observations: number;
  emv_sum: number;
  revenue: number;
  last_emv: number;
}

export interface FoldOptions {
  decay: number;
  cap: number;
  confidence: number;
  now: Date;
}

export function statKey(captionId: string, creatorId: string): string {
  return `${creatorId}::${captionId}`;
}

export class BanditStatStore {
  constructor(private readonly repository: BanditStatRepository) {}

  /**
   * Uniform prior used when a pair has never been observed
   */
  static prior(captionId: string, creatorId: string): BanditStat {
    const bounds = WilsonScorer.bounds(1, 1);
    return {
      caption_id: captionId,
      creator_id: creatorId,
      successes: 1,
      failures: 1,
      total_observations: 0,
      avg_emv: 0,
      total_revenue: 0,
      last_emv_observed: null,
      confidence_lower: bounds.lower,
      confidence_upper: bounds.upper,
      exploration_bonus: bounds.exploration_bonus,
      performance_percentile: null,
      last_updated: null,
    };
  }

  /**
   * Per-update decay so that weight halves every halfLifeDays
   */
  static decayFactor(halfLifeDays: number, updatesPerDay: number): number {
    const updates = halfLifeDays * updatesPerDay;
    if (!(updates > 0)) return 1;
    return Math.pow(0.5, 1 / updates);
  }

  /**
   * Decay a ledger row once and fold in an optional batch of observations
   */
  static fold(stat: BanditStat, observation: BatchObservation | null, options: FoldOptions): BanditStat {
    const { decay, cap, confidence, now } = options;
    const decayedSuccesses = Math.max(0, stat.successes) * decay;
    const decayedFailures = Math.max(0, stat.failures) * decay;

    const successes = Math.min(cap, Math.max(0, decayedSuccesses + (observation?.new_successes ?? 0)));
    const failures = Math.min(cap, Math.max(0, decayedFailures + (observation?.new_failures ?? 0)));
    const bounds = WilsonScorer.bounds(successes, failures, confidence);

    let avgEmv = stat.avg_emv;
    if (observation && observation.observations > 0) {
      if (stat.total_observations === 0) {
        avgEmv = observation.emv_sum / observation.observations;
      } else {
        const priorWeight = decayedSuccesses + decayedFailures;
        avgEmv = (stat.avg_emv * priorWeight + observation.emv_sum) / (priorWeight + observation.observations);
      }
    }

    return {
      ...stat,
      successes,
      failures,
      total_observations: stat.total_observations + (observation?.observations ?? 0),
      avg_emv: avgEmv,
      total_revenue: stat.total_revenue + (observation?.revenue ?? 0),
      last_emv_observed: observation ? observation.last_emv : stat.last_emv_observed,
      confidence_lower: bounds.lower,
      confidence_upper: bounds.upper,
      exploration_bonus: bounds.exploration_bonus,
      last_updated: now,
    };
  }

  /**
   * PERCENT_RANK of avg_emv within each creator, scaled to 0-100
   */
  static assignPercentiles(stats: BanditStat[]): BanditStat[] {
    const byCreator = new Map<string, BanditStat[]>();
    for (const stat of stats) {
      const list = byCreator.get(stat.creator_id) ?? [];
      list.push(stat);
      byCreator.set(stat.creator_id, list);
    }

    const percentiles = new Map<string, number>();
    for (const list of byCreator.values()) {
      const sorted = list.map((s) => s.avg_emv).sort((a, b) => a - b);
      for (const stat of list) {
        if (list.length === 1) {
          percentiles.set(statKey(stat.caption_id, stat.creator_id), 0);
          continue;
        }
        const below = sorted.findIndex((value) => value >= stat.avg_emv);
        percentiles.set(
          statKey(stat.caption_id, stat.creator_id),
          Math.floor((below / (list.length - 1)) * 100)
        );
      }
    }

    return stats.map((stat) => ({
      ...stat,
      performance_percentile: percentiles.get(statKey(stat.caption_id, stat.creator_id)) ?? null,
    }));
  }

  /**
   * Ledger rows for a creator keyed by caption id; missing pairs are not filled
   */
  async getForCreator(creatorId: string): Promise<Map<string, BanditStat>> {
    const rows = await this.repository.listForCreator(creatorId);
    return new Map(rows.map((row) => [row.caption_id, row]));
  }

  async listAll(): Promise<BanditStat[]> {
    return this.repository.listAll();
  }

  async saveAll(stats: BanditStat[]): Promise<number> {
    if (stats.length === 0) return 0;
    return this.repository.upsertMany(stats);
  }
}
