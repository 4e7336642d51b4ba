/**
 * Selection Ranker
 *
 * Scores eligible candidates, fills price-tier quotas, then orders the picks
 * so the creator's feed respects the diversity hard rules.
 */

import type { BanditStat, BehavioralSegment, Caption, PriceTier } from '../types/models.js';
import { PRICE_TIERS } from '../types/models.js';
import type {
  DiversityViolation,
  SaturationStatus,
  SelectionStrategy,
  TierQuotaMap,
  WilsonBounds,
} from '../types/selection.js';
import { BanditStatStore } from './bandit-stat-store.service.js';
import type { BudgetPenalty } from './budget-enforcer.service.js';
import type { FilteredCandidate } from './candidate-filter.service.js';
import { DiversityTracker, type RecentPatternWindow } from './diversity-tracker.service.js';
import { ThompsonSampler } from './thompson-sampler.service.js';
import { WilsonScorer } from './wilson-scorer.service.js';

const WEIGHTS = {
  thompson: 0.7,
  diversity: 0.15,
  emv: 0.15,
  budget: 0.1,
};

const SOFT_PATTERN_PENALTY = -0.1;

export interface RankerOptions {
  explorationRate: number;
  confidenceLevel: number;
}

export interface RankableCandidate extends FilteredCandidate {
  stat: BanditStat | null;
}

export interface RankContext {
  creatorId: string;
  countNeeded: number;
  segment: BehavioralSegment;
  quotas: TierQuotaMap;
  window: RecentPatternWindow;
  saturation?: SaturationStatus;
}

export interface RankedCandidate {
  caption: Caption;
  stat: BanditStat;
  thompson_score: number;
  diversity_bonus: number;
  budget_penalty: BudgetPenalty;
  soft_penalty: number;
  segment_multiplier: number;
  composite_score: number;
  bounds: WilsonBounds;
  strategy: SelectionStrategy;
  diversity_flag?: DiversityViolation[];
}

export interface RankResult {
  selected: RankedCandidate[];
  tier_shortfall: TierQuotaMap;
}

interface RankPick {
  candidate: RankedCandidate;
  fromQuota: boolean;
}

export class SelectionRanker {
  constructor(
    private readonly sampler: ThompsonSampler,
    private readonly options: RankerOptions
  ) {}

  static segmentMultiplier(tier: PriceTier, segment: BehavioralSegment, saturation?: SaturationStatus): number {
    if (saturation === 'OVERSATURATED') return 1;
    if (segment === 'price_insensitive' && (tier === 'premium' || tier === 'luxury')) return 1.3;
    if (segment === 'price_sensitive' && (tier === 'budget' || tier === 'standard')) return 1.2;
    return 1;
  }

  static strategyFor(stat: BanditStat, bounds: WilsonBounds): SelectionStrategy {
    if (stat.total_observations < 10 || bounds.upper - bounds.lower > 0.3) return 'explore';
    if (stat.avg_emv > 25 && bounds.lower > 0.15) return 'exploit';
    return 'balanced';
  }

  /**
   * Composite score descending, fresher data first, then caption id
   */
  static compare(a: RankedCandidate, b: RankedCandidate): number {
    if (b.composite_score !== a.composite_score) return b.composite_score - a.composite_score;
    if (a.stat.total_observations !== b.stat.total_observations) {
      return a.stat.total_observations - b.stat.total_observations;
    }
    if (a.caption.caption_id === b.caption.caption_id) return 0;
    return a.caption.caption_id < b.caption.caption_id ? -1 : 1;
  }

  /**
   * Index of the lowest-ranked pick not holding a quota seat, or -1
   */
  private static lastFreePick(picks: RankPick[]): number {
    for (let i = picks.length - 1; i >= 0; i--) {
      if (!picks[i].fromQuota) return i;
    }
    return -1;
  }

  score(candidate: RankableCandidate, context: RankContext): RankedCandidate {
    const { caption } = candidate;
    const stat = candidate.stat ?? BanditStatStore.prior(caption.caption_id, context.creatorId);

    const thompson = this.sampler.sample(stat.successes, stat.failures, this.options.explorationRate);
    const diversity = DiversityTracker.score(caption, context.window);
    const softPenalty = SOFT_PATTERN_PENALTY * candidate.soft_matches.length;
    const multiplier = SelectionRanker.segmentMultiplier(caption.price_tier, context.segment, context.saturation);

    const composite =
      (WEIGHTS.thompson * thompson +
        WEIGHTS.diversity * diversity +
        WEIGHTS.emv * (stat.avg_emv / 100) +
        WEIGHTS.budget * candidate.budget_penalty +
        softPenalty) *
      multiplier;

    const bounds = WilsonScorer.bounds(stat.successes, stat.failures, this.options.confidenceLevel);

    return {
      caption,
      stat,
      thompson_score: thompson,
      diversity_bonus: diversity,
      budget_penalty: candidate.budget_penalty,
      soft_penalty: softPenalty,
      segment_multiplier: multiplier,
      composite_score: composite,
      bounds,
      strategy: SelectionRanker.strategyFor(stat, bounds),
    };
  }

  rank(candidates: RankableCandidate[], context: RankContext): RankResult {
    const scored = candidates.map((c) => this.score(c, context)).sort(SelectionRanker.compare);
    const { picks, shortfall } = this.pickWithQuotas(scored, context);

    const pickedIds = new Set(picks.map((p) => p.candidate.caption.caption_id));
    const reserve = scored.filter((c) => !pickedIds.has(c.caption.caption_id));

    return {
      selected: this.sequence(picks, reserve, context.window),
      tier_shortfall: shortfall,
    };
  }

  /**
   * Top of each tier up to its quota, then the global order for what is left
   */
  private pickWithQuotas(scored: RankedCandidate[], context: RankContext): { picks: RankPick[]; shortfall: TierQuotaMap } {
    const count = Math.max(0, context.countNeeded);
    const shortfall: TierQuotaMap = {};
    let quotaPicks: RankPick[] = [];

    for (const tier of PRICE_TIERS) {
      const quota = Math.max(0, context.quotas[tier] ?? 0);
      if (quota === 0) continue;
      const inTier = scored.filter((c) => c.caption.price_tier === tier).slice(0, quota);
      quotaPicks.push(...inTier.map((candidate) => ({ candidate, fromQuota: true })));
      if (inTier.length < quota) {
        shortfall[tier] = quota - inTier.length;
      }
    }

    if (quotaPicks.length > count) {
      const kept = [...quotaPicks].sort((a, b) => SelectionRanker.compare(a.candidate, b.candidate)).slice(0, count);
      // Quota seats lost to the count are reported, not dropped
      for (const tier of PRICE_TIERS) {
        const inTier = (p: RankPick) => p.candidate.caption.price_tier === tier;
        const cut = quotaPicks.filter(inTier).length - kept.filter(inTier).length;
        if (cut > 0) {
          shortfall[tier] = (shortfall[tier] ?? 0) + cut;
        }
      }
      quotaPicks = kept;
    }

    const taken = new Set(quotaPicks.map((p) => p.candidate.caption.caption_id));
    const picks = [...quotaPicks];
    for (const candidate of scored) {
      if (picks.length >= count) break;
      if (taken.has(candidate.caption.caption_id)) continue;
      picks.push({ candidate, fromQuota: false });
      taken.add(candidate.caption.caption_id);
    }

    return { picks, shortfall };
  }

  /**
   * Order picks best-first while honoring the hard diversity rules. When no
   * pick can be placed cleanly:
   *   1. the top pick is swapped for the best clean unpicked candidate (of
   *      the same tier when the pick fills a quota);
   *   2. otherwise the weakest pick outside the quotas is given up for a
   *      clean unpicked candidate placed now, and the top pick waits;
   *   3. otherwise the top pick is kept and flagged.
   */
  private sequence(picks: RankPick[], reserve: RankedCandidate[], initialWindow: RecentPatternWindow): RankedCandidate[] {
    const remaining = [...picks].sort((a, b) => SelectionRanker.compare(a.candidate, b.candidate));
    const spare = [...reserve];
    const ordered: RankedCandidate[] = [];
    let window = initialWindow;

    while (remaining.length > 0) {
      const isClean = (caption: Caption) => DiversityTracker.violations(caption, window).length === 0;
      const cleanIndex = remaining.findIndex((p) => isClean(p.candidate.caption));

      let placed: RankedCandidate;
      if (cleanIndex >= 0) {
        placed = remaining.splice(cleanIndex, 1)[0].candidate;
      } else {
        const top = remaining[0];
        const altIndex = spare.findIndex(
          (c) => (!top.fromQuota || c.caption.price_tier === top.candidate.caption.price_tier) && isClean(c.caption)
        );
        const freeIndex = SelectionRanker.lastFreePick(remaining);
        const spareIndex = spare.findIndex((c) => isClean(c.caption));

        if (altIndex >= 0) {
          remaining.shift();
          placed = spare.splice(altIndex, 1)[0];
          spare.push(top.candidate);
          spare.sort(SelectionRanker.compare);
        } else if (freeIndex > 0 && spareIndex >= 0) {
          const [released] = remaining.splice(freeIndex, 1);
          placed = spare.splice(spareIndex, 1)[0];
          spare.push(released.candidate);
          spare.sort(SelectionRanker.compare);
        } else {
          remaining.shift();
          placed = { ...top.candidate, diversity_flag: DiversityTracker.violations(top.candidate.caption, window) };
        }
      }

      ordered.push(placed);
      window = DiversityTracker.push(window, placed.caption);
    }

    return ordered;
  }
}
