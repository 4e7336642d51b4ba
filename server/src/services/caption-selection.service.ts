/**
 * Caption Selection Service
 *
 * Request-level orchestration: load the pool, filter, score, rank, and
 * optionally reserve the winners for a schedule.
 */

import type { BanditConfig } from '../config/bandit.js';
import { logger } from '../config/logger.js';
import { ConflictError, PoolExhaustionError } from '../errors.js';
import type { ActiveAssignment, PriceTier } from '../types/models.js';
import type {
  LockResult,
  LockSlot,
  PoolHealth,
  SelectedCaption,
  SelectionRequest,
  SelectionResponse,
} from '../types/selection.js';
import { addDays, toDateKey } from '../utils/dates.js';
import { AssignmentLocker } from './assignment-locker.service.js';
import type { BanditStatStore } from './bandit-stat-store.service.js';
import { BudgetEnforcer } from './budget-enforcer.service.js';
import { CandidateFilter } from './candidate-filter.service.js';
import { DiversityTracker } from './diversity-tracker.service.js';
import { SelectionRanker, type RankedCandidate } from './selection-ranker.service.js';
import type { AssignmentRepository, CaptionStore, RestrictionRepository } from './store/types.js';
import type { ThompsonSampler } from './thompson-sampler.service.js';

export const INSUFFICIENT_CAPTIONS = 'insufficient eligible captions';
export const CAPTIONS_RESERVED = 'conflict: captions already reserved';

export interface CaptionSelectionDeps {
  captions: CaptionStore;
  stats: BanditStatStore;
  assignments: AssignmentRepository;
  restrictions: RestrictionRepository;
  locker: AssignmentLocker;
  sampler: ThompsonSampler;
  config: BanditConfig;
}

export interface LockedSelectionResponse extends SelectionResponse {
  lock: LockResult | null;
}

// Longest lookback any diversity rule reads
const WINDOW_SIZE = 7;
// Budget usage needs the whole ISO week around the target date
const WEEK_SPAN_DAYS = 7;

export class CaptionSelectionService {
  private readonly filter: CandidateFilter;
  private readonly ranker: SelectionRanker;

  constructor(private readonly deps: CaptionSelectionDeps) {
    this.filter = new CandidateFilter(new BudgetEnforcer(deps.config.triggerWeeklyCaps), deps.config.cooldownDays);
    this.ranker = new SelectionRanker(deps.sampler, {
      explorationRate: deps.config.explorationRate,
      confidenceLevel: deps.config.confidenceLevel,
    });
  }

  async select(request: SelectionRequest, now: Date = new Date()): Promise<SelectionResponse> {
    const { config } = this.deps;
    const targetDate = request.target_date ?? toDateKey(now);
    const lookbackStart = addDays(targetDate, -Math.max(request.lookback_days, WEEK_SPAN_DAYS));

    const [captions, stats, nearby, creatorHistory, restrictionRow] = await Promise.all([
      this.deps.captions.listCaptions(),
      this.deps.stats.getForCreator(request.creator_id),
      this.deps.assignments.listActiveBetween(
        addDays(targetDate, -config.cooldownDays),
        addDays(targetDate, config.cooldownDays)
      ),
      this.deps.assignments.listActiveForCreator(request.creator_id, lookbackStart, addDays(targetDate, WEEK_SPAN_DAYS)),
      this.deps.restrictions.findForCreator(request.creator_id),
    ]);

    const filtered = this.filter.filter({
      creatorId: request.creator_id,
      targetDate,
      captions,
      activeAssignments: nearby,
      triggerUsage: BudgetEnforcer.weeklyUsage(creatorHistory, targetDate),
      restriction: CandidateFilter.parseRestrictionProfile(restrictionRow, request.creator_id),
      now,
    });

    const window = DiversityTracker.buildWindow(
      this.recentHistory(creatorHistory, targetDate, request.lookback_days),
      WINDOW_SIZE
    );

    const ranked = this.ranker.rank(
      filtered.eligible.map((candidate) => ({
        ...candidate,
        stat: stats.get(candidate.caption.caption_id) ?? null,
      })),
      {
        creatorId: request.creator_id,
        countNeeded: request.count_needed,
        segment: request.behavioral_segment,
        quotas: request.price_tier_quota_map,
        window,
        saturation: request.performance_context?.saturation_status,
      }
    );

    const poolHealth: PoolHealth = {
      ...filtered.counts,
      final_selected: ranked.selected.length,
      tier_shortfall: ranked.tier_shortfall,
    };
    const hasShortfall = Object.keys(ranked.tier_shortfall).length > 0;

    if (request.strict_quotas && hasShortfall) {
      logger.warn('Selection rejected: tier quotas cannot be met', {
        creatorId: request.creator_id,
        shortfall: ranked.tier_shortfall,
      });
      return {
        status: 'rejected',
        reason: INSUFFICIENT_CAPTIONS,
        captions: [],
        pool_health: { ...poolHealth, final_selected: 0 },
        audit: filtered.audit,
      };
    }

    let status: SelectionResponse['status'] = 'ok';
    let reason: string | null = null;
    if (ranked.selected.length < request.count_needed || hasShortfall) {
      const exhaustion = new PoolExhaustionError(request.count_needed, ranked.selected.length);
      logger.warn('Caption pool exhausted', {
        creatorId: request.creator_id,
        needed: exhaustion.needed,
        selected: exhaustion.available,
        poolHealth,
      });
      status = 'partial';
      reason = exhaustion.message;
    }

    logger.info('Captions selected', {
      creatorId: request.creator_id,
      targetDate,
      status,
      selected: ranked.selected.length,
    });

    return {
      status,
      reason,
      captions: ranked.selected.map((candidate) => this.toSelectedCaption(candidate)),
      pool_health: poolHealth,
      audit: filtered.audit,
    };
  }

  /**
   * Select, then reserve each caption on the matching slot. Nothing is
   * reserved unless the selection fully satisfied the request.
   */
  async selectAndLock(
    request: SelectionRequest,
    scheduleId: string,
    slots: LockSlot[],
    now: Date = new Date()
  ): Promise<LockedSelectionResponse> {
    const selection = await this.select(request, now);
    if (selection.status !== 'ok') {
      return { ...selection, status: 'rejected', reason: selection.reason ?? INSUFFICIENT_CAPTIONS, lock: null };
    }
    if (slots.length < selection.captions.length) {
      return {
        ...selection,
        status: 'rejected',
        reason: `not enough slots: ${slots.length} for ${selection.captions.length} captions`,
        lock: null,
      };
    }

    try {
      const lock = await this.deps.locker.lock({
        schedule_id: scheduleId,
        creator_id: request.creator_id,
        assignments: selection.captions.map((caption, index) => ({
          caption_id: caption.caption_id,
          date: slots[index].date,
          hour: slots[index].hour,
        })),
      });
      return { ...selection, lock };
    } catch (error) {
      if (error instanceof ConflictError) {
        return {
          ...selection,
          status: 'rejected',
          reason: CAPTIONS_RESERVED,
          conflicting_caption_ids: error.captionIds,
          lock: null,
        };
      }
      throw error;
    }
  }

  private recentHistory(history: ActiveAssignment[], targetDate: string, lookbackDays: number): ActiveAssignment[] {
    const from = addDays(targetDate, -lookbackDays);
    return history.filter((a) => a.scheduled_date >= from && a.scheduled_date <= targetDate);
  }

  private toSelectedCaption(candidate: RankedCandidate): SelectedCaption {
    const tier: PriceTier = candidate.caption.price_tier;
    const selected: SelectedCaption = {
      caption_id: candidate.caption.caption_id,
      caption_text: candidate.caption.caption_text,
      price_tier: tier,
      trigger_tag: candidate.caption.trigger_tag,
      category: candidate.caption.content_category,
      composite_score: candidate.composite_score,
      selection_strategy: candidate.strategy,
      wilson_bounds: candidate.bounds,
      suggested_price: this.deps.config.priceBaseTable[tier] ?? null,
    };
    if (candidate.diversity_flag) {
      selected.diversity_flag = candidate.diversity_flag;
    }
    return selected;
  }
}
