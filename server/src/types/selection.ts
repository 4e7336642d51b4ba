import type { BehavioralSegment, FilterAuditEntry, PriceTier } from './models.js';

export type SelectionStrategy = 'explore' | 'exploit' | 'balanced';
export const SATURATION_STATUSES = ['OVERSATURATED', 'OPTIMAL', 'UNDERSATURATED'] as const;
export type SaturationStatus = (typeof SATURATION_STATUSES)[number];

export type TierQuotaMap = Partial<Record<PriceTier, number>>;

/**
 * Output of the analytics layer, consumed as-is
 */
export interface PerformanceContext {
  account_size?: string;
  saturation_status?: SaturationStatus;
}

export interface SelectionRequest {
  creator_id: string;
  count_needed: number;
  lookback_days: number;
  behavioral_segment: BehavioralSegment;
  price_tier_quota_map: TierQuotaMap;
  /** YYYY-MM-DD; defaults to today (UTC) */
  target_date?: string;
  strict_quotas?: boolean;
  performance_context?: PerformanceContext;
}

export interface WilsonBounds {
  lower: number;
  upper: number;
  exploration_bonus: number;
}

export type DiversityViolation = 'price_tier_streak' | 'trigger_repeat' | 'category_repeat';

export interface SelectedCaption {
  caption_id: string;
  caption_text: string;
  price_tier: PriceTier;
  trigger_tag: string | null;
  category: string;
  composite_score: number;
  selection_strategy: SelectionStrategy;
  wilson_bounds: WilsonBounds;
  suggested_price: number | null;
  diversity_flag?: DiversityViolation[];
}

export interface PoolHealth {
  total_available: number;
  after_cooldown_filter: number;
  after_restriction_filter: number;
  after_budget_filter: number;
  final_selected: number;
  tier_shortfall: TierQuotaMap;
}

export type SelectionStatus = 'ok' | 'partial' | 'rejected';

export interface SelectionResponse {
  status: SelectionStatus;
  reason: string | null;
  captions: SelectedCaption[];
  pool_health: PoolHealth;
  audit: FilterAuditEntry[];
  conflicting_caption_ids?: string[];
}

export interface LockSlot {
  /** YYYY-MM-DD */
  date: string;
  hour: number;
}

export interface LockItem extends LockSlot {
  caption_id: string;
}

export interface LockRequest {
  schedule_id: string;
  creator_id: string;
  assignments: LockItem[];
}

export interface LockResult {
  schedule_id: string;
  inserted: number;
  replayed: number;
  assignment_ids: string[];
}
