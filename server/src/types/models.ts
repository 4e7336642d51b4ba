// Domain model types

export const PRICE_TIERS = ['budget', 'standard', 'mid', 'premium', 'luxury', 'vip'] as const;
export type PriceTier = (typeof PRICE_TIERS)[number];

export const BEHAVIORAL_SEGMENTS = ['price_insensitive', 'price_sensitive', 'neutral'] as const;
export type BehavioralSegment = (typeof BEHAVIORAL_SEGMENTS)[number];

export function isPriceTier(value: unknown): value is PriceTier {
  return typeof value === 'string' && (PRICE_TIERS as readonly string[]).includes(value);
}

export interface Caption {
  caption_id: string;
  caption_text: string;
  price_tier: PriceTier;
  content_category: string;
  trigger_tag: string | null;
  is_active: boolean;
  // Raw value from content ingestion; expected to be a list of creator ids
  restricted_creators: unknown;
}

export interface BanditStat {
  caption_id: string;
  creator_id: string;
  successes: number;
  failures: number;
  total_observations: number;
  avg_emv: number;
  total_revenue: number;
  last_emv_observed: number | null;
  confidence_lower: number;
  confidence_upper: number;
  exploration_bonus: number;
  performance_percentile: number | null;
  last_updated: Date | null;
}

export type DeactivationReason = 'expired' | 'past_send_date' | 'cancelled';

export interface ActiveAssignment {
  assignment_id: string;
  assignment_key: string;
  caption_id: string;
  creator_id: string;
  schedule_id: string;
  /** YYYY-MM-DD */
  scheduled_date: string;
  scheduled_hour: number | null;
  price_tier: PriceTier;
  content_category: string;
  trigger_tag: string | null;
  is_active: boolean;
  created_at: Date;
  expires_at: Date;
  deactivated_at: Date | null;
  deactivation_reason: DeactivationReason | null;
}

export interface DeliveryOutcome {
  caption_id: string;
  creator_id: string;
  sent_count: number;
  viewed_count: number;
  purchased_count: number;
  earnings: number;
  sent_at: Date;
  /** Ingestion time, stamped by the store */
  received_at?: Date;
}

export interface CreatorRestriction {
  creator_id: string;
  restricted_categories: string[];
  restricted_price_tiers: string[];
  hard_patterns: string[];
  soft_patterns: string[];
  is_active: boolean;
}

export type FilterRuleType =
  | 'INACTIVE'
  | 'COOLDOWN'
  | 'CREATOR_EXCLUDED'
  | 'CATEGORY'
  | 'PRICE_TIER'
  | 'PATTERN_HARD'
  | 'PATTERN_SOFT'
  | 'BUDGET';

export type FilterStage = 'active' | 'cooldown' | 'restriction' | 'budget';

export interface FilterAuditEntry {
  caption_id: string;
  rule_type: FilterRuleType;
  rule_value: string | null;
  enforcement: 'HARD' | 'SOFT';
  stage: FilterStage;
}

export interface LockSweepLog {
  sweep_id: string;
  swept_at: Date;
  expired_count: number;
  past_send_date_count: number;
  duration_ms: number;
}
