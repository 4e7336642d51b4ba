import { z } from 'zod';
import type { Env } from './env.js';
import { logger } from './logger.js';
import { PRICE_TIERS, type PriceTier } from '../types/models.js';

export interface BanditConfig {
  /** Days either side of a scheduled date during which a caption may not be reserved again */
  cooldownDays: number;
  /** Reservation lifetime after its scheduled date */
  assignmentExpiryDays: number;
  explorationRate: number;
  confidenceLevel: number;
  triggerWeeklyCaps: Record<string, number>;
  priceBaseTable: Partial<Record<PriceTier, number>>;
  decayHalfLifeDays: number;
  updatesPerDay: number;
  /** Outcome window read by one feedback run */
  feedbackLookbackHours: number;
  /** Trailing window for the per-creator median EMV */
  medianWindowDays: number;
  statCountCap: number;
}

export const DEFAULT_TRIGGER_WEEKLY_CAPS: Record<string, number> = {
  scarcity: 3,
  urgency: 5,
  fomo: 4,
  exclusivity: 4,
  social_proof: 6,
  curiosity: 7,
  flash_sale: 2,
};

export const DEFAULT_PRICE_BASE_TABLE: Record<PriceTier, number> = {
  budget: 5,
  standard: 10,
  mid: 15,
  premium: 25,
  luxury: 40,
  vip: 60,
};

export const DEFAULT_BANDIT_CONFIG: BanditConfig = {
  cooldownDays: 7,
  assignmentExpiryDays: 7,
  explorationRate: 0.2,
  confidenceLevel: 0.95,
  triggerWeeklyCaps: DEFAULT_TRIGGER_WEEKLY_CAPS,
  priceBaseTable: DEFAULT_PRICE_BASE_TABLE,
  decayHalfLifeDays: 14,
  updatesPerDay: 4,
  feedbackLookbackHours: 168,
  medianWindowDays: 30,
  statCountCap: 100,
};

const capsSchema = z.record(z.string(), z.number().int().nonnegative());
const priceTableSchema = z.record(z.enum(PRICE_TIERS), z.number().nonnegative());

function parseJsonSetting<T>(name: string, raw: string | undefined, schema: z.ZodType<T>, fallback: T): T {
  if (!raw) return fallback;
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn(`Invalid ${name}, using defaults`, { issues: parsed.error.issues });
  } catch (error) {
    logger.warn(`Unparsable ${name}, using defaults`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return fallback;
}

export type BanditEnv = Pick<
  Env,
  | 'COOLDOWN_DAYS'
  | 'ASSIGNMENT_EXPIRY_DAYS'
  | 'EXPLORATION_RATE'
  | 'CONFIDENCE_LEVEL'
  | 'TRIGGER_WEEKLY_CAPS'
  | 'PRICE_BASE_TABLE'
  | 'DECAY_HALF_LIFE_DAYS'
  | 'FEEDBACK_UPDATES_PER_DAY'
  | 'FEEDBACK_LOOKBACK_HOURS'
  | 'STAT_COUNT_CAP'
>;

export function loadBanditConfig(source: BanditEnv): BanditConfig {
  return {
    ...DEFAULT_BANDIT_CONFIG,
    cooldownDays: source.COOLDOWN_DAYS,
    assignmentExpiryDays: source.ASSIGNMENT_EXPIRY_DAYS,
    explorationRate: source.EXPLORATION_RATE,
    confidenceLevel: source.CONFIDENCE_LEVEL,
    triggerWeeklyCaps: parseJsonSetting<Record<string, number>>(
      'TRIGGER_WEEKLY_CAPS',
      source.TRIGGER_WEEKLY_CAPS,
      capsSchema,
      DEFAULT_TRIGGER_WEEKLY_CAPS
    ),
    priceBaseTable: parseJsonSetting<Partial<Record<PriceTier, number>>>(
      'PRICE_BASE_TABLE',
      source.PRICE_BASE_TABLE,
      priceTableSchema,
      DEFAULT_PRICE_BASE_TABLE
    ),
    decayHalfLifeDays: source.DECAY_HALF_LIFE_DAYS,
    updatesPerDay: source.FEEDBACK_UPDATES_PER_DAY,
    feedbackLookbackHours: source.FEEDBACK_LOOKBACK_HOURS,
    statCountCap: source.STAT_COUNT_CAP,
  };
}
