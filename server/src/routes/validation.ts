import type { Response } from 'express';
import { z } from 'zod';
import { BEHAVIORAL_SEGMENTS, PRICE_TIERS } from '../types/models.js';
import { SATURATION_STATUSES } from '../types/selection.js';
import { isDateKey } from '../utils/dates.js';

const dateKey = z.string().refine(isDateKey, { message: 'expected a calendar date (YYYY-MM-DD)' });
const hour = z.number().int().min(0).max(23);
const count = z.number().int().nonnegative();

export const selectionRequestSchema = z.object({
  creator_id: z.string().min(1),
  count_needed: z.number().int().positive().max(500),
  lookback_days: z.number().int().min(1).max(90).default(7),
  behavioral_segment: z.enum(BEHAVIORAL_SEGMENTS).default('neutral'),
  price_tier_quota_map: z.record(z.enum(PRICE_TIERS), count).default({}),
  target_date: dateKey.optional(),
  strict_quotas: z.boolean().optional(),
  performance_context: z
    .object({
      account_size: z.string().optional(),
      saturation_status: z.enum(SATURATION_STATUSES).optional(),
    })
    .optional(),
});

const slotSchema = z.object({ date: dateKey, hour });

export const selectAndLockSchema = selectionRequestSchema.extend({
  schedule_id: z.string().min(1),
  slots: z.array(slotSchema).min(1).max(500),
});

export const lockRequestSchema = z.object({
  schedule_id: z.string().min(1),
  creator_id: z.string().min(1),
  assignments: z.array(slotSchema.extend({ caption_id: z.string().min(1) })).max(500),
});

export const outcomeBatchSchema = z.object({
  outcomes: z
    .array(
      z.object({
        caption_id: z.string().min(1),
        creator_id: z.string().min(1),
        sent_count: count,
        viewed_count: count,
        purchased_count: count,
        earnings: z.number().nonnegative(),
        sent_at: z.coerce.date(),
      })
    )
    .min(1)
    .max(5000),
});

/**
 * 400 response listing each failing field
 */
export function sendValidationError(res: Response, error: z.ZodError) {
  return res.status(400).json({
    error: 'Invalid request',
    issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}
