/**
 * Candidate Filter
 *
 * Narrows the caption bank to the captions a creator may receive on a target
 * date. Stages run in a fixed order and each one is counted for pool health:
 *   active -> cooldown (system-wide) -> restrictions -> trigger budget
 *
 * Restriction data comes from outside this service and is parsed fail-open:
 * anything malformed is logged and treated as "no restriction".
 */

import { z } from 'zod';
import { logger } from '../config/logger.js';
import { DataError } from '../errors.js';
import type { ActiveAssignment, Caption, FilterAuditEntry } from '../types/models.js';
import { daysApart } from '../utils/dates.js';
import { BudgetEnforcer, EXCLUDE, type BudgetPenalty } from './budget-enforcer.service.js';

export interface CompiledPattern {
  source: string;
  regex: RegExp;
}

export interface RestrictionProfile {
  categories: Set<string>;
  priceTiers: Set<string>;
  hardPatterns: CompiledPattern[];
  softPatterns: CompiledPattern[];
}

export interface FilterInput {
  creatorId: string;
  /** YYYY-MM-DD */
  targetDate: string;
  captions: Caption[];
  /** Active assignments of every creator around the target date */
  activeAssignments: ActiveAssignment[];
  /** Trigger usage of this creator in the target week */
  triggerUsage: Map<string, number>;
  restriction: RestrictionProfile | null;
  now: Date;
}

export interface FilteredCandidate {
  caption: Caption;
  budget_penalty: BudgetPenalty;
  soft_matches: string[];
}

export interface FilterCounts {
  total_available: number;
  after_cooldown_filter: number;
  after_restriction_filter: number;
  after_budget_filter: number;
}

export interface FilterResult {
  eligible: FilteredCandidate[];
  counts: FilterCounts;
  audit: FilterAuditEntry[];
}

const stringList = z.array(z.string());

const restrictionRowSchema = z.object({
  is_active: z.boolean().optional(),
  restricted_categories: stringList.nullish(),
  restricted_price_tiers: stringList.nullish(),
  hard_patterns: stringList.nullish(),
  soft_patterns: stringList.nullish(),
});

function reportDataError(error: DataError): void {
  logger.warn(error.message, error.context);
}

function compilePatterns(creatorId: string, patterns: string[] | null | undefined): CompiledPattern[] {
  const compiled: CompiledPattern[] = [];
  for (const source of patterns ?? []) {
    try {
      compiled.push({ source, regex: new RegExp(source, 'i') });
    } catch (error) {
      reportDataError(
        new DataError('Skipping unparsable restriction pattern', {
          creator_id: creatorId,
          pattern: source,
          error: error instanceof Error ? error.message : String(error),
        })
      );
    }
  }
  return compiled;
}

export class CandidateFilter {
  constructor(
    private readonly budget: BudgetEnforcer,
    private readonly cooldownDays: number
  ) {}

  /**
   * Creator ids a caption must never be sent to. Accepts an array or its
   * JSON text; anything else yields no restriction.
   */
  static parseRestrictedCreators(raw: unknown, captionId: string): string[] {
    if (raw === null || raw === undefined || raw === '') return [];

    let value: unknown = raw;
    if (typeof raw === 'string') {
      try {
        value = JSON.parse(raw);
      } catch {
        reportDataError(new DataError('Unparsable caption restriction list', { caption_id: captionId }));
        return [];
      }
    }

    const parsed = stringList.safeParse(value);
    if (!parsed.success) {
      reportDataError(new DataError('Malformed caption restriction list', { caption_id: captionId }));
      return [];
    }
    return parsed.data;
  }

  /**
   * Compile a creator restriction row; inactive or malformed rows mean no restriction
   */
  static parseRestrictionProfile(raw: Record<string, unknown> | null, creatorId: string): RestrictionProfile | null {
    if (!raw) return null;

    const parsed = restrictionRowSchema.safeParse(raw);
    if (!parsed.success) {
      reportDataError(
        new DataError('Malformed creator restriction profile', {
          creator_id: creatorId,
          issues: parsed.error.issues.map((issue) => issue.path.join('.')),
        })
      );
      return null;
    }

    const row = parsed.data;
    if (row.is_active === false) return null;

    return {
      categories: new Set(row.restricted_categories ?? []),
      priceTiers: new Set(row.restricted_price_tiers ?? []),
      hardPatterns: compilePatterns(creatorId, row.hard_patterns),
      softPatterns: compilePatterns(creatorId, row.soft_patterns),
    };
  }

  filter(input: FilterInput): FilterResult {
    const audit: FilterAuditEntry[] = [];

    // Stage 1: active captions only
    const active = input.captions.filter((caption) => {
      if (caption.is_active) return true;
      audit.push({
        caption_id: caption.caption_id,
        rule_type: 'INACTIVE',
        rule_value: null,
        enforcement: 'HARD',
        stage: 'active',
      });
      return false;
    });

    // Stage 2: cooldown against reservations held by any creator
    const reserved = new Map<string, string>();
    for (const assignment of input.activeAssignments) {
      if (!assignment.is_active || assignment.expires_at.getTime() <= input.now.getTime()) continue;
      if (daysApart(assignment.scheduled_date, input.targetDate) <= this.cooldownDays) {
        reserved.set(assignment.caption_id, assignment.scheduled_date);
      }
    }

    const afterCooldown = active.filter((caption) => {
      const blockingDate = reserved.get(caption.caption_id);
      if (blockingDate === undefined) return true;
      audit.push({
        caption_id: caption.caption_id,
        rule_type: 'COOLDOWN',
        rule_value: blockingDate,
        enforcement: 'HARD',
        stage: 'cooldown',
      });
      return false;
    });

    // Stage 3: caption-level exclusions and creator profile rules
    const afterRestrictions: FilteredCandidate[] = [];
    for (const caption of afterCooldown) {
      const excluded = CandidateFilter.parseRestrictedCreators(caption.restricted_creators, caption.caption_id);
      if (excluded.includes(input.creatorId)) {
        audit.push({
          caption_id: caption.caption_id,
          rule_type: 'CREATOR_EXCLUDED',
          rule_value: input.creatorId,
          enforcement: 'HARD',
          stage: 'restriction',
        });
        continue;
      }

      const hardHit = this.matchHardRule(caption, input.restriction);
      if (hardHit) {
        audit.push({ caption_id: caption.caption_id, ...hardHit, enforcement: 'HARD', stage: 'restriction' });
        continue;
      }

      const softMatches = (input.restriction?.softPatterns ?? [])
        .filter((pattern) => pattern.regex.test(caption.caption_text))
        .map((pattern) => pattern.source);
      for (const source of softMatches) {
        audit.push({
          caption_id: caption.caption_id,
          rule_type: 'PATTERN_SOFT',
          rule_value: source,
          enforcement: 'SOFT',
          stage: 'restriction',
        });
      }

      afterRestrictions.push({ caption, budget_penalty: 0, soft_matches: softMatches });
    }

    // Stage 4: weekly trigger budget
    const eligible: FilteredCandidate[] = [];
    for (const candidate of afterRestrictions) {
      const penalty = this.budget.penaltyFor(candidate.caption.trigger_tag, input.triggerUsage);
      if (penalty === EXCLUDE) {
        audit.push({
          caption_id: candidate.caption.caption_id,
          rule_type: 'BUDGET',
          rule_value: candidate.caption.trigger_tag,
          enforcement: 'HARD',
          stage: 'budget',
        });
        continue;
      }
      if (penalty < 0) {
        audit.push({
          caption_id: candidate.caption.caption_id,
          rule_type: 'BUDGET',
          rule_value: candidate.caption.trigger_tag,
          enforcement: 'SOFT',
          stage: 'budget',
        });
      }
      eligible.push({ ...candidate, budget_penalty: penalty });
    }

    return {
      eligible,
      counts: {
        total_available: active.length,
        after_cooldown_filter: afterCooldown.length,
        after_restriction_filter: afterRestrictions.length,
        after_budget_filter: eligible.length,
      },
      audit,
    };
  }

  private matchHardRule(
    caption: Caption,
    restriction: RestrictionProfile | null
  ): Pick<FilterAuditEntry, 'rule_type' | 'rule_value'> | null {
    if (!restriction) return null;

    if (restriction.categories.has(caption.content_category)) {
      return { rule_type: 'CATEGORY', rule_value: caption.content_category };
    }
    if (restriction.priceTiers.has(caption.price_tier)) {
      return { rule_type: 'PRICE_TIER', rule_value: caption.price_tier };
    }
    const pattern = restriction.hardPatterns.find((p) => p.regex.test(caption.caption_text));
    if (pattern) {
      return { rule_type: 'PATTERN_HARD', rule_value: pattern.source };
    }
    return null;
  }
}
