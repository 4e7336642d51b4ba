/**
 * Budget Enforcer
 *
 * Weekly caps per psychological trigger. Usage is counted from the creator's
 * active assignments in the ISO week of the target date.
 */

import type { ActiveAssignment } from '../types/models.js';
import { isoWeekKey } from '../utils/dates.js';

export type BudgetPenalty = -1 | -0.5 | -0.2 | 0;

export const EXCLUDE: BudgetPenalty = -1;

export class BudgetEnforcer {
  constructor(private readonly weeklyCaps: Record<string, number>) {}

  static penalty(triggerTag: string | null, usageThisWeek: number, weeklyCap: number | undefined): BudgetPenalty {
    if (triggerTag === null || weeklyCap === undefined) return 0;
    if (usageThisWeek >= weeklyCap) return -1;
    if (usageThisWeek >= 0.8 * weeklyCap) return -0.5;
    if (usageThisWeek >= 0.6 * weeklyCap) return -0.2;
    return 0;
  }

  /**
   * Trigger usage in the ISO week containing targetDate
   */
  static weeklyUsage(assignments: ActiveAssignment[], targetDate: string): Map<string, number> {
    const week = isoWeekKey(targetDate);
    const usage = new Map<string, number>();
    for (const assignment of assignments) {
      if (!assignment.is_active || assignment.trigger_tag === null) continue;
      if (isoWeekKey(assignment.scheduled_date) !== week) continue;
      usage.set(assignment.trigger_tag, (usage.get(assignment.trigger_tag) ?? 0) + 1);
    }
    return usage;
  }

  capFor(triggerTag: string | null): number | undefined {
    if (triggerTag === null || !Object.prototype.hasOwnProperty.call(this.weeklyCaps, triggerTag)) {
      return undefined;
    }
    return this.weeklyCaps[triggerTag];
  }

  penaltyFor(triggerTag: string | null, usage: Map<string, number>): BudgetPenalty {
    if (triggerTag === null) return 0;
    return BudgetEnforcer.penalty(triggerTag, usage.get(triggerTag) ?? 0, this.capFor(triggerTag));
  }
}
