/**
 * Diversity Tracker
 *
 * Recent usage patterns per creator and the novelty score / hard rules
 * derived from them.
 */

import type { ActiveAssignment, PriceTier } from '../types/models.js';
import type { DiversityViolation } from '../types/selection.js';

export interface PatternEntry {
  price_tier: PriceTier;
  content_category: string;
  trigger_tag: string | null;
  send_hour: number | null;
}

/**
 * Most recent first
 */
export interface RecentPatternWindow {
  entries: PatternEntry[];
  trigger_tags: (string | null)[];
  categories: string[];
  price_tiers: PriceTier[];
  send_hours: (number | null)[];
}

export interface DiversityCandidate {
  price_tier: PriceTier;
  content_category: string;
  trigger_tag: string | null;
}

const TRIGGER_LOOKBACK = 5;
const CATEGORY_LOOKBACK = 3;
const TIER_LOOKBACK = 7;

const MAX_TIER_STREAK = 2;
const TRIGGER_REPEAT_LOOKBACK = 3;

export class DiversityTracker {
  static windowFromEntries(entries: PatternEntry[]): RecentPatternWindow {
    return {
      entries,
      trigger_tags: entries.map((e) => e.trigger_tag),
      categories: entries.map((e) => e.content_category),
      price_tiers: entries.map((e) => e.price_tier),
      send_hours: entries.map((e) => e.send_hour),
    };
  }

  /**
   * Build the window from a creator's assignments, newest date/hour first
   */
  static buildWindow(assignments: ActiveAssignment[], size = TIER_LOOKBACK): RecentPatternWindow {
    const ordered = [...assignments].sort((a, b) => {
      if (a.scheduled_date !== b.scheduled_date) {
        return a.scheduled_date < b.scheduled_date ? 1 : -1;
      }
      return (b.scheduled_hour ?? -1) - (a.scheduled_hour ?? -1);
    });

    return this.windowFromEntries(
      ordered.slice(0, size).map((a) => ({
        price_tier: a.price_tier,
        content_category: a.content_category,
        trigger_tag: a.trigger_tag,
        send_hour: a.scheduled_hour,
      }))
    );
  }

  static score(candidate: DiversityCandidate, window: RecentPatternWindow): number {
    let bonus = 0;

    const recentTriggers = window.trigger_tags.slice(0, TRIGGER_LOOKBACK);
    bonus += candidate.trigger_tag !== null && recentTriggers.includes(candidate.trigger_tag) ? -0.3 : 0.1;

    const recentCategories = window.categories.slice(0, CATEGORY_LOOKBACK);
    bonus += recentCategories.includes(candidate.content_category) ? -0.2 : 0.1;

    const tierCount = window.price_tiers.slice(0, TIER_LOOKBACK).filter((t) => t === candidate.price_tier).length;
    bonus -= 0.1 * tierCount;

    return bonus;
  }

  /**
   * Hard sequencing rules the candidate would break if placed next
   */
  static violations(candidate: DiversityCandidate, window: RecentPatternWindow): DiversityViolation[] {
    const found: DiversityViolation[] = [];

    const streak = window.price_tiers.slice(0, MAX_TIER_STREAK);
    if (streak.length === MAX_TIER_STREAK && streak.every((t) => t === candidate.price_tier)) {
      found.push('price_tier_streak');
    }

    if (
      candidate.trigger_tag !== null &&
      window.trigger_tags.slice(0, TRIGGER_REPEAT_LOOKBACK).includes(candidate.trigger_tag)
    ) {
      found.push('trigger_repeat');
    }

    if (window.categories[0] === candidate.content_category) {
      found.push('category_repeat');
    }

    return found;
  }

  /**
   * Window after placing the candidate next
   */
  static push(window: RecentPatternWindow, candidate: DiversityCandidate, sendHour: number | null = null): RecentPatternWindow {
    return this.windowFromEntries([
      {
        price_tier: candidate.price_tier,
        content_category: candidate.content_category,
        trigger_tag: candidate.trigger_tag,
        send_hour: sendHour,
      },
      ...window.entries,
    ]);
  }
}
