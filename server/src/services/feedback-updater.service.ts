/**
 * Feedback Updater
 *
 * Folds delivery outcomes into the bandit ledger. One run:
 *   1. reads outcomes ingested in [watermark, now), never more than lookbackHours back
 *   2. looks up each creator's trailing median EMV once
 *   3. classifies each delivery as a success (EMV above median) or failure
 *   4. decays every ledger row once and adds the new counts
 *   5. recomputes bounds and per-creator EMV percentiles, then saves in one batch
 */

import { logger } from '../config/logger.js';
import type { BanditStat, DeliveryOutcome } from '../types/models.js';
import { BanditStatStore, statKey, type BatchObservation } from './bandit-stat-store.service.js';
import type { OutcomeRepository } from './store/types.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface FeedbackOptions {
  decayHalfLifeDays: number;
  updatesPerDay: number;
  lookbackHours: number;
  medianWindowDays: number;
  statCountCap: number;
  confidenceLevel: number;
}

export interface PairObservation extends BatchObservation {
  caption_id: string;
  creator_id: string;
}

export interface FeedbackRunResult {
  since: Date;
  until: Date;
  outcomesRead: number;
  pairsObserved: number;
  statsWritten: number;
  skippedCreators: string[];
  decay: number;
}

export class FeedbackUpdater {
  constructor(
    private readonly outcomes: OutcomeRepository,
    private readonly store: BanditStatStore,
    private readonly options: FeedbackOptions
  ) {}

  /**
   * Realized EMV of one delivery: conversion among viewers times earnings
   */
  static deliveryEmv(outcome: DeliveryOutcome): number {
    if (outcome.viewed_count <= 0) return 0;
    return (outcome.purchased_count / outcome.viewed_count) * outcome.earnings;
  }

  /**
   * Group outcomes per (caption, creator) against precomputed creator medians
   */
  static rollup(outcomes: DeliveryOutcome[], medians: Map<string, number>): Map<string, PairObservation> {
    const pairs = new Map<string, PairObservation>();
    const ordered = [...outcomes].sort((a, b) => a.sent_at.getTime() - b.sent_at.getTime());

    for (const outcome of ordered) {
      const median = medians.get(outcome.creator_id);
      if (median === undefined) continue;

      const emv = FeedbackUpdater.deliveryEmv(outcome);
      const key = statKey(outcome.caption_id, outcome.creator_id);
      const pair = pairs.get(key) ?? {
        caption_id: outcome.caption_id,
        creator_id: outcome.creator_id,
        new_successes: 0,
        new_failures: 0,
        observations: 0,
        emv_sum: 0,
        revenue: 0,
        last_emv: 0,
      };

      if (emv > median) pair.new_successes++;
      else pair.new_failures++;
      pair.observations++;
      pair.emv_sum += emv;
      pair.revenue += outcome.earnings;
      pair.last_emv = emv;
      pairs.set(key, pair);
    }

    return pairs;
  }

  async run(now: Date = new Date(), watermark: Date | null = null): Promise<FeedbackRunResult> {
    const floor = new Date(now.getTime() - this.options.lookbackHours * HOUR_MS);
    const since = watermark && watermark.getTime() > floor.getTime() ? watermark : floor;
    const decay = BanditStatStore.decayFactor(this.options.decayHalfLifeDays, this.options.updatesPerDay);

    const outcomes = await this.outcomes.listReceivedBetween(since, now);
    const creatorIds = [...new Set(outcomes.map((o) => o.creator_id))];
    const medians = await this.outcomes.medianEmvByCreator(
      creatorIds,
      new Date(now.getTime() - this.options.medianWindowDays * DAY_MS)
    );
    const skippedCreators = creatorIds.filter((id) => !medians.has(id));
    if (skippedCreators.length > 0) {
      logger.warn('No trailing median EMV for creators, skipping their outcomes', { skippedCreators });
    }

    const pairs = FeedbackUpdater.rollup(outcomes, medians);
    const existing = await this.store.listAll();
    const foldOptions = {
      decay,
      cap: this.options.statCountCap,
      confidence: this.options.confidenceLevel,
      now,
    };

    const updated: BanditStat[] = [];
    const seen = new Set<string>();
    for (const stat of existing) {
      const key = statKey(stat.caption_id, stat.creator_id);
      seen.add(key);
      updated.push(BanditStatStore.fold(stat, pairs.get(key) ?? null, foldOptions));
    }
    for (const [key, pair] of pairs) {
      if (seen.has(key)) continue;
      updated.push(BanditStatStore.fold(BanditStatStore.prior(pair.caption_id, pair.creator_id), pair, foldOptions));
    }

    const statsWritten = await this.store.saveAll(BanditStatStore.assignPercentiles(updated));

    const result: FeedbackRunResult = {
      since,
      until: now,
      outcomesRead: outcomes.length,
      pairsObserved: pairs.size,
      statsWritten,
      skippedCreators,
      decay,
    };
    logger.info('Bandit feedback update completed', {
      outcomesRead: result.outcomesRead,
      pairsObserved: result.pairsObserved,
      statsWritten,
      decay,
    });
    return result;
  }
}
