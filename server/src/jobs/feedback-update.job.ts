/**
 * Feedback Update Background Job
 *
 * Folds delivery outcomes into the bandit ledger on a fixed cadence
 * (default 4 runs a day). A tick that arrives while a run is still in
 * flight is skipped, so runs never overlap. The end of the last
 * successful window is persisted as a watermark.
 */

import { z } from 'zod';
import { logger } from '../config/logger.js';
import type { JobStateStore } from '../services/job-persistence.service.js';
import type { FeedbackUpdater } from '../services/feedback-updater.service.js';

export const FEEDBACK_JOB_NAME = 'feedback-update';

export type FeedbackRunner = Pick<FeedbackUpdater, 'run'>;

export type FeedbackUpdateConfig = {
  intervalMinutes: number;
  enabled: boolean;
};

export type FeedbackUpdateStats = {
  lastRun: string | null;
  totalRuns: number;
  skippedTicks: number;
  /** ISO timestamp; outcomes ingested before it are already folded */
  watermark: string | null;
  lastOutcomesRead: number;
  lastStatsWritten: number;
  lastDurationMs: number;
  lastError: string | null;
};

const configSchema = z
  .object({
    intervalMinutes: z.number().positive(),
    enabled: z.boolean(),
  })
  .partial();

const statsSchema = z
  .object({
    lastRun: z.string().nullable(),
    totalRuns: z.number(),
    skippedTicks: z.number(),
    watermark: z.string().nullable(),
    lastOutcomesRead: z.number(),
    lastStatsWritten: z.number(),
    lastDurationMs: z.number(),
    lastError: z.string().nullable(),
  })
  .partial();

function emptyStats(): FeedbackUpdateStats {
  return {
    lastRun: null,
    totalRuns: 0,
    skippedTicks: 0,
    watermark: null,
    lastOutcomesRead: 0,
    lastStatsWritten: 0,
    lastDurationMs: 0,
    lastError: null,
  };
}

export class FeedbackUpdateJob {
  private isRunning = false;
  private isProcessing = false;
  private intervalId: NodeJS.Timeout | null = null;
  private config: FeedbackUpdateConfig;
  private stats: FeedbackUpdateStats = emptyStats();

  constructor(
    private readonly updater: FeedbackRunner,
    private readonly state: JobStateStore,
    updatesPerDay: number
  ) {
    this.config = {
      intervalMinutes: Math.round((24 * 60) / Math.max(1, updatesPerDay)),
      enabled: true,
    };
  }

  /**
   * Initialize job state in database (on first run)
   */
  async init() {
    await this.state.ensureJobState(FEEDBACK_JOB_NAME, this.config);
  }

  /**
   * Restore job state from database (on container restart)
   */
  async restore(): Promise<boolean> {
    const wasRunning = await this.syncStateFromDB();
    if (wasRunning === null) {
      logger.info('No persisted state found for feedback-update job');
      return false;
    }

    if (wasRunning) {
      logger.info('Restoring feedback-update job to running state');
      this.isRunning = false;
      await this.start();
      return true;
    }

    return false;
  }

  /**
   * Sync state from database without starting the job. Returns the persisted
   * running flag, or null when nothing is persisted yet.
   */
  async syncStateFromDB(): Promise<boolean | null> {
    const state = await this.state.loadState(FEEDBACK_JOB_NAME);
    if (!state) return null;

    const config = configSchema.safeParse(state.config);
    if (config.success) {
      this.config = { ...this.config, ...config.data };
    }
    const stats = statsSchema.safeParse(state.stats);
    if (stats.success) {
      this.stats = { ...this.stats, ...stats.data };
    }
    this.isRunning = state.is_running;
    return state.is_running;
  }

  getStatus() {
    return {
      isRunning: this.isRunning,
      isProcessing: this.isProcessing,
      config: this.config,
      stats: this.stats,
    };
  }

  /**
   * Update job configuration
   */
  async updateConfig(config: Partial<FeedbackUpdateConfig>) {
    const wasRunning = this.isRunning;
    if (wasRunning) {
      await this.stop();
    }

    this.config = { ...this.config, ...config };
    await this.state.saveConfig(FEEDBACK_JOB_NAME, this.config);
    logger.info('Feedback update job config updated', { config: this.config });

    if (wasRunning && this.config.enabled) {
      await this.start();
    }
  }

  /**
   * Start the background job
   */
  async start() {
    if (this.isRunning) {
      logger.warn('Feedback update job is already running');
      return;
    }

    if (!this.config.enabled) {
      logger.warn('Feedback update job is disabled');
      return;
    }

    logger.info('Starting feedback update job', { intervalMinutes: this.config.intervalMinutes });

    this.isRunning = true;
    await this.state.saveRunningState(FEEDBACK_JOB_NAME, true);

    this.tick();
    this.intervalId = setInterval(() => this.tick(), this.config.intervalMinutes * 60 * 1000);
  }

  /**
   * Stop the job (updates database)
   */
  async stop() {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    this.isRunning = false;
    await this.state.saveRunningState(FEEDBACK_JOB_NAME, false);
    logger.info('Feedback update job stopped');
  }

  /**
   * Halt the job without updating database
   * Used during graceful shutdown to preserve state for restart
   */
  async halt() {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    logger.info('Feedback update job halted (state preserved)');
  }

  /**
   * Manually trigger a run (for testing or on-demand)
   */
  async runNow(): Promise<{ success: boolean; message: string; durationMs?: number }> {
    if (this.isProcessing) {
      return { success: false, message: 'Feedback update is already in progress' };
    }
    const startTime = Date.now();
    const error = await this.runCycle();
    const durationMs = Date.now() - startTime;
    return error
      ? { success: false, message: `Feedback update failed: ${error}`, durationMs }
      : {
          success: true,
          message: `Folded ${this.stats.lastOutcomesRead} outcomes into ${this.stats.lastStatsWritten} stats`,
          durationMs,
        };
  }

  private tick() {
    if (this.isProcessing) {
      this.stats.skippedTicks++;
      logger.warn('Feedback update still in progress, skipping tick', { skippedTicks: this.stats.skippedTicks });
      return;
    }
    this.runCycle().catch((error) => {
      logger.error('Feedback update tick failed', { error });
    });
  }

  /**
   * One guarded run; resolves with the error message, or null on success
   */
  private async runCycle(): Promise<string | null> {
    this.isProcessing = true;
    this.stats.lastError = null;
    const startTime = Date.now();

    try {
      const watermark = this.stats.watermark ? new Date(this.stats.watermark) : null;
      const result = await this.updater.run(new Date(), watermark);

      this.stats.lastRun = new Date().toISOString();
      this.stats.totalRuns++;
      this.stats.watermark = result.until.toISOString();
      this.stats.lastOutcomesRead = result.outcomesRead;
      this.stats.lastStatsWritten = result.statsWritten;
      this.stats.lastDurationMs = Date.now() - startTime;
      return null;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.stats.lastError = errorMessage;
      this.stats.lastDurationMs = Date.now() - startTime;
      logger.error('Feedback update cycle failed', { error: errorMessage });
      return errorMessage;
    } finally {
      this.isProcessing = false;
      await this.state.saveStats(FEEDBACK_JOB_NAME, this.stats);
    }
  }
}
