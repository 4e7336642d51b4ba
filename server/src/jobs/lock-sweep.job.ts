/**
 * Lock Sweep Background Job
 *
 * Periodically releases caption reservations that expired or whose send
 * date has passed, so cooldown checks only see live reservations.
 */

import { z } from 'zod';
import { logger } from '../config/logger.js';
import type { AssignmentSweeper } from '../services/assignment-sweeper.service.js';
import type { JobStateStore } from '../services/job-persistence.service.js';

export const LOCK_SWEEP_JOB_NAME = 'lock-sweep';

export type Sweeper = Pick<AssignmentSweeper, 'sweep'>;

export type LockSweepConfig = {
  intervalMinutes: number;
  enabled: boolean;
};

export type LockSweepStats = {
  lastRun: string | null;
  totalRuns: number;
  totalExpired: number;
  totalPastSendDate: number;
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
    totalExpired: z.number(),
    totalPastSendDate: z.number(),
    lastDurationMs: z.number(),
    lastError: z.string().nullable(),
  })
  .partial();

export class LockSweepJob {
  private isRunning = false;
  private isProcessing = false;
  private intervalId: NodeJS.Timeout | null = null;
  private config: LockSweepConfig = {
    intervalMinutes: 60, // Default: sweep every hour
    enabled: true,
  };

  private stats: LockSweepStats = {
    lastRun: null,
    totalRuns: 0,
    totalExpired: 0,
    totalPastSendDate: 0,
    lastDurationMs: 0,
    lastError: null,
  };

  constructor(
    private readonly sweeper: Sweeper,
    private readonly state: JobStateStore
  ) {}

  async init() {
    await this.state.ensureJobState(LOCK_SWEEP_JOB_NAME, this.config);
  }

  async restore(): Promise<boolean> {
    const wasRunning = await this.syncStateFromDB();
    if (wasRunning === null) {
      logger.info('No persisted state found for lock-sweep job');
      return false;
    }

    if (wasRunning) {
      logger.info('Restoring lock-sweep job to running state');
      this.isRunning = false;
      await this.start();
      return true;
    }

    return false;
  }

  async syncStateFromDB(): Promise<boolean | null> {
    const state = await this.state.loadState(LOCK_SWEEP_JOB_NAME);
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

  async updateConfig(config: Partial<LockSweepConfig>) {
    const wasRunning = this.isRunning;
    if (wasRunning) {
      await this.stop();
    }

    this.config = { ...this.config, ...config };
    await this.state.saveConfig(LOCK_SWEEP_JOB_NAME, this.config);
    logger.info('Lock sweep job config updated', { config: this.config });

    if (wasRunning && this.config.enabled) {
      await this.start();
    }
  }

  async start() {
    if (this.isRunning) {
      logger.warn('Lock sweep job is already running');
      return;
    }

    if (!this.config.enabled) {
      logger.warn('Lock sweep job is disabled');
      return;
    }

    logger.info('Starting lock sweep job', { intervalMinutes: this.config.intervalMinutes });

    this.isRunning = true;
    await this.state.saveRunningState(LOCK_SWEEP_JOB_NAME, true);

    this.tick();
    this.intervalId = setInterval(() => this.tick(), this.config.intervalMinutes * 60 * 1000);
  }

  async stop() {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    this.isRunning = false;
    await this.state.saveRunningState(LOCK_SWEEP_JOB_NAME, false);
    logger.info('Lock sweep job stopped');
  }

  async halt() {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    logger.info('Lock sweep job halted (state preserved)');
  }

  async runNow(): Promise<{ success: boolean; message: string; durationMs?: number }> {
    if (this.isProcessing) {
      return { success: false, message: 'Sweep is already in progress' };
    }
    const startTime = Date.now();
    const error = await this.runCycle();
    const durationMs = Date.now() - startTime;
    return error
      ? { success: false, message: `Sweep failed: ${error}`, durationMs }
      : { success: true, message: 'Sweep completed', durationMs };
  }

  private tick() {
    if (this.isProcessing) {
      logger.warn('Lock sweep is already processing');
      return;
    }
    this.runCycle().catch((error) => {
      logger.error('Lock sweep tick failed', { error });
    });
  }

  private async runCycle(): Promise<string | null> {
    this.isProcessing = true;
    this.stats.lastError = null;
    const startTime = Date.now();

    try {
      const log = await this.sweeper.sweep(new Date());
      this.stats.lastRun = log.swept_at.toISOString();
      this.stats.totalRuns++;
      this.stats.totalExpired += log.expired_count;
      this.stats.totalPastSendDate += log.past_send_date_count;
      this.stats.lastDurationMs = Date.now() - startTime;
      return null;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.stats.lastError = errorMessage;
      this.stats.lastDurationMs = Date.now() - startTime;
      logger.error('Lock sweep cycle failed', { error: errorMessage });
      return errorMessage;
    } finally {
      this.isProcessing = false;
      await this.state.saveStats(LOCK_SWEEP_JOB_NAME, this.stats);
    }
  }
}
