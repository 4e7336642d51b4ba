/**
 * Job Persistence Service
 *
 * Handles saving and loading job state from the database.
 * Enables jobs to persist their configuration and running state across container restarts.
 */

import { query } from '../db/client.js';
import { logger } from '../config/logger.js';

export interface JobState {
  job_name: string;
  is_running: boolean;
  is_paused: boolean;
  config: Record<string, unknown>;
  stats: Record<string, unknown>;
  last_started_at: Date | null;
  last_stopped_at: Date | null;
  last_run_at: Date | null;
}

/**
 * State operations a background job depends on
 */
export interface JobStateStore {
  loadState(jobName: string): Promise<JobState | null>;
  saveRunningState(jobName: string, isRunning: boolean, isPaused?: boolean): Promise<void>;
  saveConfig(jobName: string, config: Record<string, unknown>): Promise<void>;
  saveStats(jobName: string, stats: Record<string, unknown>): Promise<void>;
  ensureJobState(jobName: string, defaultConfig: Record<string, unknown>): Promise<void>;
}

export class JobPersistenceService implements JobStateStore {
  /**
   * Load job state from database
   */
  async loadState(jobName: string): Promise<JobState | null> {
    try {
      const result = await query<JobState>(`SELECT * FROM job_state WHERE job_name = $1`, [jobName]);
      return result.rows[0] ?? null;
    } catch (error) {
      logger.error('Failed to load job state', { jobName, error });
      return null;
    }
  }

  /**
   * Save job running state
   */
  async saveRunningState(jobName: string, isRunning: boolean, isPaused: boolean = false): Promise<void> {
    try {
      const timestamp = isRunning ? 'last_started_at = NOW()' : 'last_stopped_at = NOW()';

      await query(
        `UPDATE job_state SET
          is_running = $2,
          is_paused = $3,
          ${timestamp}
         WHERE job_name = $1`,
        [jobName, isRunning, isPaused]
      );

      logger.info('Job running state saved', { jobName, isRunning, isPaused });
    } catch (error) {
      logger.error('Failed to save job running state', { jobName, error });
    }
  }

  /**
   * Save job configuration
   */
  async saveConfig(jobName: string, config: Record<string, unknown>): Promise<void> {
    try {
      await query(`UPDATE job_state SET config = $2 WHERE job_name = $1`, [jobName, JSON.stringify(config)]);
      logger.info('Job config saved', { jobName, config });
    } catch (error) {
      logger.error('Failed to save job config', { jobName, error });
    }
  }

  /**
   * Save job statistics
   */
  async saveStats(jobName: string, stats: Record<string, unknown>): Promise<void> {
    try {
      await query(`UPDATE job_state SET stats = $2, last_run_at = NOW() WHERE job_name = $1`, [
        jobName,
        JSON.stringify(stats),
      ]);
    } catch (error) {
      logger.error('Failed to save job stats', { jobName, error });
    }
  }

  /**
   * Ensure job state record exists (upsert)
   */
  async ensureJobState(jobName: string, defaultConfig: Record<string, unknown>): Promise<void> {
    try {
      await query(
        `INSERT INTO job_state (job_name, config)
         VALUES ($1, $2)
         ON CONFLICT (job_name) DO NOTHING`,
        [jobName, JSON.stringify(defaultConfig)]
      );
    } catch (error) {
      logger.error('Failed to ensure job state', { jobName, error });
    }
  }
}
