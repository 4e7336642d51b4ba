/**
 * Wires PostgreSQL stores into the selection, locking and feedback services
 * shared by the web server and the worker.
 */

import type { BanditConfig } from './config/bandit.js';
import { FeedbackUpdateJob, FEEDBACK_JOB_NAME } from './jobs/feedback-update.job.js';
import { LockSweepJob, LOCK_SWEEP_JOB_NAME } from './jobs/lock-sweep.job.js';
import { AssignmentLocker } from './services/assignment-locker.service.js';
import { AssignmentSweeper } from './services/assignment-sweeper.service.js';
import { BanditStatStore } from './services/bandit-stat-store.service.js';
import { CaptionSelectionService } from './services/caption-selection.service.js';
import { FeedbackUpdater } from './services/feedback-updater.service.js';
import { JobPersistenceService } from './services/job-persistence.service.js';
import { JobRestoreService } from './services/job-restore.service.js';
import { PgAssignmentStore } from './services/store/pg-assignment.store.js';
import { PgBanditStatStore } from './services/store/pg-bandit-stat.store.js';
import { PgCaptionStore } from './services/store/pg-caption.store.js';
import { PgOutcomeStore } from './services/store/pg-outcome.store.js';
import { PgRestrictionStore } from './services/store/pg-restriction.store.js';
import type { OutcomeRepository } from './services/store/types.js';
import { ThompsonSampler } from './services/thompson-sampler.service.js';

export interface JobControl {
  start(): Promise<void>;
  stop(): Promise<void>;
  runNow(): Promise<{ success: boolean; message: string; durationMs?: number }>;
  syncStateFromDB(): Promise<boolean | null>;
  updateConfig(config: Partial<{ intervalMinutes: number; enabled: boolean }>): Promise<void>;
  getStatus(): unknown;
}

export interface Container {
  config: BanditConfig;
  selection: CaptionSelectionService;
  locker: AssignmentLocker;
  outcomes: OutcomeRepository;
  jobs: Record<string, JobControl>;
  jobRestore: JobRestoreService;
}

export function createContainer(config: BanditConfig): Container {
  const captions = new PgCaptionStore();
  const assignments = new PgAssignmentStore();
  const outcomes = new PgOutcomeStore();
  const stats = new BanditStatStore(new PgBanditStatStore());
  const jobState = new JobPersistenceService();

  const locker = new AssignmentLocker(assignments, captions, {
    cooldownDays: config.cooldownDays,
    assignmentExpiryDays: config.assignmentExpiryDays,
  });

  const selection = new CaptionSelectionService({
    captions,
    stats,
    assignments,
    restrictions: new PgRestrictionStore(),
    locker,
    sampler: new ThompsonSampler(),
    config,
  });

  const updater = new FeedbackUpdater(outcomes, stats, {
    decayHalfLifeDays: config.decayHalfLifeDays,
    updatesPerDay: config.updatesPerDay,
    lookbackHours: config.feedbackLookbackHours,
    medianWindowDays: config.medianWindowDays,
    statCountCap: config.statCountCap,
    confidenceLevel: config.confidenceLevel,
  });

  const feedbackJob = new FeedbackUpdateJob(updater, jobState, config.updatesPerDay);
  const sweepJob = new LockSweepJob(new AssignmentSweeper(assignments), jobState);

  return {
    config,
    selection,
    locker,
    outcomes,
    jobs: {
      [FEEDBACK_JOB_NAME]: feedbackJob,
      [LOCK_SWEEP_JOB_NAME]: sweepJob,
    },
    jobRestore: new JobRestoreService([
      { name: FEEDBACK_JOB_NAME, job: feedbackJob },
      { name: LOCK_SWEEP_JOB_NAME, job: sweepJob },
    ]),
  };
}
