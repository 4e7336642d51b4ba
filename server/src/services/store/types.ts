/**
 * Store Interfaces
 *
 * Persistence seams for the selection engine. PostgreSQL implementations
 * live beside this file; tests supply in-memory ones.
 */

import type {
  ActiveAssignment,
  BanditStat,
  Caption,
  DeactivationReason,
  DeliveryOutcome,
  LockSweepLog,
} from '../../types/models.js';

export interface CaptionStore {
  /** Every caption in the bank, active or not */
  listCaptions(): Promise<Caption[]>;
  getByIds(captionIds: string[]): Promise<Caption[]>;
}

export interface BanditStatRepository {
  listForCreator(creatorId: string): Promise<BanditStat[]>;
  listAll(): Promise<BanditStat[]>;
  /** Writes all rows in one transaction */
  upsertMany(stats: BanditStat[]): Promise<number>;
}

export type NewAssignment = Pick<
  ActiveAssignment,
  | 'assignment_key'
  | 'caption_id'
  | 'creator_id'
  | 'schedule_id'
  | 'scheduled_date'
  | 'scheduled_hour'
  | 'price_tier'
  | 'content_category'
  | 'trigger_tag'
  | 'expires_at'
>;

export type ReserveOutcome =
  | { status: 'inserted'; assignment_id: string }
  | { status: 'replayed'; assignment_id: string }
  | { status: 'conflict' };

/**
 * Operations available inside one locking transaction
 */
export interface AssignmentTransaction {
  /**
   * Insert the row only if no active assignment of the same caption lies
   * within +/- cooldownDays of its date. Check and insert are one atomic step.
   */
  tryReserve(row: NewAssignment, cooldownDays: number): Promise<ReserveOutcome>;
  /** Active rows of this schedule carrying one of the keys */
  countReserved(scheduleId: string, assignmentKeys: string[]): Promise<number>;
}

export interface SweepCounts {
  expired: number;
  past_send_date: number;
}

export interface AssignmentRepository {
  /** Active assignments of any creator dated within [fromDate, toDate] */
  listActiveBetween(fromDate: string, toDate: string): Promise<ActiveAssignment[]>;
  /** Active assignments of one creator dated within [fromDate, toDate] */
  listActiveForCreator(creatorId: string, fromDate: string, toDate: string): Promise<ActiveAssignment[]>;
  /**
   * Runs work in a transaction; commits when it resolves, rolls back every
   * row it wrote when it throws.
   */
  inTransaction<T>(work: (tx: AssignmentTransaction) => Promise<T>): Promise<T>;
  deactivateSchedule(scheduleId: string, reason: DeactivationReason, now: Date): Promise<number>;
  deactivateExpired(now: Date, today: string): Promise<SweepCounts>;
  recordSweep(log: LockSweepLog): Promise<void>;
}

export interface OutcomeRepository {
  insertMany(outcomes: DeliveryOutcome[]): Promise<number>;
  /**
   * Outcomes ingested in [since, until) with at least one view, whenever
   * they were sent
   */
  listReceivedBetween(since: Date, until: Date): Promise<DeliveryOutcome[]>;
  /** Median delivery EMV per creator over outcomes sent at or after `since` */
  medianEmvByCreator(creatorIds: string[], since: Date): Promise<Map<string, number>>;
}

export interface RestrictionRepository {
  /** Raw restriction row for a creator; shape is validated by the caller */
  findForCreator(creatorId: string): Promise<Record<string, unknown> | null>;
}
