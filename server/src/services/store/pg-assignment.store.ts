/**
 * PostgreSQL assignment store
 *
 * Reservation uses a transaction-scoped advisory lock keyed on the caption id,
 * so two batches contend only when they share a caption, followed by a
 * conditional insert that re-checks the cooldown window under that lock.
 */

import type { PoolClient } from 'pg';
import { query, withTransaction } from '../../db/client.js';
import type { ActiveAssignment, DeactivationReason, LockSweepLog } from '../../types/models.js';
import type {
  AssignmentRepository,
  AssignmentTransaction,
  NewAssignment,
  ReserveOutcome,
  SweepCounts,
} from './types.js';

const ASSIGNMENT_COLUMNS = `assignment_id::text AS assignment_id, assignment_key, caption_id, creator_id,
  schedule_id, scheduled_date::text AS scheduled_date, scheduled_hour, price_tier, content_category,
  trigger_tag, is_active, created_at, expires_at, deactivated_at, deactivation_reason`;

class PgAssignmentTransaction implements AssignmentTransaction {
  constructor(private readonly client: PoolClient) {}

  async tryReserve(row: NewAssignment, cooldownDays: number): Promise<ReserveOutcome> {
    await this.client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [row.caption_id]);

    const existing = await this.client.query<{ assignment_id: string; schedule_id: string }>(
      `SELECT assignment_id::text AS assignment_id, schedule_id
       FROM active_caption_assignments
       WHERE assignment_key = $1 AND is_active`,
      [row.assignment_key]
    );
    if (existing.rows.length > 0) {
      const [match] = existing.rows;
      return match.schedule_id === row.schedule_id
        ? { status: 'replayed', assignment_id: match.assignment_id }
        : { status: 'conflict' };
    }

    const inserted = await this.client.query<{ assignment_id: string }>(
      `INSERT INTO active_caption_assignments (
         assignment_key, caption_id, creator_id, schedule_id, scheduled_date, scheduled_hour,
         price_tier, content_category, trigger_tag, expires_at
       )
       SELECT $1, $2, $3, $4, $5::date, $6, $7, $8, $9, $10
       WHERE NOT EXISTS (
         SELECT 1 FROM active_caption_assignments
         WHERE caption_id = $2
           AND is_active
           AND expires_at > now()
           AND scheduled_date BETWEEN $5::date - $11::int AND $5::date + $11::int
       )
       RETURNING assignment_id::text AS assignment_id`,
      [
        row.assignment_key,
        row.caption_id,
        row.creator_id,
        row.schedule_id,
        row.scheduled_date,
        row.scheduled_hour,
        row.price_tier,
        row.content_category,
        row.trigger_tag,
        row.expires_at,
        cooldownDays,
      ]
    );

    if (inserted.rows.length === 0) {
      return { status: 'conflict' };
    }
    return { status: 'inserted', assignment_id: inserted.rows[0].assignment_id };
  }

  async countReserved(scheduleId: string, assignmentKeys: string[]): Promise<number> {
    const result = await this.client.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count
       FROM active_caption_assignments
       WHERE schedule_id = $1 AND assignment_key = ANY($2::text[]) AND is_active`,
      [scheduleId, assignmentKeys]
    );
    return result.rows[0]?.count ?? 0;
  }
}

export class PgAssignmentStore implements AssignmentRepository {
  async listActiveBetween(fromDate: string, toDate: string): Promise<ActiveAssignment[]> {
    const result = await query<ActiveAssignment>(
      `SELECT ${ASSIGNMENT_COLUMNS}
       FROM active_caption_assignments
       WHERE is_active AND scheduled_date BETWEEN $1::date AND $2::date`,
      [fromDate, toDate]
    );
    return result.rows;
  }

  async listActiveForCreator(creatorId: string, fromDate: string, toDate: string): Promise<ActiveAssignment[]> {
    const result = await query<ActiveAssignment>(
      `SELECT ${ASSIGNMENT_COLUMNS}
       FROM active_caption_assignments
       WHERE is_active AND creator_id = $1 AND scheduled_date BETWEEN $2::date AND $3::date
       ORDER BY scheduled_date DESC, scheduled_hour DESC NULLS LAST`,
      [creatorId, fromDate, toDate]
    );
    return result.rows;
  }

  async inTransaction<T>(work: (tx: AssignmentTransaction) => Promise<T>): Promise<T> {
    return withTransaction((client) => work(new PgAssignmentTransaction(client)));
  }

  async deactivateSchedule(scheduleId: string, reason: DeactivationReason, now: Date): Promise<number> {
    const result = await query(
      `UPDATE active_caption_assignments
       SET is_active = FALSE, deactivated_at = $2, deactivation_reason = $3
       WHERE schedule_id = $1 AND is_active`,
      [scheduleId, now, reason]
    );
    return result.rowCount ?? 0;
  }

  async deactivateExpired(now: Date, today: string): Promise<SweepCounts> {
    return withTransaction(async (client) => {
      const expired = await client.query(
        `UPDATE active_caption_assignments
         SET is_active = FALSE, deactivated_at = $1, deactivation_reason = 'expired'
         WHERE is_active AND expires_at <= $1`,
        [now]
      );
      const pastSendDate = await client.query(
        `UPDATE active_caption_assignments
         SET is_active = FALSE, deactivated_at = $1, deactivation_reason = 'past_send_date'
         WHERE is_active AND scheduled_date < $2::date`,
        [now, today]
      );
      return {
        expired: expired.rowCount ?? 0,
        past_send_date: pastSendDate.rowCount ?? 0,
      };
    });
  }

  async recordSweep(log: LockSweepLog): Promise<void> {
    await query(
      `INSERT INTO lock_sweep_log (sweep_id, swept_at, expired_count, past_send_date_count, duration_ms)
       VALUES ($1, $2, $3, $4, $5)`,
      [log.sweep_id, log.swept_at, log.expired_count, log.past_send_date_count, log.duration_ms]
    );
  }
}
