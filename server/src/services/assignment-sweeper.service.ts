/**
 * Assignment Sweeper
 *
 * Deactivates reservations that expired or whose send date has passed.
 * Rows are kept for audit; only is_active flips.
 */

import { randomUUID } from 'crypto';
import { logger } from '../config/logger.js';
import type { LockSweepLog } from '../types/models.js';
import { toDateKey } from '../utils/dates.js';
import type { AssignmentRepository } from './store/types.js';

export const SWEEP_WARN_THRESHOLD = 1000;

export class AssignmentSweeper {
  constructor(private readonly assignments: AssignmentRepository) {}

  async sweep(now: Date = new Date()): Promise<LockSweepLog> {
    const startTime = Date.now();
    const counts = await this.assignments.deactivateExpired(now, toDateKey(now));

    const log: LockSweepLog = {
      sweep_id: randomUUID(),
      swept_at: now,
      expired_count: counts.expired,
      past_send_date_count: counts.past_send_date,
      duration_ms: Date.now() - startTime,
    };
    await this.assignments.recordSweep(log);

    const total = counts.expired + counts.past_send_date;
    if (total > SWEEP_WARN_THRESHOLD) {
      logger.warn('Large assignment sweep', { total, threshold: SWEEP_WARN_THRESHOLD });
    }
    logger.info('Assignment sweep completed', {
      expired: counts.expired,
      pastSendDate: counts.past_send_date,
      durationMs: log.duration_ms,
    });

    return log;
  }
}
