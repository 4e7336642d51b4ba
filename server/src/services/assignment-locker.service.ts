/**
 * Assignment Locker
 *
 * Reserves captions for a schedule, all-or-nothing. Each pair is one
 * conditional insert inside a single transaction; contention is resolved
 * per caption id by the store, never by a global lock.
 */

import { createHash } from 'crypto';
import { logger } from '../config/logger.js';
import { ConflictError, UnknownCaptionError } from '../errors.js';
import type { Caption } from '../types/models.js';
import type { LockItem, LockRequest, LockResult } from '../types/selection.js';
import { addDays, parseDateKey } from '../utils/dates.js';
import type { AssignmentRepository, CaptionStore, NewAssignment } from './store/types.js';

export interface LockerOptions {
  cooldownDays: number;
  assignmentExpiryDays: number;
}

function compareLockItems(a: LockItem, b: LockItem): number {
  if (a.caption_id !== b.caption_id) return a.caption_id < b.caption_id ? -1 : 1;
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return a.hour - b.hour;
}

export class AssignmentLocker {
  constructor(
    private readonly assignments: AssignmentRepository,
    private readonly captions: CaptionStore,
    private readonly options: LockerOptions
  ) {}

  /**
   * Idempotency key of one (creator, caption, date, hour) reservation
   */
  static assignmentKey(creatorId: string, item: LockItem): string {
    return createHash('sha256')
      .update(`${creatorId}|${item.caption_id}|${item.date}|${item.hour}`)
      .digest('hex');
  }

  async lock(request: LockRequest): Promise<LockResult> {
    const { schedule_id: scheduleId, creator_id: creatorId } = request;
    if (request.assignments.length === 0) {
      return { schedule_id: scheduleId, inserted: 0, replayed: 0, assignment_ids: [] };
    }

    const captionIds = [...new Set(request.assignments.map((a) => a.caption_id))];
    const captions = new Map<string, Caption>(
      (await this.captions.getByIds(captionIds)).map((c) => [c.caption_id, c])
    );
    const unknown = captionIds.filter((id) => !captions.has(id));
    if (unknown.length > 0) {
      throw new UnknownCaptionError(unknown);
    }

    // Caption order keeps per-caption store locks acquired in one global order
    const byKey = new Map<string, LockItem>();
    for (const item of request.assignments) {
      byKey.set(AssignmentLocker.assignmentKey(creatorId, item), item);
    }
    const rows: NewAssignment[] = [...byKey.values()]
      .sort(compareLockItems)
      .map((item) => {
        const caption = captions.get(item.caption_id);
        if (!caption) throw new UnknownCaptionError([item.caption_id]);
        return {
          assignment_key: AssignmentLocker.assignmentKey(creatorId, item),
          caption_id: item.caption_id,
          creator_id: creatorId,
          schedule_id: scheduleId,
          scheduled_date: item.date,
          scheduled_hour: item.hour,
          price_tier: caption.price_tier,
          content_category: caption.content_category,
          trigger_tag: caption.trigger_tag,
          expires_at: parseDateKey(addDays(item.date, this.options.assignmentExpiryDays)),
        };
      });

    try {
      const result = await this.assignments.inTransaction(async (tx) => {
        const conflicts: string[] = [];
        const assignmentIds: string[] = [];
        let inserted = 0;
        let replayed = 0;

        for (const row of rows) {
          const outcome = await tx.tryReserve(row, this.options.cooldownDays);
          if (outcome.status === 'conflict') {
            conflicts.push(row.caption_id);
            continue;
          }
          assignmentIds.push(outcome.assignment_id);
          if (outcome.status === 'inserted') inserted++;
          else replayed++;
        }

        if (conflicts.length > 0) {
          throw new ConflictError([...new Set(conflicts)]);
        }

        // Verify nothing was partially applied before committing
        const reserved = await tx.countReserved(
          scheduleId,
          rows.map((r) => r.assignment_key)
        );
        if (reserved !== rows.length) {
          throw new ConflictError(
            rows.map((r) => r.caption_id),
            `conflict: reserved ${reserved} of ${rows.length} requested`
          );
        }

        return { schedule_id: scheduleId, inserted, replayed, assignment_ids: assignmentIds };
      });

      logger.info('Caption assignments locked', {
        scheduleId,
        creatorId,
        inserted: result.inserted,
        replayed: result.replayed,
      });
      return result;
    } catch (error) {
      if (error instanceof ConflictError) {
        logger.warn('Caption lock batch rolled back', {
          scheduleId,
          creatorId,
          conflicts: error.captionIds,
          reason: error.message,
        });
      }
      throw error;
    }
  }

  /**
   * Release every active reservation of a schedule
   */
  async cancel(scheduleId: string, now: Date = new Date()): Promise<number> {
    const released = await this.assignments.deactivateSchedule(scheduleId, 'cancelled', now);
    logger.info('Schedule reservations cancelled', { scheduleId, released });
    return released;
  }
}
