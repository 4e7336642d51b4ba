import { Router, Request, Response } from 'express';
import { logger } from '../config/logger.js';
import { ConflictError, UnknownCaptionError } from '../errors.js';
import type { AssignmentLocker } from '../services/assignment-locker.service.js';
import { CAPTIONS_RESERVED } from '../services/caption-selection.service.js';
import { lockRequestSchema, sendValidationError } from './validation.js';

export function createAssignmentsRouter(locker: AssignmentLocker) {
  const router = Router();

  /**
   * POST /api/assignments/lock
   * Reserve captions for a schedule; 409 when any caption is already taken
   */
  router.post('/lock', async (req: Request, res: Response) => {
    const parsed = lockRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const result = await locker.lock(parsed.data);
      res.json({ success: true, ...result });
    } catch (error) {
      if (error instanceof ConflictError) {
        return res.status(409).json({ error: CAPTIONS_RESERVED, caption_ids: error.captionIds });
      }
      if (error instanceof UnknownCaptionError) {
        return res.status(400).json({ error: error.message, caption_ids: error.captionIds });
      }
      logger.error('Lock assignments error', { error, scheduleId: parsed.data.schedule_id });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * POST /api/assignments/:scheduleId/cancel
   * Release every active reservation of a schedule
   */
  router.post('/:scheduleId/cancel', async (req: Request, res: Response) => {
    try {
      const released = await locker.cancel(req.params.scheduleId);
      res.json({ success: true, released });
    } catch (error) {
      logger.error('Cancel schedule error', { error, scheduleId: req.params.scheduleId });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
