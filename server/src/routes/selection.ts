import { Router, Request, Response } from 'express';
import { logger } from '../config/logger.js';
import type { CaptionSelectionService } from '../services/caption-selection.service.js';
import { selectAndLockSchema, selectionRequestSchema, sendValidationError } from './validation.js';

export function createSelectionRouter(selection: CaptionSelectionService) {
  const router = Router();

  /**
   * POST /api/selection
   * Rank and return captions for a creator without reserving them
   */
  router.post('/', async (req: Request, res: Response) => {
    const parsed = selectionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const response = await selection.select(parsed.data);
      res.json(response);
    } catch (error) {
      logger.error('Caption selection error', { error, creatorId: parsed.data.creator_id });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * POST /api/selection/lock
   * Select, then reserve the captions onto the given slots (all-or-nothing)
   */
  router.post('/lock', async (req: Request, res: Response) => {
    const parsed = selectAndLockSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    const { schedule_id: scheduleId, slots, ...request } = parsed.data;
    try {
      const response = await selection.selectAndLock(request, scheduleId, slots);
      res.status(response.conflicting_caption_ids ? 409 : 200).json(response);
    } catch (error) {
      logger.error('Select and lock error', { error, scheduleId, creatorId: request.creator_id });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
