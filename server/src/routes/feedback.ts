import { Router, Request, Response } from 'express';
import { logger } from '../config/logger.js';
import type { OutcomeRepository } from '../services/store/types.js';
import { outcomeBatchSchema, sendValidationError } from './validation.js';

export function createFeedbackRouter(outcomes: OutcomeRepository) {
  const router = Router();

  /**
   * POST /api/feedback/outcomes
   * Store a batch of delivery outcomes for the next feedback run
   */
  router.post('/outcomes', async (req: Request, res: Response) => {
    const parsed = outcomeBatchSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const inserted = await outcomes.insertMany(parsed.data.outcomes);
      res.json({ success: true, inserted });
    } catch (error) {
      logger.error('Outcome ingestion error', { error, count: parsed.data.outcomes.length });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
