import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { logger } from '../config/logger.js';
import type { JobControl } from '../container.js';
import { sendValidationError } from './validation.js';

const jobConfigSchema = z
  .object({
    intervalMinutes: z.number().positive(),
    enabled: z.boolean(),
  })
  .partial();

export function createJobRouter(jobs: Record<string, JobControl>) {
  const router = Router();

  function findJob(req: Request, res: Response): JobControl | null {
    const job = Object.prototype.hasOwnProperty.call(jobs, req.params.name) ? jobs[req.params.name] : undefined;
    if (!job) {
      res.status(404).json({ error: `Unknown job: ${req.params.name}` });
      return null;
    }
    return job;
  }

  /**
   * GET /api/job/status
   * Get all background job statuses
   */
  router.get('/status', async (_req: Request, res: Response) => {
    try {
      const status: Record<string, unknown> = {};
      for (const [name, job] of Object.entries(jobs)) {
        await job.syncStateFromDB();
        status[name] = job.getStatus();
      }
      res.json(status);
    } catch (error) {
      logger.error('Get job status error', { error });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * POST /api/job/:name/start
   */
  router.post('/:name/start', async (req: Request, res: Response) => {
    const job = findJob(req, res);
    if (!job) return;
    try {
      await job.start();
      res.json({ success: true, status: job.getStatus() });
    } catch (error) {
      logger.error('Start job error', { error, job: req.params.name });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * POST /api/job/:name/stop
   */
  router.post('/:name/stop', async (req: Request, res: Response) => {
    const job = findJob(req, res);
    if (!job) return;
    try {
      await job.stop();
      res.json({ success: true, status: job.getStatus() });
    } catch (error) {
      logger.error('Stop job error', { error, job: req.params.name });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * POST /api/job/:name/run
   * Run one cycle now
   */
  router.post('/:name/run', async (req: Request, res: Response) => {
    const job = findJob(req, res);
    if (!job) return;
    try {
      const result = await job.runNow();
      res.json({ ...result, status: job.getStatus() });
    } catch (error) {
      logger.error('Run job error', { error, job: req.params.name });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * POST /api/job/:name/config
   * Update interval or enabled flag; a disabled job stays off across worker restarts
   */
  router.post('/:name/config', async (req: Request, res: Response) => {
    const job = findJob(req, res);
    if (!job) return;
    const parsed = jobConfigSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }
    try {
      await job.updateConfig(parsed.data);
      res.json({ success: true, status: job.getStatus() });
    } catch (error) {
      logger.error('Update job config error', { error, job: req.params.name });
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
