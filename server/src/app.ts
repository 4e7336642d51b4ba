import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { logger } from './config/logger.js';
import type { Container } from './container.js';

import { createSelectionRouter } from './routes/selection.js';
import { createAssignmentsRouter } from './routes/assignments.js';
import { createFeedbackRouter } from './routes/feedback.js';
import { createJobRouter } from './routes/job.js';

export function createApp(container: Container) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`, {
      body: req.body && Object.keys(req.body).length > 0 ? '(has body)' : undefined,
    });
    next();
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes
  app.use('/api/selection', createSelectionRouter(container.selection));
  app.use('/api/assignments', createAssignmentsRouter(container.locker));
  app.use('/api/feedback', createFeedbackRouter(container.outcomes));
  app.use('/api/job', createJobRouter(container.jobs));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
    });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
