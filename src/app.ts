/**
 * Express application factory
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import { createAnalysisRoutes, type AnalysisRouteDeps } from './routes/analysis-routes.js';
import { requestLogger, errorLogger } from './middleware/request-logger.js';

export function createApp(deps: AnalysisRouteDeps = {}) {
  const app = express();

  // Transcripts can be long
  app.use(express.json({ limit: '5mb' }));
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.use('/api', createAnalysisRoutes(deps));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not found',
      path: req.path,
    });
  });

  app.use(errorLogger);

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? err.message : undefined,
    });
  });

  return app;
}
