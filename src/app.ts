/**
 * Express application setup
 */

import express, { Express, RequestHandler } from 'express';
import helmet from 'helmet';
import { corsMiddleware } from './api/middleware/cors.middleware.js';
import { authMiddleware } from './api/middleware/auth.middleware.js';
import { errorHandler } from './api/middleware/errorHandler.js';
import type { AnalysisControllerDeps } from './api/controllers/analysis.controller.js';
import { API_VERSION } from './api/routes/health.routes.js';
import { createApiRouter } from './api/routes/index.js';
import { logger } from './utils/logger.js';

export function createApp(deps: AnalysisControllerDeps, auth: RequestHandler = authMiddleware): Express {
  const app = express();

  // Security headers
  app.use(helmet());

  // CORS
  app.use(corsMiddleware);

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: `${duration}ms`,
        },
        'Request completed'
      );
    });

    next();
  });

  // API routes
  app.use('/api/v1', createApiRouter(deps, auth));

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      name: 'Blunder Chapters API',
      version: API_VERSION,
      status: 'running',
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
