/**
 * Health check routes
 */

import { Router, Request, Response } from 'express';
import { HealthResponse } from '../../types/index.js';
import type { AnalysisEngine } from '../controllers/analysis.controller.js';

export const API_VERSION = '1.0.0';

export function createHealthRouter(engine: AnalysisEngine): Router {
  const router = Router();
  const startTime = Date.now();

  router.get('/', (_req: Request, res: Response) => {
    const status = engine.status;

    const response: HealthResponse = {
      status: status === 'ready' || status === 'busy' ? 'healthy' : status === 'faulted' ? 'degraded' : 'unhealthy',
      engine: status,
      queueLength: engine.queueLength,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      version: API_VERSION,
    };

    const statusCode = response.status === 'healthy' ? 200 : 503;
    res.status(statusCode).json(response);
  });

  // Detailed status for debugging
  router.get('/detailed', (_req: Request, res: Response) => {
    res.json({
      ...engine.getStats(),
      uptime: Math.floor((Date.now() - startTime) / 1000),
      memory: process.memoryUsage(),
    });
  });

  return router;
}
