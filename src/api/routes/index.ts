/**
 * API routes index
 */

import { RequestHandler, Router } from 'express';
import { AnalysisController, AnalysisControllerDeps } from '../controllers/analysis.controller.js';
import { createAnalysisRouter } from './analysis.routes.js';
import { createHealthRouter } from './health.routes.js';

export function createApiRouter(deps: AnalysisControllerDeps, auth: RequestHandler): Router {
  const router = Router();

  // Mount routes
  router.use('/health', createHealthRouter(deps.engine));
  router.use('/analysis', createAnalysisRouter(new AnalysisController(deps), auth));

  return router;
}
