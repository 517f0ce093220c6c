/**
 * Analysis routes
 */

import { RequestHandler, Router } from 'express';
import { AnalysisController } from '../controllers/analysis.controller.js';

export function createAnalysisRouter(controller: AnalysisController, auth: RequestHandler): Router {
  const router = Router();

  /**
   * POST /api/v1/analysis
   * Analyze a player's recent games and build blunder chapters
   * Returns SSE stream with game, progress, complete and error events
   *
   * Request body:
   * {
   *   username: string,
   *   maxGames?: number,
   *   depth?: number,
   *   thresholds?: { inaccuracy, mistake, blunder },
   *   metric?: 'cp_loss' | 'wp_swing',
   *   candidatePool?: 'player' | 'notable',
   *   chapterLimit?: number,
   *   publish?: boolean
   * }
   */
  router.post('/', auth, (req, res, next) => {
    controller.startAnalysis(req, res).catch(next);
  });

  /**
   * POST /api/v1/analysis/position
   * Evaluate a single position
   */
  router.post('/position', auth, (req, res, next) => {
    controller.analyzePosition(req, res).catch(next);
  });

  return router;
}
