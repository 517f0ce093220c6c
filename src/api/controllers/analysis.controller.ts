/**
 * Analysis controller - Runs the blunder pipeline for a Chess.com player
 */

import { Request, Response } from 'express';
import { Chess } from 'chess.js';
import {
  analysisRequestSchema,
  positionRequestSchema,
  validateRequest,
} from '../../utils/validation.js';
import { AnalysisDefaults, AnalysisPipeline, GameSource } from '../../services/AnalysisPipeline.js';
import { ChapterPublisher, chapterName } from '../../services/ChapterPublisher.js';
import { PositionEvaluator, terminalEvaluation } from '../../services/MoveEvaluator.js';
import { colorFromTurn } from '../../services/PgnParserService.js';
import { EvaluationUtils } from '../../classifiers/EvaluationUtils.js';
import type { EngineStats, EngineStatus } from '../../engine/EngineSession.js';
import { logger } from '../../utils/logger.js';
import { PipelineError, errorMessage } from '../../utils/errors.js';
import { createApiError } from '../middleware/errorHandler.js';
import { RunEvent } from '../../types/index.js';

const analysisLogger = logger.child({ controller: 'analysis' });

/**
 * The long-lived engine the server owns
 */
export interface AnalysisEngine extends PositionEvaluator {
  readonly status: EngineStatus;
  readonly queueLength: number;
  getStats(): EngineStats;
}

export interface AnalysisControllerDeps {
  engine: AnalysisEngine;
  openGameSource: (username: string, maxGames: number) => GameSource;
  /** Null when no study is configured */
  publisher: ChapterPublisher | null;
  defaults: AnalysisDefaults;
}

export class AnalysisController {
  private deps: AnalysisControllerDeps;

  constructor(deps: AnalysisControllerDeps) {
    this.deps = deps;
  }

  /**
   * Run the pipeline with SSE streaming
   */
  async startAnalysis(req: Request, res: Response): Promise<void> {
    const validation = validateRequest(analysisRequestSchema, req.body);

    if (!validation.success) {
      res.status(400).json({
        error: 'Validation error',
        details: validation.errors.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      });
      return;
    }

    const input = validation.data;
    const { defaults, publisher, engine } = this.deps;
    const chapterLimit = input.chapterLimit ?? defaults.chapterLimit;

    if (input.publish && !publisher) {
      throw createApiError('Publishing is not configured on this server', 400, 'PUBLISH_UNAVAILABLE');
    }

    const abort = new AbortController();

    // Helper to send SSE events
    const sendEvent = (event: RunEvent) => {
      res.write(`event: ${event.type}\n`);
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    // Thresholds are checked here, before the stream opens
    const pipeline = new AnalysisPipeline(
      {
        depth: input.depth ?? defaults.depth,
        thresholds: input.thresholds ?? defaults.thresholds,
        metric: input.metric ?? defaults.metric,
        candidatePool: input.candidatePool ?? defaults.candidatePool,
        chapterLimit,
        signal: abort.signal,
      },
      {
        onMoveEvaluated: (move, totalPlies) => {
          sendEvent({
            type: 'progress',
            gameId: move.gameId,
            ply: move.ply,
            totalPlies,
            percentage: Math.round((move.ply / totalPlies) * 100 * 10) / 10,
          });
        },
        onGameFinished: (outcome) => {
          sendEvent({
            type: 'game',
            gameId: outcome.gameId,
            status: outcome.status,
            stage: outcome.stage,
            errorTag: outcome.errorTag,
            reason: outcome.reason,
          });
        },
      }
    );

    analysisLogger.info({ username: input.username, maxGames: input.maxGames }, 'Starting analysis');

    // Set up SSE headers
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    res.flushHeaders();

    // Client went away: stop between two evaluations
    res.on('close', () => {
      if (!res.writableEnded) {
        abort.abort();
      }
    });

    try {
      const result = await pipeline.runWith(
        this.deps.openGameSource(input.username, input.maxGames),
        engine
      );

      let published = 0;
      if (input.publish && publisher && !result.report.cancelled) {
        const outcome = await publisher.publish(result.chapters, { limit: chapterLimit });
        published = outcome.chapters.filter((chapter) => chapter.uploaded).length;
      }

      sendEvent({
        type: 'complete',
        report: result.report,
        chapters: result.chapters.map((chapter, index) => ({
          name: chapterName(index + 1, chapter),
          gameId: chapter.metadata.gameId,
          pgn: chapter.pgn,
        })),
        published,
      });

      analysisLogger.info(
        { username: input.username, chapters: result.report.chaptersProduced, published },
        'Analysis completed'
      );
    } catch (error) {
      analysisLogger.error({ err: error, username: input.username }, 'Analysis failed');

      sendEvent({
        type: 'error',
        message: errorMessage(error),
        code: error instanceof PipelineError ? error.code : 'ANALYSIS_ERROR',
      });
    } finally {
      res.end();
    }
  }

  /**
   * Evaluate a single position (quick endpoint)
   */
  async analyzePosition(req: Request, res: Response): Promise<void> {
    const validation = validateRequest(positionRequestSchema, req.body);
    if (!validation.success) {
      throw validation.errors;
    }

    const { fen } = validation.data;
    const depth = validation.data.depth ?? this.deps.defaults.depth;

    let chess: Chess;
    try {
      chess = new Chess(fen);
    } catch (error) {
      throw createApiError('Invalid FEN', 400, 'INVALID_FEN', errorMessage(error));
    }

    const evaluation = chess.isCheckmate() || chess.isStalemate()
      ? terminalEvaluation(chess.isCheckmate())
      : await this.deps.engine.evaluate(fen, depth);

    const whiteCp = EvaluationUtils.toPlayerPerspective(evaluation.score, colorFromTurn(chess.turn()), 'white');

    res.json({
      fen,
      depth: evaluation.depth,
      score: evaluation.score,
      bestMove: evaluation.bestMove,
      pv: evaluation.pv,
      whiteCp,
      whiteWinProbability: EvaluationUtils.winProbability(whiteCp),
    });
  }
}
