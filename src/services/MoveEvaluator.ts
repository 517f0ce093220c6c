/**
 * Move Evaluator - Replays a game and evaluates every ply with the engine
 */

import { Evaluation, EvaluatedMove, Game } from '../types/index.js';
import { RETRY_CONFIG } from '../config/constants.js';
import { CentipawnLossCalculator, centipawnLossCalculator } from '../classifiers/index.js';
import { EngineProtocolError, EngineTimeoutError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { PgnParserService, ReplayedMove, pgnParserService } from './PgnParserService.js';

const evaluatorLogger = logger.child({ service: 'MoveEvaluator' });

/**
 * Anything that can evaluate a position to a fixed depth
 */
export interface PositionEvaluator {
  evaluate: (fen: string, depth: number) => Promise<Evaluation>;
  /** Optional: called once before each game */
  newGame?: () => Promise<void>;
}

export interface EvaluateGameOptions {
  depth: number;
  signal?: AbortSignal;
  onMoveEvaluated?: (move: EvaluatedMove, totalPlies: number) => void;
}

/**
 * Evaluation of a position that ends the game; the engine is not asked
 */
export function terminalEvaluation(isCheckmate: boolean): Evaluation {
  return {
    // The side to move is mated
    score: isCheckmate ? { type: 'mate', value: 0 } : { type: 'cp', value: 0 },
    bestMove: null,
    pv: [],
    depth: 0,
  };
}

export class MoveEvaluator {
  private readonly engine: PositionEvaluator;
  private readonly parser: PgnParserService;
  private readonly calculator: CentipawnLossCalculator;

  constructor(
    engine: PositionEvaluator,
    parser: PgnParserService = pgnParserService,
    calculator: CentipawnLossCalculator = centipawnLossCalculator
  ) {
    this.engine = engine;
    this.parser = parser;
    this.calculator = calculator;
  }

  /**
   * Evaluate every ply of a game, strictly in order.
   * Each position is evaluated once: Evaluation-after of ply i is
   * Evaluation-before of ply i+1.
   */
  async evaluateGame(game: Game, options: EvaluateGameOptions): Promise<EvaluatedMove[]> {
    const plies = this.parser.replay(game.moves, game.initialFen);
    if (plies.length === 0) {
      return [];
    }

    evaluatorLogger.debug({ gameId: game.id, plies: plies.length, depth: options.depth }, 'Evaluating game');

    await this.engine.newGame?.();

    const evaluated: EvaluatedMove[] = [];
    let before = await this.evaluatePosition(plies[0].before.fen, options);

    for (const ply of plies) {
      const after = ply.isTerminal
        ? terminalEvaluation(ply.isCheckmate)
        : await this.evaluatePosition(ply.after.fen, options);

      const move = this.buildMove(game, ply, before, after);
      evaluated.push(move);
      options.onMoveEvaluated?.(move, plies.length);

      before = after;
    }

    return evaluated;
  }

  private buildMove(game: Game, ply: ReplayedMove, before: Evaluation, after: Evaluation): EvaluatedMove {
    const metrics = this.calculator.calculate({ mover: ply.mover, before, after });

    return {
      gameId: game.id,
      ply: ply.ply,
      moveNumber: ply.moveNumber,
      mover: ply.mover,
      isPlayerMove: ply.mover === game.playerColor,
      san: ply.san,
      uci: ply.uci,
      positionBefore: ply.before,
      positionAfter: ply.after,
      evaluationBefore: before,
      evaluationAfter: after,
      ...metrics,
    };
  }

  /**
   * Cancellation is observed here, between engine requests
   */
  private async evaluatePosition(fen: string, options: EvaluateGameOptions): Promise<Evaluation> {
    options.signal?.throwIfAborted();
    return this.evaluateWithRetry(fen, options.depth);
  }

  private async evaluateWithRetry(fen: string, depth: number): Promise<Evaluation> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= RETRY_CONFIG.MAX_ATTEMPTS; attempt++) {
      try {
        return await this.engine.evaluate(fen, depth);
      } catch (error) {
        if (!(error instanceof EngineTimeoutError || error instanceof EngineProtocolError)) {
          throw error;
        }
        lastError = error;
        evaluatorLogger.warn({ fen, attempt, code: error.code }, 'Engine evaluation failed');
      }
    }

    throw lastError ?? new EngineProtocolError(`Evaluation failed for ${fen}`);
  }
}
