/**
 * Analysis Pipeline - Drives games through evaluation, classification
 * and chapter synthesis, and collects the output tables
 *
 * Per game: fetched → evaluated → classified → selected | skipped → emitted,
 * or failed with an error tag. A failed game never stops the run;
 * an unavailable engine always does.
 */

import {
  BlunderRecord,
  CandidatePool,
  Chapter,
  EvaluatedMove,
  Game,
  GameOutcome,
  GameStage,
  GameSummary,
  MoveLabel,
  MoveRecord,
  RankingMetric,
  RunReport,
  RunResult,
} from '../types/index.js';
import { BlunderClassifier, type ClassificationThresholds, worstLabel } from '../classifiers/index.js';
import { EngineSessionOptions, withEngineSession } from '../engine/EngineSession.js';
import { errorMessage, isAbortError, isGameLevelError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  ChapterSynthesizer,
  chapterSourceFromBlunder,
  chapterSynthesizer,
  rankChapters,
} from './ChapterSynthesizer.js';
import { MoveEvaluator, PositionEvaluator } from './MoveEvaluator.js';

const pipelineLogger = logger.child({ service: 'AnalysisPipeline' });

export type GameSource = AsyncIterable<Game> | Iterable<Game>;

export interface PipelineOptions {
  depth: number;
  thresholds: ClassificationThresholds;
  metric: RankingMetric;
  candidatePool?: CandidatePool;
  /** Keep only the top N chapters; 0 keeps all */
  chapterLimit?: number;
  signal?: AbortSignal;
}

/**
 * Settings a caller falls back to when a request leaves them out
 */
export type AnalysisDefaults = Required<Omit<PipelineOptions, 'signal'>>;

export interface PipelineCallbacks {
  onGameStart?: (game: Game, index: number) => void;
  onMoveEvaluated?: (move: EvaluatedMove, totalPlies: number) => void;
  onGameFinished?: (outcome: GameOutcome, summary: GameSummary) => void;
}

interface RunTables {
  summaries: GameSummary[];
  moves: MoveRecord[];
  blunders: BlunderRecord[];
  chapters: Chapter[];
  outcomes: GameOutcome[];
}

export class AnalysisPipeline {
  private readonly options: PipelineOptions;
  private readonly callbacks: PipelineCallbacks;
  private readonly classifier: BlunderClassifier;
  private readonly synthesizer: ChapterSynthesizer;

  constructor(
    options: PipelineOptions,
    callbacks: PipelineCallbacks = {},
    synthesizer: ChapterSynthesizer = chapterSynthesizer
  ) {
    this.options = options;
    this.callbacks = callbacks;
    // Throws InvalidThresholdsError before any engine is started
    this.classifier = new BlunderClassifier({
      thresholds: options.thresholds,
      metric: options.metric,
      candidatePool: options.candidatePool,
    });
    this.synthesizer = synthesizer;
  }

  /**
   * Run with a session of its own, opened for the run and always closed
   */
  run(source: GameSource, engineOptions: EngineSessionOptions): Promise<RunResult> {
    return withEngineSession(engineOptions, (session) => this.runWith(source, session));
  }

  /**
   * Run on an engine owned by the caller
   */
  async runWith(source: GameSource, engine: PositionEvaluator): Promise<RunResult> {
    const evaluator = new MoveEvaluator(engine);
    const tables: RunTables = { summaries: [], moves: [], blunders: [], chapters: [], outcomes: [] };
    const { signal } = this.options;
    let cancelled = false;
    let index = 0;

    pipelineLogger.info(
      { depth: this.options.depth, metric: this.options.metric, thresholds: this.classifier.thresholds },
      'Analysis run started'
    );

    for await (const game of source) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      this.callbacks.onGameStart?.(game, index++);
      try {
        await this.processGame(game, evaluator, tables);
      } catch (error) {
        if (signal?.aborted || isAbortError(error)) {
          cancelled = true;
          break;
        }
        throw error;
      }
    }

    const chapters = rankChapters(tables.chapters, this.options.chapterLimit ?? 0);
    const report = buildReport(tables.outcomes, chapters.length, cancelled);

    pipelineLogger.info(
      {
        gamesProcessed: report.gamesProcessed,
        skipped: report.skipped.length,
        failed: report.failed.length,
        chapters: report.chaptersProduced,
        cancelled,
      },
      'Analysis run finished'
    );

    return {
      summaries: tables.summaries,
      moves: tables.moves,
      blunders: tables.blunders,
      chapters,
      outcomes: tables.outcomes,
      report,
    };
  }

  private async processGame(game: Game, evaluator: MoveEvaluator, tables: RunTables): Promise<void> {
    let stage: GameStage = 'fetched';
    let records: MoveRecord[] = [];

    try {
      const evaluated = await evaluator.evaluateGame(game, {
        depth: this.options.depth,
        signal: this.options.signal,
        onMoveEvaluated: this.callbacks.onMoveEvaluated,
      });
      stage = 'evaluated';

      records = this.classifier.classifyMoves(evaluated);
      stage = 'classified';

      const blunder = this.classifier.selectBlunder(records);
      if (!blunder) {
        const reason = records.length === 0 ? 'game has no moves' : 'no notable move by the player';
        tables.moves.push(...records);
        this.finish(tables, game, records, null, { gameId: game.id, stage: 'skipped', status: 'skipped', reason });
        return;
      }
      stage = 'selected';

      const chapter = this.synthesizer.synthesize(chapterSourceFromBlunder(blunder, game));

      tables.moves.push(...records);
      tables.blunders.push(blunder);
      tables.chapters.push(chapter);
      this.finish(tables, game, records, blunder, { gameId: game.id, stage: 'emitted', status: 'emitted' });
    } catch (error) {
      if (!isGameLevelError(error)) {
        throw error;
      }

      pipelineLogger.warn({ gameId: game.id, stage, code: error.code, err: error }, 'Game failed');
      // Per-ply rows survive a failure after classification; blunder and chapter never do
      if (stage === 'classified' || stage === 'selected') {
        tables.moves.push(...records);
      }
      this.finish(tables, game, records, null, {
        gameId: game.id,
        stage: 'failed',
        status: 'failed',
        errorTag: error.code,
        reason: errorMessage(error),
      });
    }
  }

  private finish(
    tables: RunTables,
    game: Game,
    records: readonly MoveRecord[],
    blunder: BlunderRecord | null,
    outcome: GameOutcome
  ): void {
    const summary = buildSummary(game, records, blunder, outcome);
    tables.summaries.push(summary);
    tables.outcomes.push(outcome);

    pipelineLogger.debug({ gameId: game.id, status: outcome.status, reason: outcome.reason }, 'Game finished');
    this.callbacks.onGameFinished?.(outcome, summary);
  }
}

/**
 * Per-game summary row. Counts and maxima cover the tracked player's moves.
 */
export function buildSummary(
  game: Game,
  records: readonly MoveRecord[],
  blunder: BlunderRecord | null,
  outcome: GameOutcome
): GameSummary {
  const playerMoves = records.filter((record) => record.isPlayerMove);
  const count = (label: MoveLabel): number => playerMoves.filter((record) => record.label === label).length;

  return {
    gameId: game.id,
    status: outcome.status,
    errorTag: outcome.errorTag ?? null,
    endTime: game.endTime,
    timeClass: game.timeClass,
    timeControl: game.timeControl,
    rules: game.rules,
    playerName: game.playerName,
    playerColor: game.playerColor,
    opponentName: game.opponentName,
    playerRating: game.playerRating,
    opponentRating: game.opponentRating,
    result: game.result,
    accuracy: game.accuracy,
    moveCount: game.moves.length,
    pliesAnalyzed: records.length,
    inaccuracies: count(MoveLabel.INACCURACY),
    mistakes: count(MoveLabel.MISTAKE),
    blunders: count(MoveLabel.BLUNDER),
    maxCpLoss: playerMoves.reduce((max, record) => Math.max(max, record.cpLoss), 0),
    maxWpSwing: playerMoves.reduce((max, record) => Math.max(max, Math.abs(record.wpSwing)), 0),
    worstLabel: worstLabel(playerMoves),
    rankingValue: blunder ? blunder.rankingValue : null,
  };
}

function buildReport(outcomes: readonly GameOutcome[], chaptersProduced: number, cancelled: boolean): RunReport {
  return {
    gamesProcessed: outcomes.length,
    skipped: outcomes
      .filter((outcome) => outcome.status === 'skipped')
      .map((outcome) => ({ gameId: outcome.gameId, reason: outcome.reason ?? '' })),
    failed: outcomes
      .filter((outcome) => outcome.status === 'failed')
      .map((outcome) => ({
        gameId: outcome.gameId,
        errorTag: outcome.errorTag ?? 'UNKNOWN',
        reason: outcome.reason ?? '',
      })),
    chaptersProduced,
    cancelled,
  };
}
