/**
 * Output Writer - CSV tables and the chapter PGN file of a run
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import {
  BlunderRecord,
  Chapter,
  Evaluation,
  GameSummary,
  MoveLabel,
  MoveRecord,
  RankingMetric,
  RunResult,
} from '../types/index.js';
import { OUTPUT_FILES } from '../config/constants.js';
import { logger } from '../utils/logger.js';
import type { ChapterSource } from './ChapterSynthesizer.js';

const writerLogger = logger.child({ service: 'OutputWriter' });

type CsvRow = Record<string, string | number>;

export const SUMMARY_COLUMNS = [
  'game_url',
  'status',
  'error_tag',
  'end_time_utc',
  'time_class',
  'time_control',
  'rules',
  'color',
  'opponent',
  'my_rating',
  'opponent_rating',
  'my_result_code',
  'my_accuracy',
  'move_count',
  'plies_analyzed',
  'inaccuracies',
  'mistakes',
  'blunders',
  'max_cp_loss',
  'max_wp_swing',
  'worst_label',
  'ranking_value',
] as const;

export const MOVE_COLUMNS = [
  'game_url',
  'end_time_utc',
  'opponent',
  'my_color',
  'ply',
  'move_number',
  'move_san',
  'move_uci',
  'side_to_move',
  'is_my_move',
  'eval_before_kind',
  'eval_before_cp',
  'eval_before_mate',
  'eval_after_kind',
  'eval_after_cp',
  'eval_after_mate',
  'wp_before',
  'wp_after',
  'wp_swing',
  'cp_loss',
  'label',
  'fen_before',
  'fen_after',
] as const;

export const BLUNDER_COLUMNS = [
  'game_url',
  'end_time_utc',
  'player',
  'opponent',
  'my_color',
  'ply',
  'move_number',
  'label',
  'played_move_san',
  'played_move_uci',
  'best_move_uci',
  'eval_before_kind',
  'eval_before_cp',
  'eval_before_mate',
  'eval_after_kind',
  'eval_after_cp',
  'eval_after_mate',
  'wp_before',
  'wp_after',
  'wp_swing',
  'cp_loss',
  'ranking_metric',
  'ranking_value',
  'fen_before',
  'fen_after',
] as const;

/**
 * Context the move and blunder rows repeat from their game
 */
export interface GameContext {
  playerName: string;
  opponentName: string;
  endTime: string | null;
}

function evalColumns(prefix: 'eval_before' | 'eval_after', evaluation: Evaluation): CsvRow {
  const { score } = evaluation;
  return {
    [`${prefix}_kind`]: score.type,
    [`${prefix}_cp`]: score.type === 'cp' ? score.value : '',
    [`${prefix}_mate`]: score.type === 'mate' ? score.value : '',
  };
}

function optional(value: number | string | null): string | number {
  return value ?? '';
}

export function summaryRow(summary: GameSummary): CsvRow {
  return {
    game_url: summary.gameId,
    status: summary.status,
    error_tag: optional(summary.errorTag),
    end_time_utc: optional(summary.endTime),
    time_class: summary.timeClass,
    time_control: summary.timeControl,
    rules: summary.rules,
    color: summary.playerColor,
    opponent: summary.opponentName,
    my_rating: optional(summary.playerRating),
    opponent_rating: optional(summary.opponentRating),
    my_result_code: summary.result,
    my_accuracy: optional(summary.accuracy),
    move_count: summary.moveCount,
    plies_analyzed: summary.pliesAnalyzed,
    inaccuracies: summary.inaccuracies,
    mistakes: summary.mistakes,
    blunders: summary.blunders,
    max_cp_loss: summary.maxCpLoss,
    max_wp_swing: summary.maxWpSwing.toFixed(4),
    worst_label: optional(summary.worstLabel),
    ranking_value: summary.rankingValue === null ? '' : summary.rankingValue.toFixed(6),
  };
}

export function moveRow(move: MoveRecord, context: GameContext): CsvRow {
  const playerColor = move.isPlayerMove ? move.mover : move.mover === 'white' ? 'black' : 'white';
  return {
    game_url: move.gameId,
    end_time_utc: optional(context.endTime),
    opponent: context.opponentName,
    my_color: playerColor,
    ply: move.ply,
    move_number: move.moveNumber,
    move_san: move.san,
    move_uci: move.uci,
    side_to_move: move.mover,
    is_my_move: move.isPlayerMove ? 1 : 0,
    ...evalColumns('eval_before', move.evaluationBefore),
    ...evalColumns('eval_after', move.evaluationAfter),
    wp_before: move.wpBefore.toFixed(6),
    wp_after: move.wpAfter.toFixed(6),
    wp_swing: move.wpSwing.toFixed(6),
    cp_loss: move.cpLoss,
    label: move.label,
    fen_before: move.positionBefore.fen,
    fen_after: move.positionAfter.fen,
  };
}

export function blunderRow(blunder: BlunderRecord, context: GameContext): CsvRow {
  return {
    game_url: blunder.gameId,
    end_time_utc: optional(context.endTime),
    player: context.playerName,
    opponent: context.opponentName,
    my_color: blunder.mover,
    ply: blunder.ply,
    move_number: blunder.moveNumber,
    label: blunder.label,
    played_move_san: blunder.san,
    played_move_uci: blunder.uci,
    best_move_uci: optional(blunder.evaluationBefore.bestMove),
    ...evalColumns('eval_before', blunder.evaluationBefore),
    ...evalColumns('eval_after', blunder.evaluationAfter),
    wp_before: blunder.wpBefore.toFixed(6),
    wp_after: blunder.wpAfter.toFixed(6),
    wp_swing: blunder.wpSwing.toFixed(6),
    cp_loss: blunder.cpLoss,
    ranking_metric: blunder.rankingMetric,
    ranking_value: blunder.rankingValue.toFixed(6),
    fen_before: blunder.positionBefore.fen,
    fen_after: blunder.positionAfter.fen,
  };
}

export function toCsv(rows: readonly CsvRow[], columns: readonly string[]): string {
  return stringify([...rows], { header: true, columns: [...columns] });
}

/**
 * Chapters one after another, separated by a blank line
 */
export function chaptersToPgn(chapters: readonly Chapter[]): string {
  return chapters.map((chapter) => chapter.pgn.trim() + '\n').join('\n');
}

// ═══════════════════════════════════════════════════════════════════════
// Reading back
// ═══════════════════════════════════════════════════════════════════════

const blunderRowSchema = z.object({
  game_url: z.string().min(1),
  end_time_utc: z.string().default(''),
  player: z.string().default(''),
  opponent: z.string().default(''),
  my_color: z.enum(['white', 'black']),
  ply: z.coerce.number().int().positive(),
  move_number: z.coerce.number().int().positive(),
  label: z.nativeEnum(MoveLabel),
  played_move_uci: z.string().min(4),
  best_move_uci: z.string().default(''),
  wp_swing: z.coerce.number(),
  cp_loss: z.coerce.number(),
  fen_before: z.string().min(1),
});

const moveRowSchema = z.object({
  game_url: z.string().min(1),
  end_time_utc: z.string().default(''),
  opponent: z.string().default(''),
  my_color: z.string().default(''),
  ply: z.coerce.number().int(),
  is_my_move: z.string().default('0'),
  label: z.string().default(''),
});

export type MoveCsvRow = z.infer<typeof moveRowSchema>;

function parseCsv(text: string): unknown[] {
  return parse(text, { columns: true, skip_empty_lines: true, bom: true });
}

/**
 * Chapter sources from blunders.csv, ranked by `metric`
 */
export function parseBlunderCsv(text: string, metric: RankingMetric): ChapterSource[] {
  const rows = z.array(blunderRowSchema).parse(parseCsv(text));

  return rows.map((row) => ({
    gameId: row.game_url,
    playerName: row.player,
    playerColor: row.my_color,
    opponentName: row.opponent,
    endTime: row.end_time_utc || null,
    ply: row.ply,
    moveNumber: row.move_number,
    fenBefore: row.fen_before,
    playedUci: row.played_move_uci,
    bestUci: row.best_move_uci || null,
    label: row.label,
    cpLoss: row.cp_loss,
    wpSwing: row.wp_swing,
    rankingMetric: metric,
    rankingValue: metric === 'cp_loss' ? row.cp_loss : Math.abs(row.wp_swing),
  }));
}

export function parseMoveCsv(text: string): MoveCsvRow[] {
  return z.array(moveRowSchema).parse(parseCsv(text));
}

export interface WrittenFiles {
  summary: string;
  moves: string;
  blunders: string;
  pgn: string;
}

export class OutputWriter {
  readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  pathOf(file: keyof typeof OUTPUT_FILES): string {
    return path.join(this.dataDir, OUTPUT_FILES[file]);
  }

  async writeRun(result: RunResult): Promise<WrittenFiles> {
    await mkdir(this.dataDir, { recursive: true });

    const contexts = new Map<string, GameContext>(
      result.summaries.map((summary) => [
        summary.gameId,
        { playerName: summary.playerName, opponentName: summary.opponentName, endTime: summary.endTime },
      ])
    );

    const contextOf = (gameId: string): GameContext =>
      contexts.get(gameId) ?? { playerName: '', opponentName: '', endTime: null };

    const files: WrittenFiles = {
      summary: this.pathOf('SUMMARY'),
      moves: this.pathOf('MOVES'),
      blunders: this.pathOf('BLUNDERS_CSV'),
      pgn: this.pathOf('BLUNDERS_PGN'),
    };

    await writeFile(files.summary, toCsv(result.summaries.map(summaryRow), SUMMARY_COLUMNS), 'utf-8');
    await writeFile(
      files.moves,
      toCsv(
        result.moves.map((move) => moveRow(move, contextOf(move.gameId))),
        MOVE_COLUMNS
      ),
      'utf-8'
    );
    await writeFile(
      files.blunders,
      toCsv(
        result.blunders.map((blunder) => blunderRow(blunder, contextOf(blunder.gameId))),
        BLUNDER_COLUMNS
      ),
      'utf-8'
    );
    await writeFile(files.pgn, chaptersToPgn(result.chapters), 'utf-8');

    writerLogger.info(
      {
        summaries: result.summaries.length,
        moves: result.moves.length,
        blunders: result.blunders.length,
        chapters: result.chapters.length,
        dataDir: this.dataDir,
      },
      'Run output written'
    );

    return files;
  }

  async readBlunders(metric: RankingMetric, file: string = this.pathOf('BLUNDERS_CSV')): Promise<ChapterSource[]> {
    return parseBlunderCsv(await readFile(file, 'utf-8'), metric);
  }

  async readMoves(file: string = this.pathOf('MOVES')): Promise<MoveCsvRow[]> {
    return parseMoveCsv(await readFile(file, 'utf-8'));
  }
}
