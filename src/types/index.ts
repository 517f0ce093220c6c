/**
 * Type definitions for the analysis pipeline
 */

export type PlayerColor = 'white' | 'black';

/**
 * Move quality labels, ordered from best to worst
 */
export enum MoveLabel {
  NORMAL = 'normal',
  INACCURACY = 'inaccuracy',
  MISTAKE = 'mistake',
  BLUNDER = 'blunder',
}

export const LABEL_SEVERITY: Record<MoveLabel, number> = {
  [MoveLabel.NORMAL]: 0,
  [MoveLabel.INACCURACY]: 1,
  [MoveLabel.MISTAKE]: 2,
  [MoveLabel.BLUNDER]: 3,
};

export type RankingMetric = 'cp_loss' | 'wp_swing';

/**
 * Which player moves may be picked as the game's blunder.
 * - player: any move of the tracked player, once the game has a notable move
 * - notable: only moves labelled inaccuracy or worse
 */
export type CandidatePool = 'player' | 'notable';

/**
 * Evaluation score - either centipawns or mate in N,
 * from the point of view of the side to move
 */
export type Score =
  | { type: 'cp'; value: number }
  | { type: 'mate'; value: number };

/**
 * One engine answer for one position
 */
export interface Evaluation {
  readonly score: Score;
  /** Best move in UCI notation, null when the position has no legal move */
  readonly bestMove: string | null;
  readonly pv: readonly string[];
  readonly depth: number;
}

/**
 * A game as produced by the game source
 */
export interface Game {
  /** Source URL or ID */
  readonly id: string;
  readonly playerName: string;
  readonly playerColor: PlayerColor;
  readonly opponentName: string;
  readonly playerRating: number | null;
  readonly opponentRating: number | null;
  /** Player's result code as reported by the source (win, checkmated, ...) */
  readonly result: string;
  readonly timeControl: string;
  readonly timeClass: string;
  readonly rules: string;
  /** ISO timestamp of the end of the game */
  readonly endTime: string | null;
  /** Externally supplied accuracy for the player */
  readonly accuracy: number | null;
  /** Starting FEN when the game did not start from the standard position */
  readonly initialFen: string | null;
  /** Moves in SAN */
  readonly moves: readonly string[];
}

export interface Position {
  readonly fen: string;
  readonly sideToMove: PlayerColor;
  /** Number of plies played to reach this position */
  readonly ply: number;
}

/**
 * A ply with both evaluations and the derived metrics, before labelling
 */
export interface EvaluatedMove {
  readonly gameId: string;
  /** 1-based */
  readonly ply: number;
  /** Conventional (full move) numbering */
  readonly moveNumber: number;
  readonly mover: PlayerColor;
  readonly isPlayerMove: boolean;
  readonly san: string;
  readonly uci: string;
  readonly positionBefore: Position;
  readonly positionAfter: Position;
  readonly evaluationBefore: Evaluation;
  readonly evaluationAfter: Evaluation;
  /** Evaluation before the move, mover's perspective, mate scores saturated */
  readonly moverCpBefore: number;
  readonly moverCpAfter: number;
  readonly wpBefore: number;
  readonly wpAfter: number;
  readonly cpLoss: number;
  readonly wpSwing: number;
}

export interface MoveRecord extends EvaluatedMove {
  readonly label: MoveLabel;
}

/**
 * The move selected as the worst of its game
 */
export interface BlunderRecord extends MoveRecord {
  readonly rankingMetric: RankingMetric;
  readonly rankingValue: number;
}

export interface ChapterMove {
  readonly san: string;
  readonly uci: string;
}

export interface ChapterMetadata {
  readonly gameId: string;
  readonly playerName: string;
  readonly playerColor: PlayerColor;
  readonly opponentName: string;
  readonly moveNumber: number;
  readonly ply: number;
  readonly label: MoveLabel;
  readonly cpLoss: number;
  readonly wpSwing: number;
  readonly endTime: string | null;
  readonly rankingMetric: RankingMetric;
  readonly rankingValue: number;
}

/**
 * A replayable study chapter built around one blunder
 */
export interface Chapter {
  readonly startFen: string;
  readonly mainLine: ChapterMove;
  /** Engine's best move, absent when it equals the played move */
  readonly variation: ChapterMove | null;
  readonly metadata: ChapterMetadata;
  readonly pgn: string;
}

export type GameStage =
  | 'fetched'
  | 'evaluated'
  | 'classified'
  | 'selected'
  | 'skipped'
  | 'emitted'
  | 'failed';

export type GameStatus = 'emitted' | 'skipped' | 'failed';

export interface GameSummary {
  readonly gameId: string;
  readonly status: GameStatus;
  readonly errorTag: string | null;
  readonly endTime: string | null;
  readonly timeClass: string;
  readonly timeControl: string;
  readonly rules: string;
  readonly playerName: string;
  readonly playerColor: PlayerColor;
  readonly opponentName: string;
  readonly playerRating: number | null;
  readonly opponentRating: number | null;
  readonly result: string;
  readonly accuracy: number | null;
  readonly moveCount: number;
  readonly pliesAnalyzed: number;
  readonly inaccuracies: number;
  readonly mistakes: number;
  readonly blunders: number;
  readonly maxCpLoss: number;
  readonly maxWpSwing: number;
  readonly worstLabel: MoveLabel | null;
  readonly rankingValue: number | null;
}

export interface GameOutcome {
  readonly gameId: string;
  readonly stage: GameStage;
  readonly status: GameStatus;
  readonly errorTag?: string;
  readonly reason?: string;
}

export interface RunReport {
  readonly gamesProcessed: number;
  readonly skipped: ReadonlyArray<{ gameId: string; reason: string }>;
  readonly failed: ReadonlyArray<{ gameId: string; errorTag: string; reason: string }>;
  readonly chaptersProduced: number;
  readonly cancelled: boolean;
}

export interface RunResult {
  readonly summaries: GameSummary[];
  readonly moves: MoveRecord[];
  readonly blunders: BlunderRecord[];
  readonly chapters: Chapter[];
  readonly outcomes: GameOutcome[];
  readonly report: RunReport;
}

// ═══════════════════════════════════════════════════════════════════════
// API Types
// ═══════════════════════════════════════════════════════════════════════

export interface GameEvent {
  type: 'game';
  gameId: string;
  status: GameStatus;
  stage: GameStage;
  errorTag?: string;
  reason?: string;
}

export interface RunProgressEvent {
  type: 'progress';
  gameId: string;
  ply: number;
  totalPlies: number;
  percentage: number;
}

export interface RunCompleteEvent {
  type: 'complete';
  report: RunReport;
  chapters: Array<{ name: string; gameId: string; pgn: string }>;
  published: number;
}

export interface RunErrorEvent {
  type: 'error';
  message: string;
  code?: string;
}

export type RunEvent = GameEvent | RunProgressEvent | RunCompleteEvent | RunErrorEvent;

export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  engine: 'starting' | 'ready' | 'busy' | 'faulted' | 'closed';
  queueLength: number;
  uptime: number;
  version: string;
}
