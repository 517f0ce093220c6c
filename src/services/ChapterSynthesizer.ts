/**
 * Chapter Synthesizer - Builds a one-move study chapter around a blunder
 */

import { Chess, DEFAULT_POSITION } from 'chess.js';
import { ChildNode, Node, makePgn, type Game as PgnGame, type PgnNodeData } from 'chessops/pgn';
import {
  BlunderRecord,
  Chapter,
  ChapterMetadata,
  ChapterMove,
  Game,
  MoveLabel,
  PlayerColor,
  RankingMetric,
} from '../types/index.js';
import { ChapterBuildError, errorMessage } from '../utils/errors.js';

/**
 * Everything a chapter is built from. Filled from a BlunderRecord,
 * or from a row of blunders.csv.
 */
export interface ChapterSource {
  gameId: string;
  playerName: string;
  playerColor: PlayerColor;
  opponentName: string;
  endTime: string | null;
  ply: number;
  moveNumber: number;
  fenBefore: string;
  playedUci: string;
  bestUci: string | null;
  label: MoveLabel;
  cpLoss: number;
  wpSwing: number;
  rankingMetric: RankingMetric;
  rankingValue: number;
}

export const CHAPTER_EVENT = 'Biggest Blunder';

export function chapterSourceFromBlunder(blunder: BlunderRecord, game: Game): ChapterSource {
  return {
    gameId: game.id,
    playerName: game.playerName,
    playerColor: game.playerColor,
    opponentName: game.opponentName,
    endTime: game.endTime,
    ply: blunder.ply,
    moveNumber: blunder.moveNumber,
    fenBefore: blunder.positionBefore.fen,
    playedUci: blunder.uci,
    bestUci: blunder.evaluationBefore.bestMove,
    label: blunder.label,
    cpLoss: blunder.cpLoss,
    wpSwing: blunder.wpSwing,
    rankingMetric: blunder.rankingMetric,
    rankingValue: blunder.rankingValue,
  };
}

/**
 * PGN date (YYYY.MM.DD) from an ISO timestamp
 */
export function pgnDate(endTime: string | null): string {
  const match = endTime?.match(/^(\d{4})-(\d{2})-(\d{2})/);
  return match ? `${match[1]}.${match[2]}.${match[3]}` : '????.??.??';
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export class ChapterSynthesizer {
  synthesize(source: ChapterSource): Chapter {
    const mainLine = this.validateMove(source.fenBefore, source.playedUci, 'played move');
    const variation =
      source.bestUci && source.bestUci !== source.playedUci
        ? this.validateMove(source.fenBefore, source.bestUci, 'best move')
        : null;

    const metadata: ChapterMetadata = {
      gameId: source.gameId,
      playerName: source.playerName,
      playerColor: source.playerColor,
      opponentName: source.opponentName,
      moveNumber: source.moveNumber,
      ply: source.ply,
      label: source.label,
      cpLoss: source.cpLoss,
      wpSwing: source.wpSwing,
      endTime: source.endTime,
      rankingMetric: source.rankingMetric,
      rankingValue: source.rankingValue,
    };

    return {
      startFen: source.fenBefore,
      mainLine,
      variation,
      metadata,
      pgn: this.renderPgn(source.fenBefore, mainLine, variation, metadata),
    };
  }

  /**
   * Replay one UCI move from the FEN and return it in SAN
   */
  private validateMove(fen: string, uci: string, what: string): ChapterMove {
    let chess: Chess;
    try {
      chess = new Chess(fen);
    } catch (error) {
      throw new ChapterBuildError(`Invalid starting position ${fen}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!/^[a-h][1-8][a-h][1-8][qrbn]?$/.test(uci)) {
      throw new ChapterBuildError(`Malformed ${what} ${uci}`);
    }

    try {
      const move = chess.move({
        from: uci.slice(0, 2),
        to: uci.slice(2, 4),
        promotion: uci.length > 4 ? uci.slice(4) : undefined,
      });
      return { san: move.san, uci: move.lan };
    } catch (error) {
      throw new ChapterBuildError(`The ${what} ${uci} is illegal in ${fen}`, { cause: error });
    }
  }

  private renderPgn(
    fen: string,
    mainLine: ChapterMove,
    variation: ChapterMove | null,
    metadata: ChapterMetadata
  ): string {
    const { playerName, playerColor, opponentName } = metadata;

    const headers = new Map<string, string>([
      ['Event', CHAPTER_EVENT],
      // Left blank: the study fills in the chapter's own URL on import
      ['Site', ''],
      ['Date', pgnDate(metadata.endTime)],
      ['White', playerColor === 'white' ? playerName : opponentName],
      ['Black', playerColor === 'black' ? playerName : opponentName],
      ['Result', '*'],
      ['Annotator', metadata.gameId],
    ]);
    if (fen !== DEFAULT_POSITION) {
      headers.set('SetUp', '1');
      headers.set('FEN', fen);
    }

    const moveLabel = `${metadata.moveNumber}${playerColor === 'white' ? '.' : '...'}`;
    const mainComment =
      `${capitalize(metadata.label)} by ${playerName} (${playerColor}) at move ${moveLabel} ` +
      `cp_loss=${metadata.cpLoss} wp_swing=${metadata.wpSwing.toFixed(3)}`;

    const game: PgnGame<PgnNodeData> = { headers, moves: new Node<PgnNodeData>() };
    game.moves.children.push(new ChildNode<PgnNodeData>({ san: mainLine.san, comments: [mainComment] }));
    if (variation) {
      game.moves.children.push(new ChildNode<PgnNodeData>({ san: variation.san, comments: ['Best move'] }));
    }

    return makePgn(game).trim() + '\n';
  }
}

export const chapterSynthesizer = new ChapterSynthesizer();

/**
 * Order chapters by ranking value, highest first, and keep at most `limit`
 * (0 keeps all). Equal values keep their original order.
 */
export function rankChapters(chapters: readonly Chapter[], limit: number = 0): Chapter[] {
  const ranked = [...chapters].sort((a, b) => b.metadata.rankingValue - a.metadata.rankingValue);
  return limit > 0 ? ranked.slice(0, limit) : ranked;
}
