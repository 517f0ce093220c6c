/**
 * PGN Parser Service - Turns movetext into move lists and replays them into positions
 */

import { Chess, DEFAULT_POSITION, type Move } from 'chess.js';
import { parsePgn } from 'chessops/pgn';
import { PlayerColor, Position } from '../types/index.js';
import { IllegalMoveError } from '../utils/errors.js';

export interface ParsedMovetext {
  headers: Record<string, string>;
  /** FEN tag when the game does not start from the standard position */
  initialFen: string | null;
  /** Main line in SAN, unvalidated */
  moves: string[];
}

export interface ReplayedMove {
  /** 1-based */
  ply: number;
  moveNumber: number;
  mover: PlayerColor;
  san: string;
  uci: string;
  before: Position;
  after: Position;
  /**
   * No engine search is needed after the move: no legal reply, or the last
   * move of a game the rules have already drawn. An unclaimed repetition or
   * fifty-move draw in mid-game is not terminal.
   */
  isTerminal: boolean;
  isCheckmate: boolean;
}

export function colorFromTurn(turn: 'w' | 'b'): PlayerColor {
  return turn === 'w' ? 'white' : 'black';
}

export class PgnParserService {
  /**
   * Extract headers and the main line without checking legality
   */
  parseMovetext(pgn: string): ParsedMovetext {
    const [game] = parsePgn(pgn);
    if (!game) {
      return { headers: {}, initialFen: null, moves: [] };
    }

    const headers: Record<string, string> = {};
    for (const [key, value] of game.headers) {
      headers[key] = value;
    }

    const moves: string[] = [];
    for (const node of game.moves.mainline()) {
      moves.push(node.san);
    }

    const fen = headers['FEN'];
    return {
      headers,
      initialFen: fen && fen !== DEFAULT_POSITION ? fen : null,
      moves,
    };
  }

  /**
   * Replay SAN moves from a starting position.
   * Position-before of each ply is Position-after of the previous one.
   */
  replay(moves: readonly string[], initialFen: string | null = null): ReplayedMove[] {
    let chess: Chess;
    try {
      chess = new Chess(initialFen ?? DEFAULT_POSITION);
    } catch (error) {
      throw new IllegalMoveError(moves[0] ?? '(none)', 1, initialFen ?? DEFAULT_POSITION, {
        cause: error,
      });
    }

    const replayed: ReplayedMove[] = [];
    let before: Position = { fen: chess.fen(), sideToMove: colorFromTurn(chess.turn()), ply: 0 };

    moves.forEach((san, index) => {
      const ply = index + 1;
      const moveNumber = chess.moveNumber();

      let move: Move;
      try {
        move = chess.move(san);
      } catch (error) {
        throw new IllegalMoveError(san, ply, before.fen, { cause: error });
      }

      const after: Position = {
        fen: chess.fen(),
        sideToMove: colorFromTurn(chess.turn()),
        ply,
      };

      replayed.push({
        ply,
        moveNumber,
        mover: colorFromTurn(move.color),
        san: move.san,
        uci: move.lan,
        before,
        after,
        isTerminal: chess.isCheckmate() || chess.isStalemate() || (ply === moves.length && chess.isGameOver()),
        isCheckmate: chess.isCheckmate(),
      });

      before = after;
    });

    return replayed;
  }
}

// Singleton instance
export const pgnParserService = new PgnParserService();
