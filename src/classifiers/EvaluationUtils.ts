/**
 * Utility functions for evaluation handling
 */

import { PlayerColor, Score } from '../types/index.js';
import { MATE_NORMALIZATION, WIN_PROBABILITY_SCALE } from '../config/constants.js';

const { MATE_SCORE, MATE_DISTANCE_STEP, MAX_MATE_DISTANCE, CP_CEILING } = MATE_NORMALIZATION;

export class EvaluationUtils {
  /**
   * Map a mate-in-N onto the centipawn scale.
   * Positive N: side to move mates. Zero or negative N: side to move is mated.
   */
  static mateToCentipawns(mateIn: number): number {
    const distance = Math.min(Math.abs(mateIn), MAX_MATE_DISTANCE);
    const magnitude = MATE_SCORE - MATE_DISTANCE_STEP * distance;
    return mateIn > 0 ? magnitude : -magnitude;
  }

  /**
   * Score as a bounded number of centipawns, same perspective as the score
   */
  static toCentipawns(score: Score): number {
    if (score.type === 'mate') {
      return this.mateToCentipawns(score.value);
    }
    return Math.max(-CP_CEILING, Math.min(CP_CEILING, score.value));
  }

  /**
   * Convert a side-to-move score to the given player's perspective
   */
  static toPlayerPerspective(score: Score, sideToMove: PlayerColor, player: PlayerColor): number {
    const cp = this.toCentipawns(score);
    return sideToMove === player ? cp : -cp;
  }

  /**
   * Logistic win probability for the side the score belongs to
   */
  static winProbability(cp: number): number {
    return 1 / (1 + Math.pow(10, -cp / WIN_PROBABILITY_SCALE));
  }
}
