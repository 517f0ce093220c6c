/**
 * Derives per-move quality metrics from the evaluations around a move
 */

import { Evaluation, PlayerColor } from '../types/index.js';
import { EvaluationUtils } from './EvaluationUtils.js';

export interface MoveMetricsInput {
  mover: PlayerColor;
  /** Evaluation of the position before the move (mover to play) */
  before: Evaluation;
  /** Evaluation of the position after the move (opponent to play) */
  after: Evaluation;
}

export interface MoveMetrics {
  moverCpBefore: number;
  moverCpAfter: number;
  wpBefore: number;
  wpAfter: number;
  cpLoss: number;
  wpSwing: number;
}

const opposite = (color: PlayerColor): PlayerColor => (color === 'white' ? 'black' : 'white');

export class CentipawnLossCalculator {
  calculate(input: MoveMetricsInput): MoveMetrics {
    const { mover, before, after } = input;

    // Before the move the mover is to play; after it, the opponent is
    const moverCpBefore = EvaluationUtils.toPlayerPerspective(before.score, mover, mover);
    const moverCpAfter = EvaluationUtils.toPlayerPerspective(after.score, opposite(mover), mover);

    const wpBefore = EvaluationUtils.winProbability(moverCpBefore);
    const wpAfter = EvaluationUtils.winProbability(moverCpAfter);

    return {
      moverCpBefore,
      moverCpAfter,
      wpBefore,
      wpAfter,
      cpLoss: Math.max(0, moverCpBefore - moverCpAfter),
      wpSwing: wpAfter - wpBefore,
    };
  }
}

export const centipawnLossCalculator = new CentipawnLossCalculator();
