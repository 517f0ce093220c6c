/**
 * Blunder Classifier - Labels evaluated moves and picks the worst one of a game
 */

import {
  BlunderRecord,
  CandidatePool,
  EvaluatedMove,
  LABEL_SEVERITY,
  MoveLabel,
  MoveRecord,
  RankingMetric,
} from '../types/index.js';
import { InvalidThresholdsError } from '../utils/errors.js';

/**
 * Minimum cp_loss for each label, inclusive
 */
export interface ClassificationThresholds {
  inaccuracy: number;
  mistake: number;
  blunder: number;
}

export interface BlunderClassifierOptions {
  thresholds: ClassificationThresholds;
  metric: RankingMetric;
  candidatePool?: CandidatePool;
}

export function validateThresholds(thresholds: ClassificationThresholds): ClassificationThresholds {
  const { inaccuracy, mistake, blunder } = thresholds;

  for (const [name, value] of Object.entries(thresholds)) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new InvalidThresholdsError(
        `Threshold ${name} must be a positive whole number of centipawns, got ${value}`
      );
    }
  }

  if (!(inaccuracy < mistake && mistake < blunder)) {
    throw new InvalidThresholdsError(
      `Thresholds must be ascending (inaccuracy < mistake < blunder), got ${inaccuracy}/${mistake}/${blunder}`
    );
  }

  return { inaccuracy, mistake, blunder };
}

export class BlunderClassifier {
  readonly thresholds: ClassificationThresholds;
  readonly metric: RankingMetric;
  readonly candidatePool: CandidatePool;

  constructor(options: BlunderClassifierOptions) {
    this.thresholds = validateThresholds(options.thresholds);
    this.metric = options.metric;
    this.candidatePool = options.candidatePool ?? 'player';
  }

  /**
   * Highest label whose threshold does not exceed cp_loss
   */
  classify(cpLoss: number): MoveLabel {
    if (cpLoss >= this.thresholds.blunder) return MoveLabel.BLUNDER;
    if (cpLoss >= this.thresholds.mistake) return MoveLabel.MISTAKE;
    if (cpLoss >= this.thresholds.inaccuracy) return MoveLabel.INACCURACY;
    return MoveLabel.NORMAL;
  }

  classifyMoves(moves: readonly EvaluatedMove[]): MoveRecord[] {
    return moves.map((move) => ({ ...move, label: this.classify(move.cpLoss) }));
  }

  rankingValue(record: EvaluatedMove): number {
    return this.metric === 'cp_loss' ? record.cpLoss : Math.abs(record.wpSwing);
  }

  /**
   * The tracked player's worst move, or null when none of their moves is notable.
   * Ties go to the earliest ply.
   */
  selectBlunder(records: readonly MoveRecord[]): BlunderRecord | null {
    const playerMoves = records.filter((record) => record.isPlayerMove);
    const hasNotable = playerMoves.some((record) => isNotable(record.label));
    if (!hasNotable) {
      return null;
    }

    const candidates =
      this.candidatePool === 'notable'
        ? playerMoves.filter((record) => isNotable(record.label))
        : playerMoves;

    let worst: MoveRecord | null = null;
    let worstValue = -Infinity;
    for (const record of candidates) {
      const value = this.rankingValue(record);
      if (value > worstValue || (value === worstValue && worst !== null && record.ply < worst.ply)) {
        worst = record;
        worstValue = value;
      }
    }

    if (!worst) {
      return null;
    }

    return { ...worst, rankingMetric: this.metric, rankingValue: worstValue };
  }
}

export function isNotable(label: MoveLabel): boolean {
  return LABEL_SEVERITY[label] >= LABEL_SEVERITY[MoveLabel.INACCURACY];
}

export function worstLabel(records: readonly MoveRecord[]): MoveLabel | null {
  let worst: MoveLabel | null = null;
  for (const record of records) {
    if (worst === null || LABEL_SEVERITY[record.label] > LABEL_SEVERITY[worst]) {
      worst = record.label;
    }
  }
  return worst;
}
