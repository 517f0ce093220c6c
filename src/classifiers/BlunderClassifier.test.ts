import { describe, expect, it } from 'vitest';
import { BlunderClassifier, validateThresholds, worstLabel } from './BlunderClassifier.js';
import { EvaluatedMove, MoveLabel, MoveRecord } from '../types/index.js';
import { InvalidThresholdsError } from '../utils/errors.js';
import { cp } from '../testing/fakes.js';

const thresholds = { inaccuracy: 50, mistake: 100, blunder: 200 };

function evaluated(ply: number, cpLoss: number, wpSwing: number, isPlayerMove = ply % 2 === 1): EvaluatedMove {
  const mover = ply % 2 === 1 ? 'white' : 'black';
  return {
    gameId: 'g1',
    ply,
    moveNumber: Math.ceil(ply / 2),
    mover,
    isPlayerMove,
    san: 'e4',
    uci: 'e2e4',
    positionBefore: { fen: 'before', sideToMove: mover, ply: ply - 1 },
    positionAfter: { fen: 'after', sideToMove: mover === 'white' ? 'black' : 'white', ply },
    evaluationBefore: cp(0),
    evaluationAfter: cp(0),
    moverCpBefore: 0,
    moverCpAfter: -cpLoss,
    wpBefore: 0.5,
    wpAfter: 0.5 + wpSwing,
    cpLoss,
    wpSwing,
  };
}

describe('validateThresholds', () => {
  it('accepts ascending positive thresholds', () => {
    expect(validateThresholds(thresholds)).toEqual(thresholds);
  });

  it('rejects thresholds that are not strictly ascending', () => {
    expect(() => validateThresholds({ inaccuracy: 100, mistake: 100, blunder: 200 })).toThrow(InvalidThresholdsError);
    expect(() => validateThresholds({ inaccuracy: 50, mistake: 300, blunder: 200 })).toThrow(InvalidThresholdsError);
  });

  it('rejects non-positive or fractional thresholds', () => {
    expect(() => validateThresholds({ inaccuracy: 0, mistake: 100, blunder: 200 })).toThrow(
      'Threshold inaccuracy must be a positive whole number of centipawns, got 0'
    );
    expect(() => validateThresholds({ inaccuracy: 50, mistake: 100.5, blunder: 200 })).toThrow(InvalidThresholdsError);
  });
});

describe('BlunderClassifier', () => {
  const byCpLoss = new BlunderClassifier({ thresholds, metric: 'cp_loss' });
  const bySwing = new BlunderClassifier({ thresholds, metric: 'wp_swing' });

  it('labels with inclusive thresholds', () => {
    expect(byCpLoss.classify(0)).toBe(MoveLabel.NORMAL);
    expect(byCpLoss.classify(49)).toBe(MoveLabel.NORMAL);
    expect(byCpLoss.classify(50)).toBe(MoveLabel.INACCURACY);
    expect(byCpLoss.classify(99)).toBe(MoveLabel.INACCURACY);
    expect(byCpLoss.classify(100)).toBe(MoveLabel.MISTAKE);
    expect(byCpLoss.classify(199)).toBe(MoveLabel.MISTAKE);
    expect(byCpLoss.classify(200)).toBe(MoveLabel.BLUNDER);
    expect(byCpLoss.classify(9990)).toBe(MoveLabel.BLUNDER);
  });

  it('labels every move, the opponent\'s included', () => {
    const records = byCpLoss.classifyMoves([evaluated(1, 10, 0), evaluated(2, 250, -0.3)]);
    expect(records.map((record) => record.label)).toEqual([MoveLabel.NORMAL, MoveLabel.BLUNDER]);
  });

  it('picks a different move depending on the ranking metric', () => {
    const records = byCpLoss.classifyMoves([
      evaluated(1, 120, -0.05),
      evaluated(2, 0, 0.01),
      evaluated(3, 80, -0.2),
    ]);

    const worstByLoss = byCpLoss.selectBlunder(records);
    const worstBySwing = bySwing.selectBlunder(records);

    expect(worstByLoss?.ply).toBe(1);
    expect(worstByLoss?.rankingMetric).toBe('cp_loss');
    expect(worstByLoss?.rankingValue).toBe(120);
    expect(worstBySwing?.ply).toBe(3);
    expect(worstBySwing?.rankingMetric).toBe('wp_swing');
    expect(worstBySwing?.rankingValue).toBe(0.2);
  });

  it('breaks ties by the earliest ply', () => {
    const records = byCpLoss.classifyMoves([evaluated(1, 150, -0.1), evaluated(3, 60, -0.04), evaluated(5, 150, -0.1)]);
    expect(byCpLoss.selectBlunder(records)?.ply).toBe(1);
  });

  it('never selects an opponent move', () => {
    const records = byCpLoss.classifyMoves([evaluated(1, 60, -0.05), evaluated(2, 900, -0.45)]);
    expect(byCpLoss.selectBlunder(records)?.ply).toBe(1);
  });

  it('selects nothing when the player made no notable move', () => {
    const records = byCpLoss.classifyMoves([evaluated(1, 49, -0.05), evaluated(2, 900, -0.45), evaluated(3, 10, 0)]);
    expect(byCpLoss.selectBlunder(records)).toBeNull();
  });

  it('selects nothing for an empty game', () => {
    expect(byCpLoss.selectBlunder([])).toBeNull();
  });

  it('limits candidates to notable moves in the notable pool', () => {
    // A normal-label move with a large swing, then an inaccuracy with a smaller one
    const moves = [evaluated(1, 30, -0.3), evaluated(3, 60, -0.1)];
    const anyMove = new BlunderClassifier({ thresholds, metric: 'wp_swing', candidatePool: 'player' });
    const notableOnly = new BlunderClassifier({ thresholds, metric: 'wp_swing', candidatePool: 'notable' });

    expect(anyMove.selectBlunder(anyMove.classifyMoves(moves))?.ply).toBe(1);
    expect(notableOnly.selectBlunder(notableOnly.classifyMoves(moves))?.ply).toBe(3);
  });

  it('refuses invalid thresholds at construction', () => {
    expect(
      () => new BlunderClassifier({ thresholds: { inaccuracy: 300, mistake: 200, blunder: 100 }, metric: 'cp_loss' })
    ).toThrow(InvalidThresholdsError);
  });
});

describe('worstLabel', () => {
  it('returns the most severe label', () => {
    const records: MoveRecord[] = [
      { ...evaluated(1, 0, 0), label: MoveLabel.INACCURACY },
      { ...evaluated(2, 0, 0), label: MoveLabel.BLUNDER },
      { ...evaluated(3, 0, 0), label: MoveLabel.MISTAKE },
    ];
    expect(worstLabel(records)).toBe(MoveLabel.BLUNDER);
  });

  it('returns null for no moves', () => {
    expect(worstLabel([])).toBeNull();
  });
});
