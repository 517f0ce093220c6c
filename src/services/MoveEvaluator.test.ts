import { describe, expect, it } from 'vitest';
import { MoveEvaluator, terminalEvaluation } from './MoveEvaluator.js';
import { EngineProtocolError, EngineTimeoutError, EngineUnavailableError, isAbortError } from '../utils/errors.js';
import { ScriptedEvaluator, cp, fensOf, makeGame, mate } from '../testing/fakes.js';

const FOOLS_MATE = ['f3', 'e5', 'g4', 'Qh4#'];

describe('terminalEvaluation', () => {
  it('scores checkmate as mate 0 and other endings as a draw', () => {
    expect(terminalEvaluation(true).score).toEqual({ type: 'mate', value: 0 });
    expect(terminalEvaluation(false).score).toEqual({ type: 'cp', value: 0 });
    expect(terminalEvaluation(true).bestMove).toBeNull();
  });
});

describe('MoveEvaluator', () => {
  it('evaluates each position exactly once and chains the evaluations', async () => {
    const moves = ['e4', 'e5', 'Qh5'];
    const fens = fensOf(moves);
    const engine = new ScriptedEvaluator({
      [fens[0]]: cp(30, 'e2e4'),
      [fens[1]]: cp(-25, 'e7e5'),
      [fens[2]]: cp(40, 'g1f3'),
      [fens[3]]: cp(10, 'b8c6'),
    });

    const evaluated = await new MoveEvaluator(engine).evaluateGame(makeGame({ moves }), { depth: 12 });

    expect(engine.requests).toEqual(fens);
    expect(engine.newGames).toBe(1);
    expect(evaluated).toHaveLength(3);
    expect(evaluated[1].evaluationBefore).toBe(evaluated[0].evaluationAfter);
    expect(evaluated[2].evaluationBefore).toBe(evaluated[1].evaluationAfter);
  });

  it('derives move metrics and player ownership', async () => {
    const moves = ['e4', 'e5', 'Qh5'];
    const fens = fensOf(moves);
    const engine = new ScriptedEvaluator({
      [fens[0]]: cp(30),
      [fens[1]]: cp(-25),
      [fens[2]]: cp(40),
      [fens[3]]: cp(10),
    });

    const [first, second, third] = await new MoveEvaluator(engine).evaluateGame(
      makeGame({ moves, playerColor: 'black' }),
      { depth: 12 }
    );

    expect(first).toMatchObject({ ply: 1, moveNumber: 1, mover: 'white', isPlayerMove: false, san: 'e4', uci: 'e2e4' });
    expect(first).toMatchObject({ moverCpBefore: 30, moverCpAfter: 25, cpLoss: 5 });
    expect(second).toMatchObject({ ply: 2, moveNumber: 1, mover: 'black', isPlayerMove: true });
    expect(second).toMatchObject({ moverCpBefore: -25, moverCpAfter: -40, cpLoss: 15 });
    expect(third).toMatchObject({ moverCpBefore: 40, moverCpAfter: -10, cpLoss: 50, gameId: 'https://www.chess.com/game/live/1' });
  });

  it('does not ask the engine about a checkmated position', async () => {
    const fens = fensOf(FOOLS_MATE);
    const engine = new ScriptedEvaluator({ [fens[3]]: mate(1, 'd8h4') });

    const evaluated = await new MoveEvaluator(engine).evaluateGame(makeGame({ moves: FOOLS_MATE }), { depth: 12 });
    const mating = evaluated[3];

    expect(engine.requests).toEqual(fens.slice(0, 4));
    expect(mating.evaluationAfter).toEqual(terminalEvaluation(true));
    expect(mating.moverCpBefore).toBe(9990);
    expect(mating.moverCpAfter).toBe(10000);
    expect(mating.cpLoss).toBe(0);
  });

  it('asks the engine about a repeated position when the game goes on', async () => {
    const shuffle = ['Nf3', 'Nf6', 'Ng1', 'Ng8'];
    const moves = [...shuffle, ...shuffle, 'f3', 'e5'];
    const fens = fensOf(moves);
    const engine = new ScriptedEvaluator({ [fens[8]]: cp(30, 'e2e4'), [fens[9]]: cp(200, 'e7e5') });

    const evaluated = await new MoveEvaluator(engine).evaluateGame(makeGame({ moves }), { depth: 12 });
    const weakening = evaluated[8];

    expect(engine.requests).toEqual(fens);
    expect(weakening.evaluationBefore).toEqual(cp(30, 'e2e4'));
    expect(weakening).toMatchObject({ san: 'f3', moverCpBefore: 30, moverCpAfter: -200, cpLoss: 230 });
  });

  it('retries a timed-out evaluation once', async () => {
    const moves = ['d4'];
    const fens = fensOf(moves);
    const engine = new ScriptedEvaluator({ [fens[1]]: [new EngineTimeoutError(50), cp(-15)] });

    const [move] = await new MoveEvaluator(engine).evaluateGame(makeGame({ moves }), { depth: 8 });

    expect(engine.requests).toEqual([fens[0], fens[1], fens[1]]);
    expect(move.evaluationAfter.score).toEqual({ type: 'cp', value: -15 });
  });

  it('fails the game after the retry also fails', async () => {
    const moves = ['d4', 'd5'];
    const fens = fensOf(moves);
    const engine = new ScriptedEvaluator({ [fens[2]]: new EngineProtocolError('garbled') });

    await expect(new MoveEvaluator(engine).evaluateGame(makeGame({ moves }), { depth: 8 })).rejects.toThrow('garbled');
    expect(engine.requests.filter((fen) => fen === fens[2])).toHaveLength(2);
  });

  it('does not retry an unavailable engine', async () => {
    const engine = new ScriptedEvaluator({}, () => new EngineUnavailableError('gone'));

    await expect(
      new MoveEvaluator(engine).evaluateGame(makeGame({ moves: ['e4'] }), { depth: 8 })
    ).rejects.toBeInstanceOf(EngineUnavailableError);
    expect(engine.requests).toHaveLength(1);
  });

  it('stops between evaluations once cancelled', async () => {
    const moves = ['e4', 'e5', 'Nf3', 'Nc6'];
    const engine = new ScriptedEvaluator();
    const controller = new AbortController();
    const seen: number[] = [];

    const run = new MoveEvaluator(engine).evaluateGame(makeGame({ moves }), {
      depth: 8,
      signal: controller.signal,
      onMoveEvaluated: (move, totalPlies) => {
        seen.push(move.ply, totalPlies);
        controller.abort();
      },
    });

    expect(isAbortError(await run.catch((error: unknown) => error))).toBe(true);
    expect(seen).toEqual([1, 4]);
    expect(engine.requests).toHaveLength(2);
  });

  it('returns nothing for a game without moves', async () => {
    const engine = new ScriptedEvaluator();

    expect(await new MoveEvaluator(engine).evaluateGame(makeGame({ moves: [] }), { depth: 8 })).toEqual([]);
    expect(engine.requests).toEqual([]);
    expect(engine.newGames).toBe(0);
  });
});
