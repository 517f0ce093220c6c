/**
 * In-process stand-ins for the engine and game data, shared by the tests
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import axios, { AxiosInstance } from 'axios';
import { Chess } from 'chess.js';
import type { EngineProcess } from '../engine/EngineSession.js';
import type { PositionEvaluator } from '../services/MoveEvaluator.js';
import { Evaluation, Game, Score } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════
// Fake UCI process
// ═══════════════════════════════════════════════════════════════════════

/** Lines the engine prints for `go depth N` in a position; null never answers */
export type SearchScript = (fen: string, depth: number) => string[] | null;

export interface FakeUciOptions {
  search?: SearchScript;
  /** Answer `uci` with `uciok` */
  answerHandshake?: boolean;
  /** Exit when told to quit */
  exitOnQuit?: boolean;
}

export const defaultSearch: SearchScript = (_fen, depth) => [
  `info depth ${depth} seldepth ${depth + 2} multipv 1 score cp 20 nodes 1000 pv e2e4 e7e5`,
  'bestmove e2e4 ponder e7e5',
];

export class FakeUciProcess extends EventEmitter implements EngineProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly received: string[] = [];
  readonly killSignals: Array<NodeJS.Signals | number | undefined> = [];
  exited = false;

  private readonly search: SearchScript;
  private readonly answerHandshake: boolean;
  private readonly exitOnQuit: boolean;
  private fen = '';
  private buffer = '';

  constructor(options: FakeUciOptions = {}) {
    super();
    this.search = options.search ?? defaultSearch;
    this.answerHandshake = options.answerHandshake ?? true;
    this.exitOnQuit = options.exitOnQuit ?? true;

    this.stdin.setEncoding('utf8');
    this.stdin.on('data', (chunk: string) => this.onInput(chunk));
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal);
    this.exit(null, typeof signal === 'string' ? signal : 'SIGTERM');
    return true;
  }

  /** Simulate the engine dying on its own */
  crash(code: number = 1): void {
    this.exit(code, null);
  }

  commands(prefix: string): string[] {
    return this.received.filter((line) => line.startsWith(prefix));
  }

  private exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    setImmediate(() => this.emit('exit', code, signal));
  }

  private reply(lines: readonly string[]): void {
    if (this.exited) {
      return;
    }
    this.stdout.write(lines.map((line) => `${line}\n`).join(''));
  }

  private onInput(chunk: string): void {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    for (const line of lines) {
      this.handle(line.trim());
    }
  }

  private handle(command: string): void {
    this.received.push(command);

    if (command === 'uci') {
      if (this.answerHandshake) {
        this.reply(['id name FakeFish', 'id author nobody', 'option name Hash type spin default 16 min 1 max 1024', 'uciok']);
      }
    } else if (command === 'isready') {
      this.reply(['readyok']);
    } else if (command.startsWith('position fen ')) {
      this.fen = command.slice('position fen '.length);
    } else if (command.startsWith('go depth ')) {
      const lines = this.search(this.fen, parseInt(command.slice('go depth '.length), 10));
      if (lines) {
        this.reply(lines);
      }
    } else if (command === 'quit' && this.exitOnQuit) {
      this.exit(0, null);
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════
// Scripted evaluator
// ═══════════════════════════════════════════════════════════════════════

export function cp(value: number, bestMove: string | null = null): Evaluation {
  return { score: { type: 'cp', value }, bestMove, pv: bestMove ? [bestMove] : [], depth: 12 };
}

export function mate(value: number, bestMove: string | null = null): Evaluation {
  const score: Score = { type: 'mate', value };
  return { score, bestMove, pv: bestMove ? [bestMove] : [], depth: 12 };
}

type ScriptedAnswer = Evaluation | Error;

/**
 * Answers by FEN; FENs without an entry fall back to `fallback`
 */
export class ScriptedEvaluator implements PositionEvaluator {
  readonly requests: string[] = [];
  newGames = 0;

  private readonly answers: Map<string, ScriptedAnswer[]>;
  private readonly fallback: (fen: string) => ScriptedAnswer;

  constructor(
    answers: Record<string, ScriptedAnswer | ScriptedAnswer[]> = {},
    fallback: (fen: string) => ScriptedAnswer = () => cp(0)
  ) {
    this.answers = new Map(
      Object.entries(answers).map(([fen, answer]) => [fen, Array.isArray(answer) ? [...answer] : [answer]])
    );
    this.fallback = fallback;
  }

  async evaluate(fen: string, _depth: number): Promise<Evaluation> {
    this.requests.push(fen);
    const queue = this.answers.get(fen);
    // The last scripted answer repeats
    const answer = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    const result = answer ?? this.fallback(fen);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }

  async newGame(): Promise<void> {
    this.newGames++;
  }
}

// ═══════════════════════════════════════════════════════════════════════
// Games
// ═══════════════════════════════════════════════════════════════════════

export function makeGame(overrides: Partial<Game> & Pick<Game, 'moves'>): Game {
  return {
    id: 'https://www.chess.com/game/live/1',
    playerName: 'alice',
    playerColor: 'white',
    opponentName: 'bob',
    playerRating: 1500,
    opponentRating: 1480,
    result: 'win',
    timeControl: '600',
    timeClass: 'rapid',
    rules: 'chess',
    endTime: '2024-03-05T18:30:00.000Z',
    accuracy: null,
    initialFen: null,
    ...overrides,
  };
}

/**
 * FEN of every position of a SAN line, starting position first
 */
export function fensOf(moves: readonly string[], initialFen?: string): string[] {
  const chess = initialFen ? new Chess(initialFen) : new Chess();
  const fens = [chess.fen()];
  for (const san of moves) {
    chess.move(san);
    fens.push(chess.fen());
  }
  return fens;
}

// ═══════════════════════════════════════════════════════════════════════
// HTTP
// ═══════════════════════════════════════════════════════════════════════

export interface StubRequest {
  method: string;
  url: string;
  data: unknown;
}

export type StubReply = { status?: number; statusText?: string; data: unknown } | Error;

/**
 * An axios instance answered in process; errors are thrown as network failures
 */
export function stubHttp(route: (request: StubRequest) => StubReply): { http: AxiosInstance; requests: StubRequest[] } {
  const requests: StubRequest[] = [];
  const http = axios.create({
    adapter: async (config) => {
      const request: StubRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        data: config.data,
      };
      requests.push(request);

      const reply = route(request);
      if (reply instanceof Error) {
        throw reply;
      }
      return {
        data: reply.data,
        status: reply.status ?? 200,
        statusText: reply.statusText ?? 'OK',
        headers: {},
        config,
      };
    },
  });
  return { http, requests };
}
