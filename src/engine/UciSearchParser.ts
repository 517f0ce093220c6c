/**
 * UciSearchParser - State machine over the engine's output for one search
 *
 * awaiting_ready -> searching -> result_seen
 *
 * Only `readyok` leaves awaiting_ready; only `bestmove` leaves searching.
 * Everything after the result is ignored.
 */

import { Evaluation, Score } from '../types/index.js';
import { EngineProtocolError } from '../utils/errors.js';

export type SearchState = 'awaiting_ready' | 'searching' | 'result_seen';

export interface InfoReport {
  depth: number;
  multipv: number;
  score: Score | null;
  bound: 'lowerbound' | 'upperbound' | null;
  pv: string[];
}

export type ParseEvent =
  | { kind: 'ready' }
  | { kind: 'report'; report: InfoReport }
  | { kind: 'result'; evaluation: Evaluation }
  | { kind: 'ignored' };

const IGNORED: ParseEvent = { kind: 'ignored' };

/** Keys followed by a single value token */
const SINGLE_VALUE_KEYS = new Set([
  'seldepth',
  'time',
  'nodes',
  'nps',
  'hashfull',
  'tbhits',
  'sbhits',
  'cpuload',
  'currmove',
  'currmovenumber',
]);

function parseInteger(token: string | undefined, line: string): number {
  if (token === undefined || !/^-?\d+$/.test(token)) {
    throw new EngineProtocolError(`Malformed engine output: ${line}`);
  }
  return parseInt(token, 10);
}

/**
 * Parse an `info` line. Returns null for purely informational lines
 * (`info string ...`, current move reports without a score).
 */
export function parseInfoLine(line: string): InfoReport | null {
  const tokens = line.trim().split(/\s+/);
  if (tokens[0] !== 'info') {
    return null;
  }

  const report: InfoReport = { depth: -1, multipv: 1, score: null, bound: null, pv: [] };

  let i = 1;
  while (i < tokens.length) {
    const key = tokens[i];

    if (key === 'string') {
      return null;
    }

    if (key === 'depth') {
      report.depth = parseInteger(tokens[i + 1], line);
      i += 2;
    } else if (key === 'multipv') {
      report.multipv = parseInteger(tokens[i + 1], line);
      i += 2;
    } else if (key === 'score') {
      const type = tokens[i + 1];
      if (type !== 'cp' && type !== 'mate') {
        throw new EngineProtocolError(`Malformed engine score: ${line}`);
      }
      report.score = { type, value: parseInteger(tokens[i + 2], line) };
      i += 3;
      const bound = tokens[i];
      if (bound === 'lowerbound' || bound === 'upperbound') {
        report.bound = bound;
        i += 1;
      }
    } else if (key === 'wdl') {
      i += 4;
    } else if (key === 'pv') {
      report.pv = tokens.slice(i + 1);
      break;
    } else if (key === 'refutation' || key === 'currline') {
      break;
    } else if (SINGLE_VALUE_KEYS.has(key)) {
      i += 2;
    } else {
      i += 1;
    }
  }

  return report;
}

/**
 * A report the evaluation may be taken from: principal line,
 * exact score, a move sequence, within the requested depth.
 */
export function isCompleteReport(report: InfoReport, maxDepth: number): boolean {
  return (
    report.depth >= 0 &&
    report.depth <= maxDepth &&
    report.multipv === 1 &&
    report.score !== null &&
    report.bound === null &&
    report.pv.length > 0
  );
}

export class UciSearchParser {
  private state: SearchState = 'awaiting_ready';
  private lastComplete: InfoReport | null = null;
  private lastScored: InfoReport | null = null;
  private readonly maxDepth: number;

  constructor(maxDepth: number) {
    this.maxDepth = maxDepth;
  }

  get current(): SearchState {
    return this.state;
  }

  push(rawLine: string): ParseEvent {
    const line = rawLine.trim();
    if (!line) {
      return IGNORED;
    }

    switch (this.state) {
      case 'awaiting_ready':
        if (line === 'readyok') {
          this.state = 'searching';
          return { kind: 'ready' };
        }
        return IGNORED;

      case 'searching':
        if (line.startsWith('info')) {
          return this.handleInfo(line);
        }
        if (line.startsWith('bestmove')) {
          this.state = 'result_seen';
          return { kind: 'result', evaluation: this.buildEvaluation(line) };
        }
        return IGNORED;

      case 'result_seen':
        return IGNORED;
    }
  }

  private handleInfo(line: string): ParseEvent {
    const report = parseInfoLine(line);
    if (!report) {
      return IGNORED;
    }

    if (report.score !== null && report.multipv === 1 && report.bound === null) {
      this.lastScored = report;
    }

    if (!isCompleteReport(report, this.maxDepth)) {
      return IGNORED;
    }

    this.lastComplete = report;
    return { kind: 'report', report };
  }

  private buildEvaluation(line: string): Evaluation {
    const tokens = line.split(/\s+/);
    const moveToken = tokens[1];
    if (!moveToken) {
      throw new EngineProtocolError(`Malformed bestmove line: ${line}`);
    }

    const bestMove = moveToken === '(none)' || moveToken === '0000' ? null : moveToken;

    if (this.lastComplete?.score) {
      return {
        score: this.lastComplete.score,
        bestMove: bestMove ?? this.lastComplete.pv[0] ?? null,
        pv: this.lastComplete.pv,
        depth: this.lastComplete.depth,
      };
    }

    // Terminal positions report a score without a line
    if (bestMove === null && this.lastScored?.score) {
      return {
        score: this.lastScored.score,
        bestMove: null,
        pv: [],
        depth: Math.max(0, this.lastScored.depth),
      };
    }

    throw new EngineProtocolError(`Engine returned ${line} without a usable search report`);
  }
}
