/**
 * EngineSession - Owns one long-lived UCI engine process
 * Handles the handshake, single-flight searches, restart after failures
 * and graceful shutdown
 */

import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import { Evaluation } from '../types/index.js';
import { ENGINE_CONFIG } from '../config/constants.js';
import {
  EngineProtocolError,
  EngineTimeoutError,
  EngineUnavailableError,
  errorMessage,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ParseEvent, UciSearchParser } from './UciSearchParser.js';

/**
 * The slice of a child process the session talks to
 */
export interface EngineProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnEngine = (executablePath: string) => EngineProcess;

export interface EngineSessionOptions {
  executablePath: string;
  hashMb?: number;
  threads?: number;
  /** Any additional UCI options, set by name */
  uciOptions?: Record<string, string | number | boolean>;
  handshakeTimeoutMs?: number;
  searchTimeoutMs?: number;
  closeGraceMs?: number;
  spawnEngine?: SpawnEngine;
}

export type EngineStatus = 'starting' | 'ready' | 'busy' | 'faulted' | 'closed';

export interface EngineStats {
  status: EngineStatus;
  searches: number;
  restarts: number;
  queueLength: number;
}

interface PendingRead {
  onLine: (line: string) => void;
  fail: (error: Error) => void;
}

interface QueuedTask {
  run: () => Promise<void>;
  cancel: (error: Error) => void;
}

const defaultSpawn: SpawnEngine = (executablePath) => spawn(executablePath, []);

export class EngineSession {
  private process: EngineProcess | null = null;
  private pending: PendingRead | null = null;
  private lineBuffer: string = '';
  private queue: QueuedTask[] = [];
  private active: boolean = false;
  private faulted: boolean = false;
  private closed: boolean = false;
  private started: boolean = false;
  private searches: number = 0;
  private restarts: number = 0;

  private readonly executablePath: string;
  private readonly handshakeTimeoutMs: number;
  private readonly searchTimeoutMs: number;
  private readonly closeGraceMs: number;
  private readonly spawnEngine: SpawnEngine;
  private readonly setOptions: Array<[string, string | number | boolean]>;
  private readonly log = logger.child({ service: 'EngineSession' });

  private constructor(options: EngineSessionOptions) {
    this.executablePath = options.executablePath;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? ENGINE_CONFIG.HANDSHAKE_TIMEOUT;
    this.searchTimeoutMs = options.searchTimeoutMs ?? ENGINE_CONFIG.SEARCH_TIMEOUT;
    this.closeGraceMs = options.closeGraceMs ?? ENGINE_CONFIG.CLOSE_GRACE;
    this.spawnEngine = options.spawnEngine ?? defaultSpawn;
    this.setOptions = [
      ['Hash', options.hashMb ?? ENGINE_CONFIG.HASH_MB],
      ['Threads', options.threads ?? ENGINE_CONFIG.THREADS],
      ...Object.entries(options.uciOptions ?? {}),
    ];
  }

  /**
   * Launch the engine and complete the UCI handshake
   */
  static async open(options: EngineSessionOptions): Promise<EngineSession> {
    const session = new EngineSession(options);
    await session.start();
    return session;
  }

  get status(): EngineStatus {
    if (this.closed) return 'closed';
    if (!this.started) return 'starting';
    if (this.faulted) return 'faulted';
    if (this.active) return 'busy';
    return 'ready';
  }

  get queueLength(): number {
    return this.queue.length;
  }

  getStats(): EngineStats {
    return {
      status: this.status,
      searches: this.searches,
      restarts: this.restarts,
      queueLength: this.queue.length,
    };
  }

  /**
   * Evaluate a position to a fixed depth. Calls are served one at a time.
   */
  evaluate(fen: string, depth: number): Promise<Evaluation> {
    return this.enqueue(async () => {
      if (this.faulted) {
        await this.recover();
      }
      return this.search(fen, depth);
    });
  }

  /**
   * Tell the engine a new game starts (clears its hash)
   */
  newGame(): Promise<void> {
    return this.enqueue(async () => {
      if (this.faulted) {
        await this.recover();
      }
      this.send('ucinewgame');
      try {
        await this.awaitLine('isready', (line) => line === 'readyok', this.handshakeTimeoutMs, () =>
          new EngineTimeoutError(this.handshakeTimeoutMs)
        );
      } catch (error) {
        this.faulted = true;
        throw error;
      }
    });
  }

  /**
   * Replace the engine process with a fresh one
   */
  restart(): Promise<void> {
    return this.enqueue(() => this.recover());
  }

  /**
   * Ask the engine to quit, kill it after the grace period. Idempotent.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const closedError = new EngineUnavailableError('Engine session is closed');
    const queued = this.queue;
    this.queue = [];
    for (const task of queued) {
      task.cancel(closedError);
    }
    this.pending?.fail(closedError);

    await this.shutdownProcess();
    this.log.info({ searches: this.searches, restarts: this.restarts }, 'Engine session closed');
  }

  // ─────────────────────────────────────────────────────────────────────
  // Queue
  // ─────────────────────────────────────────────────────────────────────

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new EngineUnavailableError('Engine session is closed'));
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: () => task().then(resolve, reject),
        cancel: reject,
      });
      this.drain();
    });
  }

  private drain(): void {
    if (this.active) {
      return;
    }
    const next = this.queue.shift();
    if (!next) {
      return;
    }

    this.active = true;
    void next.run().finally(() => {
      this.active = false;
      this.drain();
    });
  }

  // ─────────────────────────────────────────────────────────────────────
  // Process lifecycle
  // ─────────────────────────────────────────────────────────────────────

  private async start(): Promise<void> {
    let proc: EngineProcess;
    try {
      proc = this.spawnEngine(this.executablePath);
    } catch (error) {
      throw new EngineUnavailableError(
        `Failed to start engine at ${this.executablePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    this.process = proc;
    this.lineBuffer = '';

    proc.stdout.setEncoding('utf8');
    proc.stdout.on('data', (chunk: string) => {
      if (this.process === proc) {
        this.handleOutput(chunk);
      }
    });

    proc.stdin.on('error', (err: Error) => {
      this.log.warn({ err }, 'Engine stdin error');
    });

    proc.stderr.on('data', (chunk: Buffer | string) => {
      this.log.warn({ stderr: chunk.toString().trim() }, 'Engine stderr');
    });

    proc.on('error', (err: Error) => {
      this.log.error({ err, executablePath: this.executablePath }, 'Engine process error');
      this.handleProcessGone(
        proc,
        new EngineUnavailableError(`Engine process error: ${err.message}`, { cause: err })
      );
    });

    proc.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.log.info({ code, signal }, 'Engine process exited');
      this.handleProcessGone(proc, new EngineProtocolError(`Engine exited unexpectedly (code ${code})`));
    });

    try {
      await this.handshake();
    } catch (error) {
      this.process = null;
      proc.kill('SIGKILL');
      if (error instanceof EngineUnavailableError) {
        throw error;
      }
      throw new EngineUnavailableError(
        `Engine handshake failed for ${this.executablePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    this.started = true;
    this.faulted = false;
    this.log.info({ executablePath: this.executablePath }, 'Engine ready');
  }

  private async handshake(): Promise<void> {
    const timeout = () =>
      new EngineUnavailableError(
        `Engine at ${this.executablePath} did not answer within ${this.handshakeTimeoutMs}ms`
      );

    await this.awaitLine('uci', (line) => line === 'uciok', this.handshakeTimeoutMs, timeout);

    for (const [name, value] of this.setOptions) {
      this.send(`setoption name ${name} value ${String(value)}`);
    }

    await this.awaitLine('isready', (line) => line === 'readyok', this.handshakeTimeoutMs, timeout);
  }

  private async recover(): Promise<void> {
    this.log.warn({ restarts: this.restarts + 1 }, 'Restarting engine');
    this.restarts++;
    await this.shutdownProcess();
    await this.start();
  }

  private handleProcessGone(proc: EngineProcess, error: Error): void {
    if (this.process !== proc) {
      return;
    }
    this.process = null;
    this.faulted = true;
    this.pending?.fail(error);
  }

  private shutdownProcess(): Promise<void> {
    const proc = this.process;
    if (!proc) {
      return Promise.resolve();
    }
    this.process = null;

    return new Promise((resolve) => {
      const forceKill = setTimeout(() => {
        this.log.warn('Engine did not quit in time, killing it');
        proc.kill('SIGKILL');
        resolve();
      }, this.closeGraceMs);

      proc.once('exit', () => {
        clearTimeout(forceKill);
        resolve();
      });

      this.write(proc, 'quit');
    });
  }

  // ─────────────────────────────────────────────────────────────────────
  // I/O
  // ─────────────────────────────────────────────────────────────────────

  private search(fen: string, depth: number): Promise<Evaluation> {
    const parser = new UciSearchParser(depth);
    this.searches++;

    return new Promise<Evaluation>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        this.faulted = true;
        this.send('stop');
        reject(new EngineTimeoutError(this.searchTimeoutMs));
      }, this.searchTimeoutMs);

      const fail = (error: Error) => {
        clearTimeout(timer);
        this.pending = null;
        this.faulted = true;
        reject(error);
      };

      this.pending = {
        onLine: (line) => {
          let event: ParseEvent;
          try {
            event = parser.push(line);
          } catch (error) {
            this.send('stop');
            fail(error instanceof Error ? error : new EngineProtocolError(String(error)));
            return;
          }

          if (event.kind === 'ready') {
            this.send(`go depth ${depth}`);
          } else if (event.kind === 'result') {
            clearTimeout(timer);
            this.pending = null;
            resolve(event.evaluation);
          }
        },
        fail,
      };

      if (!this.process) {
        fail(new EngineProtocolError('Engine process is not running'));
        return;
      }

      this.send(`position fen ${fen}`);
      this.send('isready');
    });
  }

  private awaitLine(
    command: string,
    matches: (line: string) => boolean,
    timeoutMs: number,
    onTimeout: () => Error
  ): Promise<string> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(onTimeout());
      }, timeoutMs);

      this.pending = {
        onLine: (line) => {
          if (matches(line)) {
            clearTimeout(timer);
            this.pending = null;
            resolve(line);
          }
        },
        fail: (error) => {
          clearTimeout(timer);
          this.pending = null;
          reject(error);
        },
      };

      this.send(command);
    });
  }

  private handleOutput(chunk: string): void {
    this.lineBuffer += chunk;
    const lines = this.lineBuffer.split('\n');

    // Keep incomplete line in buffer
    this.lineBuffer = lines.pop() ?? '';

    for (const raw of lines) {
      const line = raw.trim();
      if (!line) continue;

      this.pending?.onLine(line);
    }
  }

  private send(command: string): void {
    if (this.process) {
      this.write(this.process, command);
    }
  }

  private write(proc: EngineProcess, command: string): void {
    if (!proc.stdin.destroyed && proc.stdin.writable) {
      proc.stdin.write(`${command}\n`);
    }
  }
}

/**
 * Scoped acquisition: the session is closed exactly once, however `fn` ends
 */
export async function withEngineSession<T>(
  options: EngineSessionOptions,
  fn: (session: EngineSession) => Promise<T>
): Promise<T> {
  const session = await EngineSession.open(options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
