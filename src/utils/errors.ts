/**
 * Pipeline error taxonomy
 */

export type PipelineErrorCode =
  | 'ENGINE_UNAVAILABLE'
  | 'ENGINE_PROTOCOL_ERROR'
  | 'ENGINE_TIMEOUT'
  | 'ILLEGAL_MOVE'
  | 'CHAPTER_BUILD_ERROR'
  | 'INVALID_THRESHOLDS'
  | 'PUBLISH_ERROR';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(message: string, code: PipelineErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Engine missing or handshake failed. Aborts the run. */
export class EngineUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ENGINE_UNAVAILABLE', options);
  }
}

export class EngineProtocolError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ENGINE_PROTOCOL_ERROR', options);
  }
}

export class EngineTimeoutError extends PipelineError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Engine search did not finish within ${timeoutMs}ms`, 'ENGINE_TIMEOUT');
    this.timeoutMs = timeoutMs;
  }
}

export class IllegalMoveError extends PipelineError {
  readonly ply: number;
  readonly move: string;

  constructor(move: string, ply: number, fen: string, options?: { cause?: unknown }) {
    super(`Illegal move ${move} at ply ${ply} in position ${fen}`, 'ILLEGAL_MOVE', options);
    this.move = move;
    this.ply = ply;
  }
}

export class ChapterBuildError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CHAPTER_BUILD_ERROR', options);
  }
}

export class InvalidThresholdsError extends PipelineError {
  constructor(message: string) {
    super(message, 'INVALID_THRESHOLDS');
  }
}

export class PublishError extends PipelineError {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, 'PUBLISH_ERROR', options);
    this.status = status;
  }
}

/**
 * Errors that fail one game but never the run
 */
export function isGameLevelError(error: unknown): error is PipelineError {
  return (
    error instanceof EngineProtocolError ||
    error instanceof EngineTimeoutError ||
    error instanceof IllegalMoveError ||
    error instanceof ChapterBuildError
  );
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
