/**
 * Global error handler middleware
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../../utils/logger.js';
import { config } from '../../config/index.js';
import { PipelineError, PipelineErrorCode } from '../../utils/errors.js';

const errorLogger = logger.child({ middleware: 'errorHandler' });

export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string = 'ERROR', details?: unknown) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

const PIPELINE_STATUS: Record<PipelineErrorCode, number> = {
  ENGINE_UNAVAILABLE: 503,
  ENGINE_PROTOCOL_ERROR: 502,
  ENGINE_TIMEOUT: 504,
  ILLEGAL_MOVE: 422,
  CHAPTER_BUILD_ERROR: 422,
  INVALID_THRESHOLDS: 400,
  PUBLISH_ERROR: 502,
};

export function statusForPipelineError(error: PipelineError): number {
  return PIPELINE_STATUS[error.code];
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  errorLogger.error(
    {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
      code: err instanceof ApiError || err instanceof PipelineError ? err.code : undefined,
    },
    'Request error'
  );

  // Handle Zod validation errors
  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Validation error',
      code: 'VALIDATION_ERROR',
      details: err.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      })),
    });
    return;
  }

  if (err instanceof PipelineError) {
    res.status(statusForPipelineError(err)).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  // Handle known errors with status codes
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(config.isProduction ? {} : { details: err.details }),
    });
    return;
  }

  // Handle unknown errors
  res.status(500).json({
    error: config.isProduction ? 'Internal server error' : err.message,
    code: 'INTERNAL_ERROR',
    ...(config.isProduction ? {} : { stack: err.stack }),
  });
}

// Helper to create API errors
export function createApiError(
  message: string,
  statusCode: number,
  code?: string,
  details?: unknown
): ApiError {
  return new ApiError(message, statusCode, code, details);
}
