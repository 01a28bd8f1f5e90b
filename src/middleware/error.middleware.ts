/**
 * Centralized Error Middleware
 * Known failures carry an AppError; anything else becomes a generic 500.
 * Stack traces and details are only returned outside production.
 */

import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger/structured-logger.js';

/**
 * Application Error - structured error with an HTTP status and code
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly exposeMessage: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

interface ErrorResponse {
  error: string;
  code: string;
  traceId: string;
  details?: unknown;
  stack?: string;
}

/** express.json() rejects malformed bodies with a SyntaxError carrying status 400. */
function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && Reflect.get(err, 'type') === 'entity.parse.failed';
}

function toAppError(err: Error): AppError {
  if (err instanceof AppError) return err;
  if (isMalformedJson(err)) {
    return new AppError('Request body is not valid JSON', 400, 'INVALID_JSON', undefined, true);
  }
  return new AppError(err.message || 'Internal server error');
}

function genericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Invalid request';
    case 404:
      return 'Not found';
    case 502:
      return 'Upstream service error';
    case 503:
      return 'Service unavailable';
    default:
      return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

/**
 * Must be registered after all routes.
 */
export function errorMiddleware(err: Error, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    return next(err);
  }

  const isProd = process.env.NODE_ENV === 'production';
  const appError = toAppError(err);
  const traceId = req.traceId || 'unknown';
  const log = req.log ?? logger;

  const logContext = {
    event: 'request_error',
    error: { name: err.name, message: err.message, stack: err.stack, code: appError.code },
    statusCode: appError.statusCode,
    method: req.method,
    path: req.path,
  };
  if (appError.statusCode >= 500) {
    log.error(logContext, 'Request error');
  } else {
    log.warn(logContext, 'Request error');
  }

  const response: ErrorResponse = {
    error: appError.exposeMessage || (!isProd && appError.statusCode >= 500)
      ? appError.message
      : genericMessage(appError.statusCode),
    code: appError.code,
    traceId,
  };
  if (!isProd) {
    if (appError.details !== undefined) response.details = appError.details;
    if (err.stack) response.stack = err.stack;
  }

  res.status(appError.statusCode).json(response);
}

/**
 * 404 for unmatched routes, routed through errorMiddleware.
 */
export function notFoundMiddleware(req: Request, _res: Response, next: NextFunction): void {
  next(new AppError(`No route for ${req.method} ${req.path}`, 404, 'NOT_FOUND'));
}

export function createValidationError(message: string, details?: unknown): AppError {
  return new AppError(message, 400, 'VALIDATION_ERROR', details, true);
}
