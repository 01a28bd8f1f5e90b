/**
 * Request Context Middleware
 *
 * - traceId: reuses a safe x-trace-id from the client or generates a UUID
 * - req.log: child logger carrying the traceId
 * - echoes x-trace-id on the response
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger, type Logger } from '../lib/logger/structured-logger.js';

declare global {
  namespace Express {
    interface Request {
      traceId: string;
      log: Logger;
    }
  }
}

const TRACE_ID_PATTERN = /^[a-zA-Z0-9_-]{1,128}$/;

export function resolveTraceId(header: string | string[] | undefined): string {
  if (typeof header === 'string' && TRACE_ID_PATTERN.test(header)) {
    return header;
  }
  return uuidv4();
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const traceId = resolveTraceId(req.headers['x-trace-id']);

  req.traceId = traceId;
  req.log = logger.child({ traceId });
  res.setHeader('x-trace-id', traceId);

  next();
}
