// =============================================================================
// AGENT TEST PLATFORM — Request Middleware
//
// Covers:
//   - Request ID assignment for tracing
//   - Error handling (no stack traces in production)
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseError, DatabaseErrorCode } from '../db/errors';
import '../types/express';

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a unique request ID for tracing. An incoming X-Request-ID is kept.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.get('X-Request-ID') || uuidv4();
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Error Handler ──────────────────────────────────────────────────────

const STATUS_BY_CODE: Record<DatabaseErrorCode, number> = {
  CONFIG_PARSE_ERROR: 500,
  UNSUPPORTED_SCHEME: 500,
  CONNECTION_UNAVAILABLE: 503,
  ACQUISITION_CANCELLED: 503,
};

function statusOf(err: Error): number {
  if (err instanceof DatabaseError) return STATUS_BY_CODE[err.code];
  // body-parser and http-errors attach a client status
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 600) {
    return err.status;
  }
  return 500;
}

/**
 * Global error handler. Never leaks stack traces in production.
 */
export function errorHandler(nodeEnv: string) {
  return (err: Error, req: Request, res: Response, _next: NextFunction) => {
    const isProd = nodeEnv === 'production';
    const status = statusOf(err);

    console.error(`[ERROR] ${req.requestId ?? '-'} ${err.message}`, isProd ? '' : err.stack);

    res.status(status).json({
      error: isProd && status >= 500 ? 'Internal server error' : err.message,
      ...(err instanceof DatabaseError ? { code: err.code } : {}),
      ...(isProd ? {} : { stack: err.stack }),
    });
  };
}
