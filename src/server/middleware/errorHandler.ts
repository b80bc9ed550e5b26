import type { NextFunction, Request, Response } from 'express';
import { createAppError } from '../errors.js';
import type { AppError, ApiErrorCode, ErrorEnvelope } from '../types.js';
import { logger } from '../observability/logger.js';

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(
    createAppError(`Route not found: ${req.method} ${req.originalUrl}`, {
      statusCode: 404,
      code: 'NOT_FOUND',
      recoverable: true
    })
  );
}

export function errorHandler(err: AppError, req: Request, res: Response, _next: NextFunction): void {
  const statusCode = err.statusCode ?? 500;
  const code: ApiErrorCode = err.code ?? 'INTERNAL_ERROR';
  const recoverable = err.recoverable ?? statusCode < 500;
  const timestampUtc = new Date().toISOString();

  const payload: ErrorEnvelope = {
    error: {
      code,
      message: statusCode >= 500 && !err.code ? 'Internal server error' : err.message || 'Internal server error',
      recoverable,
      requestId: req.requestId,
      timestampUtc,
      context: err.context,
      details: err.details
    }
  };

  const log = statusCode >= 500 ? logger.error : logger.warn;
  log('request_failed', {
    requestId: req.requestId,
    method: req.method,
    path: req.originalUrl,
    statusCode,
    code,
    recoverable,
    timestampUtc,
    error: err.message,
    details: err.details
  });

  res.status(statusCode).json(payload);
}
