import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { getLogger } from '../utils/logger';

export type ErrorCode = 'BAD_REQUEST' | 'VALIDATION_ERROR' | 'NOT_FOUND' | 'INTERNAL_SERVER_ERROR';

// Errors raised on purpose by route handlers, rendered as-is
export class AppError extends Error {
  statusCode: number;
  code: ErrorCode;

  constructor(code: ErrorCode, message: string, statusCode: number) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export interface ErrorBody {
  error: ErrorCode;
  message: string;
}

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Forward rejections of async route handlers to the error handler
 */
export function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    void fn(req, res).catch(next);
  };
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new AppError('NOT_FOUND', `Route ${req.method} ${req.path} not found`, 404));
}

// Global error handler middleware
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const logger = getLogger();
  let statusCode = 500;
  let body: ErrorBody = { error: 'INTERNAL_SERVER_ERROR', message: 'Internal server error' };

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    body = { error: err.code, message: err.message };
  } else if (isBodyParseError(err)) {
    statusCode = 400;
    body = { error: 'BAD_REQUEST', message: 'Request body is not valid JSON' };
  }

  if (statusCode >= 500) {
    logger.error('Request failed', { method: req.method, path: req.path, error: err.message, stack: err.stack });
  } else {
    logger.debug('Request rejected', { method: req.method, path: req.path, error: body.message });
  }

  res.status(statusCode).json(body);
}
