import type { Request, Response, NextFunction } from 'express';
import { logger, errorMessage } from '@/services/logger';
import { AppError, ValidationError } from '@/utils/errors';
import { createErrorResponse } from '@/utils/errorResponse';

export function errorMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    const level = err.status >= 500 ? 'error' : 'warn';
    logger[level]('http:request_failed', { path: req.path, code: err.code, error: err.message });
    const issues = err instanceof ValidationError ? err.issues : [];
    res.status(err.status).json(createErrorResponse(err.code, err.message, issues));
    return;
  }
  logger.error('http:unhandled_error', { path: req.path, error: errorMessage(err) });
  res.status(500).json(createErrorResponse('internal_error', 'Internal Server Error'));
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json(createErrorResponse('not_found', `Route ${req.method} ${req.path} not found`));
}
