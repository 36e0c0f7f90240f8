// Error handling middleware
import type { NextFunction, Request, Response } from 'express';
import { logger, errorMessage } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(`Not found: ${req.method} ${req.path}`, undefined, 'NOT_FOUND'));
}

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  const status = statusOf(err);
  logger.error('http:error', { method: req.method, path: req.path, status, error: errorMessage(err) });
  res.status(status).json(createErrorResponse(status >= 500 ? 'Internal server error' : errorMessage(err)));
}
