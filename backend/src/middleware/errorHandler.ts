/**
 * Centralized error handling middleware
 * Maps ledger errors to their HTTP status and a structured body
 */

import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { isAppError } from '../types/errors';
import { createErrorResponse } from '../utils/errorHandler';
import { logger } from '../utils/logger';

/**
 * Error handling middleware
 * Must be added after all routes
 */
export function errorHandlerMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Don't call next() if response already sent
  if (res.headersSent) {
    return next(err);
  }

  if (isAppError(err)) {
    res.locals.errorCode = err.code;
    if (err.statusCode >= 500) {
      logger.error('Request failed', { path: req.path, method: req.method, code: err.code }, err);
    } else {
      logger.debug('Request rejected', { path: req.path, method: req.method, code: err.code });
    }
    res.status(err.statusCode).json(createErrorResponse(err));
    return;
  }

  if (err instanceof z.ZodError) {
    res.status(400).json({
      error: 'Validation failed',
      details: err.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
      timestamp: new Date().toISOString(),
    });
    return;
  }

  // Malformed JSON bodies surface from express.json() as SyntaxError with status 400
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json({
      error: 'Malformed JSON body',
      timestamp: new Date().toISOString(),
    });
    return;
  }

  logger.error('Unhandled error', {
    path: req.path,
    method: req.method,
  }, err instanceof Error ? err : undefined);
  res.status(500).json(createErrorResponse(err, process.env.NODE_ENV !== 'production'));
}

/**
 * 404 for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'Route not found',
    details: `${req.method} ${req.path}`,
    timestamp: new Date().toISOString(),
  });
}
