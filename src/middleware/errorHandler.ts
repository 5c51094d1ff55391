import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { errorResponse } from '../utils/response';
import { logger } from '../utils/logger';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export const createError = (
  message: string,
  statusCode = 500,
  code = 'INTERNAL_ERROR',
  details?: unknown
): AppError => new AppError(message, statusCode, code, details);

/**
 * Error handling middleware (must be registered last)
 */
export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (error instanceof ZodError) {
    errorResponse(res, 400, 'VALIDATION_ERROR', 'Invalid request', error.issues);
    return;
  }

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error(`${req.method} ${req.originalUrl} failed: ${error.message}`, { code: error.code });
    }
    errorResponse(res, error.statusCode, error.code, error.message, error.details);
    return;
  }

  logger.error(`${req.method} ${req.originalUrl} failed with unexpected error`, error);
  errorResponse(res, 500, 'INTERNAL_ERROR', 'Internal server error');
}
