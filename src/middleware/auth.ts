import type { NextFunction, Request, Response } from 'express';
import { fromNodeHeaders } from 'better-auth/node';
import { auth } from '../lib/auth';
import { errorResponse } from '../utils/response';
import { logger } from '../utils/logger';
import { createError } from './errorHandler';

/**
 * Extended Request interface with authenticated user data
 */
export interface AuthenticatedRequest extends Request {
  user?: {
    id: string;
    email: string;
    name: string;
    emailVerified: boolean;
    image?: string | null;
    createdAt: Date;
    updatedAt: Date;
  };
  session?: {
    id: string;
    userId: string;
    token: string;
    expiresAt: Date;
    ipAddress?: string | null;
    userAgent?: string | null;
    createdAt: Date;
    updatedAt: Date;
  };
}

/**
 * Middleware that requires authentication.
 * Returns 401 if no valid session is found.
 */
export async function authMiddleware(
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const session = await auth.api.getSession({
      headers: fromNodeHeaders(req.headers),
    });

    if (!session) {
      errorResponse(res, 401, 'UNAUTHORIZED', 'Authentication required');
      return;
    }

    req.user = session.user;
    req.session = session.session;
    next();
  } catch (error) {
    logger.error('Auth middleware error:', error);
    errorResponse(res, 401, 'UNAUTHORIZED', 'Invalid or expired session');
  }
}

/**
 * Middleware that requires a valid internal API key.
 * Used for internal job endpoints; the key is passed in the X-Internal-API-Key header.
 */
export function requireInternalApiKey(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const apiKey = req.headers['x-internal-api-key'];
  const expectedKey = process.env.INTERNAL_API_KEY;

  if (!expectedKey) {
    logger.error('INTERNAL_API_KEY environment variable is not configured');
    errorResponse(res, 500, 'CONFIG_ERROR', 'Internal API key not configured');
    return;
  }

  if (!apiKey || apiKey !== expectedKey) {
    errorResponse(res, 403, 'FORBIDDEN', 'Invalid or missing API key');
    return;
  }

  next();
}

/**
 * Helper function to get authenticated user ID with proper error handling
 * @throws AppError (401) if user is not authenticated
 */
export const requireAuth = (req: AuthenticatedRequest): string => {
  if (!req.user?.id) {
    throw createError('Authentication required', 401, 'UNAUTHORIZED');
  }
  return req.user.id;
};
