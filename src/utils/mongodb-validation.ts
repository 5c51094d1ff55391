import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { toString } from './express-utils';
import { errorResponse } from './response';

// Validate MongoDB ObjectId format (24 hex characters)
export const objectIdSchema = z.string().regex(/^[0-9a-fA-F]{24}$/, 'Invalid ID format');

// Validation middleware factory for ObjectId params
export function validateObjectId(param = 'id') {
  return (req: Request, res: Response, next: NextFunction): void => {
    const id = toString(req.params[param]);

    if (!id) {
      errorResponse(res, 400, 'MISSING_PARAM', `${param} parameter is required`);
      return;
    }

    if (!objectIdSchema.safeParse(id).success) {
      errorResponse(res, 400, 'INVALID_ID_FORMAT', `Invalid ${param} format`);
      return;
    }

    next();
  };
}
