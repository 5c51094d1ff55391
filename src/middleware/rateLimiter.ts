import rateLimit from 'express-rate-limit';
import { z } from 'zod';

const rateLimitEnv = z
  .object({
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  })
  .parse(process.env);

export const rateLimiter = rateLimit({
  windowMs: rateLimitEnv.RATE_LIMIT_WINDOW_MS,
  limit: rateLimitEnv.RATE_LIMIT_MAX,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: {
    success: false,
    error: {
      code: 'RATE_LIMITED',
      message: 'Too many requests, please try again later',
    },
  },
});

// Per-client cap for account deletion endpoints
export const deletionRateLimiter = rateLimit({
  windowMs: 60 * 60 * 1000,
  limit: 10,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: {
    success: false,
    error: {
      code: 'RATE_LIMITED',
      message: 'Too many deletion requests, please try again later',
    },
  },
});
