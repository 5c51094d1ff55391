import express, { type Express, type Request, type Response } from 'express';
import helmet from 'helmet';
import { toNodeHandler } from 'better-auth/node';
import { auth } from './lib/auth';
import { corsMiddleware } from './middleware/cors';
import { requestLogger } from './middleware/requestLogger';
import { rateLimiter } from './middleware/rateLimiter';
import { errorHandler } from './middleware/errorHandler';
import { createApiRouter, type ApiRouterDeps } from './routes';

function applyTrustProxy(app: Express): void {
  const trustProxySetting = process.env.TRUST_PROXY;
  if (trustProxySetting !== undefined) {
    const normalized = trustProxySetting.trim().toLowerCase();
    if (normalized === 'true') {
      app.set('trust proxy', true);
    } else if (normalized === 'false') {
      app.set('trust proxy', false);
    } else if (normalized !== '' && !Number.isNaN(Number(normalized))) {
      app.set('trust proxy', Number(normalized));
    } else {
      app.set('trust proxy', trustProxySetting);
    }
  } else if (process.env.NODE_ENV === 'production') {
    // Default to trusting the first proxy in production deployments.
    app.set('trust proxy', 1);
  }
}

export function createApp(deps: ApiRouterDeps): Express {
  const app = express();

  applyTrustProxy(app);

  // Security middleware
  app.use(helmet());

  // CORS middleware
  app.use(corsMiddleware);

  // Rate limiting
  app.use(rateLimiter);

  // Better Auth handler - MUST come before express.json()
  // Express v5 requires named wildcard: *splat instead of just *
  const authBasePath = process.env.BETTER_AUTH_BASEPATH ?? '/auth';
  app.all(`${authBasePath}/*splat`, toNodeHandler(auth));

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        status: 'OK',
        timestamp: new Date().toISOString(),
        version: process.env.npm_package_version ?? '1.0.0',
        environment: process.env.NODE_ENV ?? 'development',
      },
    });
  });

  // API info endpoint
  app.get('/api', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        message: 'MarketPulse Backend API is running',
        version: 'v1.0.0',
        endpoints: {
          public: {
            health: '/health',
          },
          auth: {
            auth: `${authBasePath}/*`,
          },
          account: {
            deleteOwnAccount: 'DELETE /api/account',
            deleteAccountById: 'DELETE /api/accounts/:id',
            deletionStatus: 'GET /api/accounts/:id/deletion',
          },
          internal: {
            jobs: 'GET /api/internal/jobs',
            runJob: 'POST /api/internal/jobs/:jobName',
          },
        },
      },
    });
  });

  app.use('/api', createApiRouter(deps));

  // Error handling middleware (should be last)
  app.use(errorHandler);

  return app;
}
