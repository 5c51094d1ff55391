import { Router } from 'express';
import type { AccountController } from '../controllers/accountController';
import type { SchedulerDeps } from '../jobs/scheduler';
import { authMiddleware } from '../middleware/auth';
import { createAccountRoutes, createOwnAccountRoutes } from './accountRoutes';
import { createInternalRoutes } from './internalRoutes';

export interface ApiRouterDeps {
  accountController: AccountController;
  scheduler: SchedulerDeps;
}

export function createApiRouter({ accountController, scheduler }: ApiRouterDeps): Router {
  const router = Router();

  // Internal routes - NO SESSION AUTH (API key instead)
  router.use('/internal', createInternalRoutes(scheduler));

  // All other API routes require authentication
  router.use(authMiddleware);

  router.use('/account', createOwnAccountRoutes(accountController));
  router.use('/accounts', createAccountRoutes(accountController));

  return router;
}
