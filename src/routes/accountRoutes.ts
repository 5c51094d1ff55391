import { Router } from 'express';
import type { AccountController } from '../controllers/accountController';
import { deletionRateLimiter } from '../middleware/rateLimiter';
import { validateObjectId } from '../utils/mongodb-validation';

// Mounted at /api/account: the signed-in user's own account
export function createOwnAccountRoutes(accountController: AccountController): Router {
  const router = Router({ mergeParams: true });

  router.delete('/', deletionRateLimiter, accountController.deleteAccount);

  return router;
}

// Mounted at /api/accounts: any account the requester may manage
export function createAccountRoutes(accountController: AccountController): Router {
  const router = Router({ mergeParams: true });

  router.delete('/:id', deletionRateLimiter, validateObjectId('id'), accountController.deleteAccountById);
  router.get('/:id/deletion', validateObjectId('id'), accountController.getDeletionStatus);

  return router;
}
