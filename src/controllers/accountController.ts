import type { NextFunction, Response } from 'express';
import type { AuthenticatedRequest } from '../middleware/auth';
import { requireAuth } from '../middleware/auth';
import { createError } from '../middleware/errorHandler';
import type { AccountAuthorizer } from '../services/accountAuthorizer';
import type { AccountService } from '../services/accountService';
import type { DeletionErrorCode, DeletionResult } from '../types/account';
import type { DeleteAccountResponse } from '../types/api';
import { toString } from '../utils/express-utils';
import { successResponse } from '../utils/response';
import type { AccountDeletionController } from './accountDeletionController';

const FAILURE_STATUS: Record<Exclude<DeletionResult['status'], 'success'>, number> = {
  not_found: 404,
  unauthorized: 403,
  failed: 500,
};

// Failures a later call or the retry sweeper can clear
const RETRYABLE_ERRORS: ReadonlySet<DeletionErrorCode> = new Set<DeletionErrorCode>([
  'AUTHORIZATION_ERROR',
  'DELETION_IN_PROGRESS',
  'CLEANUP_FAILED',
  'STORAGE_ERROR',
]);

export class AccountController {
  constructor(
    private readonly deletionController: AccountDeletionController,
    private readonly accountService: AccountService,
    private readonly authorizer: AccountAuthorizer
  ) {}

  /**
   * DELETE /api/account
   * Delete the current user's account
   */
  deleteAccount = async (
    req: AuthenticatedRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const userId = requireAuth(req);
      await this.handleDeletion(res, userId, userId);
    } catch (error) {
      next(error);
    }
  };

  /**
   * DELETE /api/accounts/:id
   * Delete an account by id (owner or admin)
   */
  deleteAccountById = async (
    req: AuthenticatedRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const userId = requireAuth(req);
      await this.handleDeletion(res, userId, toString(req.params.id));
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/accounts/:id/deletion
   * Deletion progress of an account (owner or admin)
   */
  getDeletionStatus = async (
    req: AuthenticatedRequest,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const userId = requireAuth(req);
      const accountId = toString(req.params.id);
      const requester = await this.accountService.resolveRequester(userId);

      if (!(await this.authorizer.isAuthorized(requester, accountId))) {
        throw createError('Not allowed to view this account', 403, 'FORBIDDEN');
      }

      const status = await this.accountService.getDeletionStatus(accountId);
      if (!status) {
        throw createError('Account not found', 404, 'ACCOUNT_NOT_FOUND');
      }

      successResponse(res, status);
    } catch (error) {
      next(error);
    }
  };

  private async handleDeletion(
    res: Response,
    userId: string,
    accountId: string
  ): Promise<void> {
    const requester = await this.accountService.resolveRequester(userId);
    const result = await this.deletionController.delete(requester, accountId);

    if (result.status !== 'success') {
      const statusCode =
        result.error?.code === 'DELETION_IN_PROGRESS' ? 409 : FAILURE_STATUS[result.status];
      throw createError(
        result.error?.message ?? 'Account deletion failed',
        statusCode,
        result.error?.code ?? 'ACCOUNT_DELETION_FAILED',
        result.status === 'failed'
          ? { retryable: result.error !== undefined && RETRYABLE_ERRORS.has(result.error.code) }
          : undefined
      );
    }

    const body: DeleteAccountResponse = {
      accountId: result.accountId,
      status: result.status,
      resumed: result.resumed,
      purged: result.purged,
      message: 'Account deleted successfully',
    };
    successResponse(res, body);
  }
}
