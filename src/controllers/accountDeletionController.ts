import { ACCOUNT_STATUSES } from '../config/accountConfig';
import { isTerminal } from '../lib/accountStateMachine';
import { KeyedLock } from '../lib/keyedLock';
import type { AccountAuthorizer } from '../services/accountAuthorizer';
import type { AccountStore } from '../services/accountStore';
import type {
  DeletionErrorCode,
  DeletionRequest,
  DeletionResult,
  DeletionStatus,
  PurgeCounts,
  RequesterIdentity,
} from '../types/account';
import { logger } from '../utils/logger';

export interface AccountDeletionControllerOptions {
  store: AccountStore;
  authorizer: AccountAuthorizer;
  /** Share one lock between controllers that serve the same process */
  lock?: KeyedLock;
  leaseTtlMs?: number;
  now?: () => Date;
}

const DEFAULT_LEASE_TTL_MS = 5 * 60 * 1000;

/**
 * Deletes an account and everything it owns.
 *
 * The account is first marked `pending_deletion`, owned resources are purged,
 * and only then is it marked `deleted`. A failed purge leaves the account in
 * `pending_deletion` so the next call resumes the cleanup. Calls for the same
 * account are serialized in-process by a keyed lock and across processes by a
 * lease stored on the account.
 *
 * `delete` never throws: every failure is reported through the result.
 */
export class AccountDeletionController {
  private readonly store: AccountStore;
  private readonly authorizer: AccountAuthorizer;
  private readonly lock: KeyedLock;
  private readonly leaseTtlMs: number;
  private readonly now: () => Date;

  constructor(options: AccountDeletionControllerOptions) {
    this.store = options.store;
    this.authorizer = options.authorizer;
    this.lock = options.lock ?? new KeyedLock();
    this.leaseTtlMs = options.leaseTtlMs ?? DEFAULT_LEASE_TTL_MS;
    this.now = options.now ?? (() => new Date());
  }

  async delete(requester: RequesterIdentity, targetAccountId: string): Promise<DeletionResult> {
    const request: DeletionRequest = {
      requester,
      targetAccountId,
      requestedAt: this.now(),
    };

    if (!targetAccountId || !this.store.isValidAccountId(targetAccountId)) {
      return this.result(request, 'not_found', {
        code: 'INVALID_ACCOUNT_ID',
        message: 'Account identifier is not valid',
      });
    }

    let authorized: boolean;
    try {
      authorized = await this.authorizer.isAuthorized(requester, targetAccountId);
    } catch (error) {
      return this.fail(request, 'AUTHORIZATION_ERROR', error);
    }

    if (!authorized) {
      logger.warn('Account deletion rejected', this.context(request));
      return this.result(request, 'unauthorized', {
        code: 'FORBIDDEN',
        message: 'Requester is not allowed to delete this account',
      });
    }

    return this.lock.run(targetAccountId, () => this.runDeletion(request));
  }

  private async runDeletion(request: DeletionRequest): Promise<DeletionResult> {
    const accountId = request.targetAccountId;

    try {
      const account = await this.store.find(accountId);
      if (!account) {
        return this.result(request, 'not_found', {
          code: 'ACCOUNT_NOT_FOUND',
          message: 'Account not found',
        });
      }

      if (isTerminal(account.status)) {
        return this.result(request, 'not_found', {
          code: 'ACCOUNT_ALREADY_DELETED',
          message: 'Account has already been deleted',
        });
      }

      const acquired = await this.store.tryAcquireDeletionLease(accountId, this.leaseTtlMs);
      if (!acquired) {
        return this.result(request, 'failed', {
          code: 'DELETION_IN_PROGRESS',
          message: 'Another deletion of this account is in progress',
        });
      }

      try {
        // Another process may have finished between the first read and the lease
        const current = await this.store.find(accountId);
        if (!current || isTerminal(current.status)) {
          return this.result(request, 'not_found', {
            code: 'ACCOUNT_ALREADY_DELETED',
            message: 'Account has already been deleted',
          });
        }
        return await this.purge(request, current.status === ACCOUNT_STATUSES.PENDING_DELETION);
      } finally {
        await this.releaseLease(accountId);
      }
    } catch (error) {
      return this.fail(request, 'STORAGE_ERROR', error);
    }
  }

  private async purge(request: DeletionRequest, resumed: boolean): Promise<DeletionResult> {
    const accountId = request.targetAccountId;

    logger.info('Account deletion initiated', { ...this.context(request), resumed });

    if (!resumed) {
      const marked = await this.store.setStatus(accountId, ACCOUNT_STATUSES.PENDING_DELETION);
      if (!marked) {
        return this.rejectedTransition(request, ACCOUNT_STATUSES.PENDING_DELETION, resumed);
      }
    }

    let purged: PurgeCounts;
    try {
      purged = await this.store.deleteOwnedResources(accountId);
    } catch (error) {
      const message = describeError(error);
      try {
        await this.store.recordDeletionFailure(accountId, message);
      } catch (recordError) {
        logger.error('Could not record account deletion failure', {
          accountId,
          error: describeError(recordError),
        });
      }
      return this.fail(request, 'CLEANUP_FAILED', error, resumed);
    }

    logger.info('Account owned data purged', { ...this.context(request), purged });

    const deleted = await this.store.setStatus(accountId, ACCOUNT_STATUSES.DELETED);
    if (!deleted) {
      return this.rejectedTransition(request, ACCOUNT_STATUSES.DELETED, resumed);
    }

    logger.info('Account deleted successfully', this.context(request));

    return this.result(request, 'success', undefined, { resumed, purged });
  }

  private async releaseLease(accountId: string): Promise<void> {
    try {
      await this.store.releaseDeletionLease(accountId);
    } catch (error) {
      // Lease expires on its own after leaseTtlMs
      logger.warn('Could not release account deletion lease', {
        accountId,
        error: describeError(error),
      });
    }
  }

  private rejectedTransition(
    request: DeletionRequest,
    target: string,
    resumed: boolean
  ): DeletionResult {
    return this.fail(
      request,
      'STATUS_TRANSITION_REJECTED',
      new Error(`Account status could not be changed to ${target}`),
      resumed
    );
  }

  private fail(
    request: DeletionRequest,
    code: DeletionErrorCode,
    error: unknown,
    resumed = false
  ): DeletionResult {
    const message = describeError(error);
    logger.error('Account deletion failed', { ...this.context(request), code, error: message });
    return this.result(request, 'failed', { code, message }, { resumed });
  }

  private result(
    request: DeletionRequest,
    status: DeletionStatus,
    error?: { code: DeletionErrorCode; message: string },
    extra: { resumed?: boolean; purged?: PurgeCounts } = {}
  ): DeletionResult {
    return Object.freeze({
      status,
      accountId: request.targetAccountId,
      resumed: extra.resumed ?? false,
      ...(extra.purged ? { purged: Object.freeze({ ...extra.purged }) } : {}),
      ...(error ? { error: Object.freeze({ ...error }) } : {}),
      completedAt: this.now(),
    });
  }

  private context(request: DeletionRequest): Record<string, unknown> {
    return {
      accountId: request.targetAccountId,
      requesterId: request.requester.id,
      requesterRole: request.requester.role,
      timestamp: request.requestedAt.toISOString(),
    };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
