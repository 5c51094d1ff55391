import { REQUESTER_ROLES } from '../config/accountConfig';
import type { AccountDeletionController } from '../controllers/accountDeletionController';
import type { AccountStore } from '../services/accountStore';
import type { RequesterIdentity } from '../types/account';
import { logger } from '../utils/logger';

export const DELETION_SWEEPER_IDENTITY: RequesterIdentity = {
  id: 'system:account-deletion-retry',
  role: REQUESTER_ROLES.SERVICE,
};

export interface AccountDeletionRetryResult {
  processed: number;
  completed: number;
  failed: number;
}

export interface AccountDeletionRetryOptions {
  staleAfterMinutes: number;
  batchSize: number;
  now?: Date;
}

/**
 * Resume deletions that were left in pending_deletion
 * (a crashed process or a failed cleanup nobody retried)
 */
export async function resumePendingDeletions(
  controller: AccountDeletionController,
  store: AccountStore,
  { staleAfterMinutes, batchSize, now = new Date() }: AccountDeletionRetryOptions
): Promise<AccountDeletionRetryResult> {
  const threshold = new Date(now.getTime() - staleAfterMinutes * 60 * 1000);
  const accountIds = await store.listStalePendingDeletions(threshold, batchSize);

  const summary: AccountDeletionRetryResult = { processed: 0, completed: 0, failed: 0 };

  for (const accountId of accountIds) {
    const result = await controller.delete(DELETION_SWEEPER_IDENTITY, accountId);
    summary.processed += 1;

    if (result.status === 'success') {
      summary.completed += 1;
    } else if (result.status === 'failed') {
      summary.failed += 1;
    }
  }

  if (summary.processed > 0) {
    logger.info(
      `Resumed ${summary.processed} pending deletions: ${summary.completed} completed, ${summary.failed} failed`
    );
  }

  return summary;
}
