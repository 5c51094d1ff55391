import { Types } from 'mongoose';
import { ACCOUNT_ROLES, ACCOUNT_STATUSES } from '../config/accountConfig';
import { AccountModel } from '../models/mongoose';
import type { AccountDeletionStatus, RequesterIdentity } from '../types/account';
import { logger } from '../utils/logger';
import { toAccount } from './accountStore';

interface ProvisionAccountInput {
  userId: string;
  email?: string | null;
  name?: string | null;
}

export class AccountService {
  /**
   * Create the Account row for a freshly created auth user.
   * Upsert so a replayed hook does not fail or reset an existing account.
   */
  async provisionAccount({ userId, email, name }: ProvisionAccountInput): Promise<void> {
    await AccountModel.updateOne(
      { _id: new Types.ObjectId(userId) },
      {
        $setOnInsert: {
          email: email ?? null,
          displayName: name ?? null,
          role: ACCOUNT_ROLES.USER,
          status: ACCOUNT_STATUSES.ACTIVE,
          deletionAttempts: 0,
        },
      },
      { upsert: true }
    ).exec();

    logger.info('Account provisioned', { userId });
  }

  /**
   * Build the requester identity for an authenticated user.
   * Users without an active account row get the plain user role.
   */
  async resolveRequester(userId: string): Promise<RequesterIdentity> {
    const account = await AccountModel.findById(userId).select('role status').exec();

    if (!account || account.status !== ACCOUNT_STATUSES.ACTIVE) {
      return { id: userId, role: ACCOUNT_ROLES.USER };
    }

    return { id: userId, role: account.role };
  }

  async getDeletionStatus(accountId: string): Promise<AccountDeletionStatus | null> {
    const doc = await AccountModel.findById(accountId).exec();
    if (!doc) {
      return null;
    }

    const account = toAccount(doc);
    return {
      accountId: account.id,
      status: account.status,
      deletionRequestedAt: account.deletionRequestedAt,
      deletedAt: account.deletedAt,
      deletionAttempts: account.deletionAttempts,
      lastDeletionError: account.lastDeletionError,
    };
  }
}
