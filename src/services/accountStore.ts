import type { UpdateQuery } from 'mongoose';
import { Types } from 'mongoose';
import { ACCOUNT_STATUSES } from '../config/accountConfig';
import type { AccountStatus } from '../config/accountConfig';
import { ALLOWED_PREDECESSORS } from '../lib/accountStateMachine';
import { AccountModel } from '../models/mongoose';
import type { IAccountDocument } from '../models/mongoose';
import type { Account, PurgeCounts } from '../types/account';
import { objectIdSchema } from '../utils/mongodb-validation';
import { logger } from '../utils/logger';
import type { OwnedResourceCleaner } from './ownedResourceCleaners';

/**
 * Storage collaborator of the deletion controller.
 * Status writes are conditional: `setStatus` only succeeds from the allowed
 * predecessor state and returns false otherwise.
 */
export interface AccountStore {
  isValidAccountId(accountId: string): boolean;
  find(accountId: string): Promise<Account | null>;
  setStatus(accountId: string, status: AccountStatus): Promise<boolean>;
  /** Throws when any owned resource could not be removed */
  deleteOwnedResources(accountId: string): Promise<PurgeCounts>;
  /** Atomically takes the deletion lease unless someone holds an unexpired one */
  tryAcquireDeletionLease(accountId: string, ttlMs: number): Promise<boolean>;
  releaseDeletionLease(accountId: string): Promise<void>;
  recordDeletionFailure(accountId: string, message: string): Promise<void>;
  /** Pending deletions requested before `olderThan` with no live lease */
  listStalePendingDeletions(olderThan: Date, limit: number): Promise<string[]>;
}

type AccountSnapshot = Pick<
  IAccountDocument,
  | '_id'
  | 'email'
  | 'displayName'
  | 'role'
  | 'status'
  | 'deletionRequestedAt'
  | 'deletedAt'
  | 'deletionAttempts'
  | 'lastDeletionError'
>;

export function toAccount(doc: AccountSnapshot): Account {
  return {
    id: doc._id.toString(),
    status: doc.status,
    role: doc.role,
    email: doc.email ?? null,
    displayName: doc.displayName ?? null,
    deletionRequestedAt: doc.deletionRequestedAt ?? null,
    deletedAt: doc.deletedAt ?? null,
    deletionAttempts: doc.deletionAttempts ?? 0,
    lastDeletionError: doc.lastDeletionError ?? null,
  };
}

export class MongooseAccountStore implements AccountStore {
  constructor(
    private readonly cleaners: readonly OwnedResourceCleaner[],
    private readonly now: () => Date = () => new Date()
  ) {}

  isValidAccountId(accountId: string): boolean {
    return objectIdSchema.safeParse(accountId).success;
  }

  async find(accountId: string): Promise<Account | null> {
    const doc = await AccountModel.findById(accountId).exec();
    return doc ? toAccount(doc) : null;
  }

  async setStatus(accountId: string, status: AccountStatus): Promise<boolean> {
    const now = this.now();
    const update: UpdateQuery<IAccountDocument> = { $set: { status } };

    if (status === ACCOUNT_STATUSES.PENDING_DELETION) {
      update.$set = { status, deletionRequestedAt: now };
    } else if (status === ACCOUNT_STATUSES.DELETED) {
      // Tombstone keeps the id and timestamps only
      update.$set = {
        status,
        deletedAt: now,
        email: null,
        displayName: null,
        lastDeletionError: null,
      };
    }

    const result = await AccountModel.updateOne(
      {
        _id: new Types.ObjectId(accountId),
        status: { $in: [...ALLOWED_PREDECESSORS[status]] },
      },
      update
    ).exec();

    return result.modifiedCount === 1;
  }

  async deleteOwnedResources(accountId: string): Promise<PurgeCounts> {
    const outcomes = await Promise.allSettled(
      this.cleaners.map((cleaner) => cleaner.purge(accountId))
    );

    const counts: Record<string, number> = {};
    const failures: string[] = [];
    outcomes.forEach((outcome, index) => {
      const { name } = this.cleaners[index];
      if (outcome.status === 'fulfilled') {
        counts[name] = outcome.value;
      } else {
        const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        failures.push(`${name} (${reason})`);
      }
    });

    // Throw only once every cleaner has settled
    if (failures.length > 0) {
      throw new Error(`Owned resource cleanup failed: ${failures.join(', ')}`);
    }

    return counts;
  }

  async tryAcquireDeletionLease(accountId: string, ttlMs: number): Promise<boolean> {
    const now = this.now();
    const result = await AccountModel.updateOne(
      {
        _id: new Types.ObjectId(accountId),
        $or: [
          { deletionLeaseExpiresAt: null },
          { deletionLeaseExpiresAt: { $lte: now } },
        ],
      },
      { $set: { deletionLeaseExpiresAt: new Date(now.getTime() + ttlMs) } }
    ).exec();

    return result.modifiedCount === 1;
  }

  async releaseDeletionLease(accountId: string): Promise<void> {
    await AccountModel.updateOne(
      { _id: new Types.ObjectId(accountId) },
      { $set: { deletionLeaseExpiresAt: null } }
    ).exec();
  }

  async recordDeletionFailure(accountId: string, message: string): Promise<void> {
    await AccountModel.updateOne(
      { _id: new Types.ObjectId(accountId) },
      {
        $set: { lastDeletionError: message },
        $inc: { deletionAttempts: 1 },
      }
    ).exec();
    logger.warn('Recorded account deletion failure', { accountId, message });
  }

  async listStalePendingDeletions(olderThan: Date, limit: number): Promise<string[]> {
    const now = this.now();
    const accounts = await AccountModel.find({
      status: ACCOUNT_STATUSES.PENDING_DELETION,
      deletionRequestedAt: { $lt: olderThan },
      $or: [
        { deletionLeaseExpiresAt: null },
        { deletionLeaseExpiresAt: { $lte: now } },
      ],
    })
      .sort({ deletionRequestedAt: 1 })
      .limit(limit)
      .select('_id')
      .lean()
      .exec();

    return accounts.map((account) => account._id.toString());
  }
}
