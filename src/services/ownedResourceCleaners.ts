import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ObjectId } from 'mongodb';
import { Types } from 'mongoose';
import { SalesForecastModel, SalesUploadModel } from '../models/mongoose';

/**
 * One kind of data owned by an account.
 * `purge` must be safe to call again after a partial or completed run.
 */
export interface OwnedResourceCleaner {
  name: string;
  purge(accountId: string): Promise<number>;
}

export function createSalesUploadCleaner(): OwnedResourceCleaner {
  return {
    name: 'salesUploads',
    async purge(accountId) {
      const result = await SalesUploadModel.deleteMany({
        accountId: new Types.ObjectId(accountId),
      }).exec();
      return result.deletedCount;
    },
  };
}

export function createSalesForecastCleaner(): OwnedResourceCleaner {
  return {
    name: 'salesForecasts',
    async purge(accountId) {
      const result = await SalesForecastModel.deleteMany({
        accountId: new Types.ObjectId(accountId),
      }).exec();
      return result.deletedCount;
    },
  };
}

/**
 * Removes `<root>/<accountId>` (uploaded CSVs or rendered graphs).
 * Returns 1 when a directory was removed, 0 when there was none.
 */
export function createStoredFileCleaner(name: string, root: string): OwnedResourceCleaner {
  const resolvedRoot = path.resolve(root);

  return {
    name,
    async purge(accountId) {
      const target = path.resolve(resolvedRoot, accountId);
      if (path.dirname(target) !== resolvedRoot) {
        throw new Error(`Refusing to remove path outside ${resolvedRoot}: ${target}`);
      }

      const existed = await fs
        .stat(target)
        .then(() => true)
        .catch((error: unknown) => {
          if (isMissingPathError(error)) {
            return false;
          }
          throw error;
        });

      await fs.rm(target, { recursive: true, force: true });
      return existed ? 1 : 0;
    },
  };
}

export interface AuthRecordCollection {
  deleteMany(filter: Record<string, unknown>): Promise<{ deletedCount: number }>;
}

export type AuthCollectionProvider = (name: string) => AuthRecordCollection;

// better-auth sessions, linked social providers, then the user row
export function createAuthRecordCleaner(collection: AuthCollectionProvider): OwnedResourceCleaner {
  return {
    name: 'authRecords',
    async purge(accountId) {
      const userId = new ObjectId(accountId);

      const [sessions, linkedAccounts] = await Promise.all([
        collection('session').deleteMany({ userId }),
        collection('account').deleteMany({ userId }),
      ]);
      const users = await collection('user').deleteMany({ _id: userId });

      return sessions.deletedCount + linkedAccounts.deletedCount + users.deletedCount;
    },
  };
}

function isMissingPathError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
