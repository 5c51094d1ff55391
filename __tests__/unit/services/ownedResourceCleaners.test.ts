import { mkdir, mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../../src/models/mongoose', () => {
  return {
    SalesUploadModel: {
      deleteMany: vi.fn(),
    },
    SalesForecastModel: {
      deleteMany: vi.fn(),
    },
  };
});

import { ObjectId } from 'mongodb';
import { Types } from 'mongoose';
import { SalesForecastModel, SalesUploadModel } from '../../../src/models/mongoose';
import {
  createAuthRecordCleaner,
  createSalesForecastCleaner,
  createSalesUploadCleaner,
  createStoredFileCleaner,
} from '../../../src/services/ownedResourceCleaners';
import type { AuthRecordCollection } from '../../../src/services/ownedResourceCleaners';

type MockFn = ReturnType<typeof vi.fn>;

const accountId = '64b7f0c2a1b2c3d4e5f60718';

describe('owned resource cleaners', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('sales data', () => {
    const SalesUploadModelMock = SalesUploadModel as unknown as { deleteMany: MockFn };
    const SalesForecastModelMock = SalesForecastModel as unknown as { deleteMany: MockFn };

    it('removes every upload of the account', async () => {
      SalesUploadModelMock.deleteMany.mockReturnValue({
        exec: vi.fn().mockResolvedValue({ deletedCount: 3 }),
      });

      const cleaner = createSalesUploadCleaner();

      expect(cleaner.name).toBe('salesUploads');
      await expect(cleaner.purge(accountId)).resolves.toBe(3);
      expect(SalesUploadModelMock.deleteMany).toHaveBeenCalledWith({
        accountId: new Types.ObjectId(accountId),
      });
    });

    it('removes every forecast of the account', async () => {
      SalesForecastModelMock.deleteMany.mockReturnValue({
        exec: vi.fn().mockResolvedValue({ deletedCount: 0 }),
      });

      await expect(createSalesForecastCleaner().purge(accountId)).resolves.toBe(0);
    });
  });

  describe('stored files', () => {
    let root: string;

    beforeEach(async () => {
      root = await mkdtemp(path.join(tmpdir(), 'marketpulse-cleaner-'));
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    it('removes the account directory and reports it', async () => {
      const accountDir = path.join(root, accountId);
      await mkdir(accountDir, { recursive: true });
      await writeFile(path.join(accountDir, 'sales.csv'), 'Date,Total\n01/02,100\n');

      const cleaner = createStoredFileCleaner('uploadedFiles', root);

      await expect(cleaner.purge(accountId)).resolves.toBe(1);
      await expect(stat(accountDir)).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('reports zero when there is nothing to remove', async () => {
      const cleaner = createStoredFileCleaner('graphFiles', root);

      await expect(cleaner.purge(accountId)).resolves.toBe(0);
    });

    it('refuses ids that escape the root directory', async () => {
      const cleaner = createStoredFileCleaner('graphFiles', root);

      await expect(cleaner.purge('../outside')).rejects.toThrow('Refusing to remove path outside');
    });
  });

  describe('auth records', () => {
    it('removes sessions, linked providers and the user row', async () => {
      const collections = new Map<string, AuthRecordCollection & { deleteMany: MockFn }>([
        ['session', { deleteMany: vi.fn().mockResolvedValue({ deletedCount: 2 }) }],
        ['account', { deleteMany: vi.fn().mockResolvedValue({ deletedCount: 1 }) }],
        ['user', { deleteMany: vi.fn().mockResolvedValue({ deletedCount: 1 }) }],
      ]);
      const collection = (name: string) => {
        const found = collections.get(name);
        if (!found) {
          throw new Error(`unexpected collection ${name}`);
        }
        return found;
      };

      const cleaner = createAuthRecordCleaner(collection);

      await expect(cleaner.purge(accountId)).resolves.toBe(4);
      expect(collections.get('session')?.deleteMany).toHaveBeenCalledWith({
        userId: new ObjectId(accountId),
      });
      expect(collections.get('user')?.deleteMany).toHaveBeenCalledWith({
        _id: new ObjectId(accountId),
      });
    });
  });
});
