import { loadAccountDeletionConfig, type AccountDeletionConfig } from '../config/accountConfig';
import { AccountController } from '../controllers/accountController';
import { AccountDeletionController } from '../controllers/accountDeletionController';
import { RolePolicyAuthorizer } from '../services/accountAuthorizer';
import { AccountService } from '../services/accountService';
import { MongooseAccountStore, type AccountStore } from '../services/accountStore';
import {
  createAuthRecordCleaner,
  createSalesForecastCleaner,
  createSalesUploadCleaner,
  createStoredFileCleaner,
  type AuthCollectionProvider,
} from '../services/ownedResourceCleaners';
import { KeyedLock } from './keyedLock';

export interface AppDependencies {
  config: AccountDeletionConfig;
  store: AccountStore;
  deletionController: AccountDeletionController;
  accountController: AccountController;
}

/**
 * Wire the deletion controller and its collaborators.
 * `authCollections` reaches the better-auth collections of the auth database.
 */
export function createDependencies(
  authCollections: AuthCollectionProvider,
  config: AccountDeletionConfig = loadAccountDeletionConfig()
): AppDependencies {
  const store = new MongooseAccountStore([
    createSalesUploadCleaner(),
    createSalesForecastCleaner(),
    createStoredFileCleaner('uploadedFiles', config.uploadsDir),
    createStoredFileCleaner('graphFiles', config.graphsDir),
    createAuthRecordCleaner(authCollections),
  ]);
  const authorizer = new RolePolicyAuthorizer();
  const deletionController = new AccountDeletionController({
    store,
    authorizer,
    lock: new KeyedLock(),
    leaseTtlMs: config.leaseTtlMs,
  });
  const accountController = new AccountController(
    deletionController,
    new AccountService(),
    authorizer
  );

  return { config, store, deletionController, accountController };
}
