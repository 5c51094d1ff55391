import type {
  AccountRole,
  AccountStatus,
  RequesterRole,
} from '../config/accountConfig';

export type { AccountRole, AccountStatus, RequesterRole } from '../config/accountConfig';

// Domain view of an account, decoupled from the mongoose document
export interface Account {
  id: string;
  status: AccountStatus;
  role: AccountRole;
  email: string | null;
  displayName: string | null;
  deletionRequestedAt: Date | null;
  deletedAt: Date | null;
  deletionAttempts: number;
  lastDeletionError: string | null;
}

/**
 * Authenticated principal asking for a deletion.
 * `service` is reserved for internal jobs and never stored on an account.
 */
export interface RequesterIdentity {
  id: string;
  role: RequesterRole;
}

export interface DeletionRequest {
  requester: RequesterIdentity;
  targetAccountId: string;
  requestedAt: Date;
}

export type DeletionStatus = 'success' | 'not_found' | 'unauthorized' | 'failed';

export type DeletionErrorCode =
  | 'INVALID_ACCOUNT_ID'
  | 'ACCOUNT_NOT_FOUND'
  | 'ACCOUNT_ALREADY_DELETED'
  | 'FORBIDDEN'
  | 'AUTHORIZATION_ERROR'
  | 'DELETION_IN_PROGRESS'
  | 'STATUS_TRANSITION_REJECTED'
  | 'CLEANUP_FAILED'
  | 'STORAGE_ERROR';

/** Number of records (or directories) removed per owned resource kind */
export type PurgeCounts = Readonly<Record<string, number>>;

export interface DeletionResult {
  readonly status: DeletionStatus;
  readonly accountId: string;
  /** True when this run continued a deletion left in `pending_deletion` */
  readonly resumed: boolean;
  readonly purged?: PurgeCounts;
  readonly error?: Readonly<{
    code: DeletionErrorCode;
    message: string;
  }>;
  readonly completedAt: Date;
}

export interface AccountDeletionStatus {
  accountId: string;
  status: AccountStatus;
  deletionRequestedAt: Date | null;
  deletedAt: Date | null;
  deletionAttempts: number;
  lastDeletionError: string | null;
}
