import type { DeletionStatus, PurgeCounts } from './account';

// API Response Types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export interface DeleteAccountResponse {
  accountId: string;
  status: DeletionStatus;
  resumed: boolean;
  purged?: PurgeCounts;
  message: string;
}

export interface RunJobResponse {
  job: string;
  result?: unknown;
}
