import type { Document, Types } from 'mongoose';
import type { AccountRole, AccountStatus } from '../../config/accountConfig';

// Account Document Interface
// _id is shared with the better-auth user document
export interface IAccountDocument extends Document {
  _id: Types.ObjectId;
  email?: string | null;
  displayName?: string | null;
  role: AccountRole;
  status: AccountStatus;
  deletionRequestedAt?: Date | null;
  deletedAt?: Date | null;
  deletionAttempts: number;
  lastDeletionError?: string | null;
  deletionLeaseExpiresAt?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

// Sales Upload Document Interface
export interface ISalesUploadDocument extends Document {
  _id: Types.ObjectId;
  accountId: Types.ObjectId;
  originalName: string;
  storedPath: string;
  sizeBytes: number;
  rowCount?: number;
  createdAt: Date;
  updatedAt: Date;
}

// Sales Forecast Document Interface
export interface ISalesForecastDocument extends Document {
  _id: Types.ObjectId;
  accountId: Types.ObjectId;
  uploadId: Types.ObjectId;
  horizonDays: number;
  graphPaths: string[];
  createdAt: Date;
  updatedAt: Date;
}
