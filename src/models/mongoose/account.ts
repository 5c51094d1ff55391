import { Schema, model } from 'mongoose';
import type { IAccountDocument } from './types';

// Collection `accounts`; better-auth keeps its linked-provider rows in `account`
const accountSchema = new Schema<IAccountDocument>({
  email: { type: String, default: null },
  displayName: { type: String, default: null },
  role: {
    type: String,
    enum: ['user', 'admin'],
    default: 'user',
    required: true
  },
  status: {
    type: String,
    enum: ['active', 'pending_deletion', 'deleted'],
    default: 'active',
    required: true,
    index: true
  },
  deletionRequestedAt: { type: Date, default: null },
  deletedAt: { type: Date, default: null },
  deletionAttempts: { type: Number, default: 0 },
  lastDeletionError: { type: String, default: null },
  deletionLeaseExpiresAt: { type: Date, default: null },
}, {
  timestamps: true
});

// Retry sweeper lookup
accountSchema.index({ status: 1, deletionRequestedAt: 1 });

export const AccountModel = model<IAccountDocument>('Account', accountSchema);
