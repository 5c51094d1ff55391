import { Schema, model } from 'mongoose';
import type { ISalesUploadDocument } from './types';

const salesUploadSchema = new Schema<ISalesUploadDocument>({
  accountId: { type: Schema.Types.ObjectId, ref: 'Account', required: true, index: true },
  originalName: { type: String, required: true },
  storedPath: { type: String, required: true },
  sizeBytes: { type: Number, required: true },
  rowCount: Number,
}, {
  timestamps: true
});

export const SalesUploadModel = model<ISalesUploadDocument>('SalesUpload', salesUploadSchema);
