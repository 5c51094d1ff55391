import { Schema, model } from 'mongoose';
import type { ISalesForecastDocument } from './types';

const salesForecastSchema = new Schema<ISalesForecastDocument>({
  accountId: { type: Schema.Types.ObjectId, ref: 'Account', required: true, index: true },
  uploadId: { type: Schema.Types.ObjectId, ref: 'SalesUpload', required: true },
  horizonDays: { type: Number, default: 30 },
  graphPaths: [String],
}, {
  timestamps: true
});

export const SalesForecastModel = model<ISalesForecastDocument>('SalesForecast', salesForecastSchema);
