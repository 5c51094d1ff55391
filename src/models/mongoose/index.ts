// Centralized exports for all mongoose models
export { AccountModel } from './account';
export { SalesUploadModel } from './salesUpload';
export { SalesForecastModel } from './salesForecast';

// Export document interfaces
export type {
  IAccountDocument,
  ISalesUploadDocument,
  ISalesForecastDocument,
} from './types';
