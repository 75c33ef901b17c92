export * from './types';
export * from './db';
export * from './ofx/time';
export * from './ofx/account';
export * from './ofx/selector';
export * from './ofx/formatter';
export * from './ofx/document';
export { sumAmounts, normalizeAmount, isValidAmount } from './utils/money';
export { AppError, ErrorType, classifyError, formatError } from './utils/errors';
export {
  loadExportConfig,
  createConfigTemplate,
  type ExportConfig
} from './config/export';
