/**
 * driftsync error system
 *
 * - Unique error codes (DRIFT_I100, DRIFT_C200, etc.)
 * - Suggestions that distinguish "resync" from "replace"
 * - Error categorization and chaining
 *
 * @example
 * ```typescript
 * import { DriftError } from '@driftsync/core';
 *
 * if (DriftError.isCode(error, 'DRIFT_C200')) {
 *   await manager.requestFullSync();
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  CausalityError,
  DriftError,
  IntegrityError,
  ensureDriftError,
  type DriftErrorOptions,
  type SerializedDriftError,
} from './drift-error.js';
