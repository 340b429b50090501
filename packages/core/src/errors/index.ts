/**
 * Repsync Error System
 *
 * Structured errors with stable codes (REPSYNC_C501, REPSYNC_E701, ...),
 * categories, suggestions and cause chaining.
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
  AuthError,
  ChannelNotFoundError,
  CodecError,
  ConnectionError,
  RepsyncError,
  ServerError,
  ensureRepsyncError,
  toError,
  type RepsyncErrorOptions,
} from './repsync-error.js';
