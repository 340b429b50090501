/**
 * RepsyncError - structured error class shared by every repsync package
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a RepsyncError
 */
export interface RepsyncErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Error class carrying a stable code, a category and debugging context.
 *
 * @example
 * ```typescript
 * try {
 *   await registry.send('exercise_session', message);
 * } catch (error) {
 *   if (RepsyncError.isCode(error, 'REPSYNC_C501')) {
 *     // not connected, the optimistic state stays local until the next sync
 *   }
 * }
 * ```
 */
export class RepsyncError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: RepsyncErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'RepsyncError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RepsyncError);
    }
  }

  /**
   * Wrap an existing error with a RepsyncError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): RepsyncError {
    return new RepsyncError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is a RepsyncError
   */
  static isRepsyncError(error: unknown): error is RepsyncError {
    return error instanceof RepsyncError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): error is RepsyncError {
    return RepsyncError.isRepsyncError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory<C extends ErrorCategory>(error: unknown, category: C): error is RepsyncError & { readonly category: C } {
    return RepsyncError.isRepsyncError(error) && error.category === category;
  }
}

/**
 * Connection error (connect, send, URL and timeout failures)
 */
export class ConnectionError extends RepsyncError {
  constructor(code: ErrorCode, message?: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'ConnectionError';
  }
}

/**
 * Raised when a channel id has not been registered
 */
export class ChannelNotFoundError extends RepsyncError {
  /** The channel id that was not found */
  readonly channelId: string;

  constructor(channelId: string) {
    super({
      code: 'REPSYNC_C504',
      message: `WebSocket connection not found: ${channelId}`,
      context: { channelId },
    });

    this.name = 'ChannelNotFoundError';
    this.channelId = channelId;
  }
}

/**
 * Authentication error. A connection never retries on its own after one.
 */
export class AuthError extends RepsyncError {
  constructor(code: ErrorCode, message?: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'AuthError';
  }
}

/**
 * Encoding or decoding error
 */
export class CodecError extends RepsyncError {
  constructor(code: ErrorCode, message?: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'CodecError';
  }
}

/**
 * Error reported by the server in an `error` frame
 */
export class ServerError extends RepsyncError {
  /** Message as sent by the server */
  readonly serverMessage: string;

  constructor(serverMessage: string, context?: Record<string, unknown>) {
    super({
      code: 'REPSYNC_S800',
      message: `Server error: ${serverMessage}`,
      context,
    });

    this.name = 'ServerError';
    this.serverMessage = serverMessage;
  }
}

/**
 * Helper function to ensure errors are RepsyncErrors
 */
export function ensureRepsyncError(
  error: unknown,
  defaultCode: ErrorCode = 'REPSYNC_X900'
): RepsyncError {
  if (RepsyncError.isRepsyncError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return RepsyncError.wrap(error, defaultCode);
  }

  return new RepsyncError({
    code: defaultCode,
    message: String(error),
  });
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
