/**
 * Repsync Error Codes
 *
 * Error codes are structured as REPSYNC_[CATEGORY][NUMBER]:
 * - V: Validation errors (V100-V199)
 * - C: Connection errors (C500-C599)
 * - A: Authentication errors (A600-A699)
 * - E: Encoding/decoding errors (E700-E799)
 * - S: Server-reported errors (S800-S899)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  REPSYNC_V100: {
    code: 'REPSYNC_V100',
    message: 'Invalid configuration',
    suggestion: 'Check the configuration values against their documented ranges.',
  },

  // Connection errors (C500-C599)
  REPSYNC_C500: {
    code: 'REPSYNC_C500',
    message: 'Failed to connect to WebSocket',
    suggestion: 'Check the server URL and network connectivity.',
  },
  REPSYNC_C501: {
    code: 'REPSYNC_C501',
    message: 'WebSocket disconnected',
    suggestion: 'Call connect() and wait for it to resolve before sending.',
  },
  REPSYNC_C502: {
    code: 'REPSYNC_C502',
    message: 'Invalid WebSocket URL',
    suggestion: 'Use an http, https, ws or wss base URL.',
  },
  REPSYNC_C503: {
    code: 'REPSYNC_C503',
    message: 'WebSocket connection timeout',
    suggestion: 'Increase connectTimeoutMs or check that the server is reachable.',
  },
  REPSYNC_C504: {
    code: 'REPSYNC_C504',
    message: 'WebSocket connection not found',
    suggestion: 'Register the channel with addConnection() before using it.',
  },
  REPSYNC_C505: {
    code: 'REPSYNC_C505',
    message: 'Failed to write to WebSocket',
    suggestion: 'The socket closed while sending. The message was not delivered.',
  },

  // Authentication errors (A600-A699)
  REPSYNC_A600: {
    code: 'REPSYNC_A600',
    message: 'Authentication required',
    suggestion: 'The server rejected a handshake sent without a token. Sign in so the credential provider can supply one.',
  },
  REPSYNC_A601: {
    code: 'REPSYNC_A601',
    message: 'Unauthorized access',
    suggestion: 'Refresh the access token and call connect() again.',
  },

  // Encoding/decoding errors (E700-E799)
  REPSYNC_E700: {
    code: 'REPSYNC_E700',
    message: 'Encoding error',
    suggestion: 'Message payloads must be JSON-serializable.',
  },
  REPSYNC_E701: {
    code: 'REPSYNC_E701',
    message: 'Decoding error',
    suggestion: 'The server sent a frame that does not match the protocol.',
  },

  // Server errors (S800-S899)
  REPSYNC_S800: {
    code: 'REPSYNC_S800',
    message: 'Server error',
    suggestion: undefined,
  },

  // Internal errors (X900-X999)
  REPSYNC_X900: {
    code: 'REPSYNC_X900',
    message: 'Internal error',
    suggestion: undefined,
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'validation'
  | 'connection'
  | 'authentication'
  | 'codec'
  | 'server'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(8);
  switch (letter) {
    case 'V':
      return 'validation';
    case 'C':
      return 'connection';
    case 'A':
      return 'authentication';
    case 'E':
      return 'codec';
    case 'S':
      return 'server';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
