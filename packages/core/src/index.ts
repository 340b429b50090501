/**
 * @repsync/core - shared foundations for the repsync packages
 *
 * - Structured errors with stable codes ({@link RepsyncError})
 * - Structured logging ({@link Logger})
 * - ISO-8601 timestamp parsing for server payloads
 * - Environment configuration
 *
 * @packageDocumentation
 * @module @repsync/core
 */

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Identifiers
export { generateId } from './ids.js';

// Time
export {
  TIMESTAMP_FORMATS,
  formatIsoTimestamp,
  parseIsoTimestamp,
  tryParseIsoTimestamp,
} from './time/iso-timestamp.js';

// Configuration
export { loadEnvConfig, loggerConfigFromEnv, type EnvConfig } from './config/env.js';
