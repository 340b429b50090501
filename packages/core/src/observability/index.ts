export {
  Logger,
  createLogger,
  noopLogger,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
