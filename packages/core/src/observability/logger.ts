/**
 * Structured logging for repsync.
 *
 * Entries go to a custom handler when one is configured, otherwise to the
 * console as JSON lines when `json` is set, otherwise nowhere. Components
 * built without a logger take their level and output from the environment
 * (see `loggerConfigFromEnv`).
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Log everything regardless of `level` */
  readonly debug?: boolean;
  /** Module name, `parent:child` for children */
  readonly module?: string;
  /** Receives every entry at or above the level */
  readonly handler?: (entry: LogEntry) => void;
  /** Write JSON lines to the console when no handler is set */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Logger for one repsync module. Children share the parent's level and
 * output and extend its module name.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'realtime', level: 'debug', json: true });
 * log.child('exercise_session').info('Connected', { url: 'wss://api.example.com/session/ws/' });
 * // {"level":"info","message":"Connected","module":"realtime:exercise_session",...}
 * ```
 */
export class Logger {
  readonly module: string;
  readonly level: LogLevel;

  private readonly handler: ((entry: LogEntry) => void) | undefined;
  private readonly json: boolean;

  constructor(config: LoggerConfig = {}) {
    this.module = config.module ?? 'repsync';
    this.level = config.debug ? 'debug' : (config.level ?? 'info');
    this.handler = config.handler;
    this.json = config.json ?? false;
  }

  child(subModule: string): Logger {
    return new Logger({
      module: `${this.module}:${subModule}`,
      level: this.level,
      handler: this.handler,
      json: this.json,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  /** The error's name, message and stack land under `context.error` */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write('error', message, {
      ...context,
      ...(error ? { error: { name: error.name, message: error.message, stack: error.stack } } : {}),
    });
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(context ? { context } : {}),
    };

    if (this.handler) {
      this.handler(entry);
    } else if (this.json) {
      CONSOLE_WRITERS[level](JSON.stringify(entry));
    }
  }
}

export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

/** Logger that drops every entry */
export const noopLogger: Logger = new Logger({ level: 'error', handler: () => {} });
