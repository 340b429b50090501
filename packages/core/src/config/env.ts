import { z } from 'zod';
import { RepsyncError } from '../errors/index.js';
import type { LogLevel, LoggerConfig } from '../observability/index.js';

const envSchema = z.object({
  REPSYNC_BASE_URL: z.string().url().optional(),
  REPSYNC_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  REPSYNC_DEBUG: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => value === 'true' || value === '1'),
});

/**
 * Process-level settings read from the environment
 */
export interface EnvConfig {
  /** Base URL of the realtime server (http, https, ws or wss) */
  baseUrl?: string;
  /** Minimum log level; unset keeps default loggers silent */
  logLevel?: LogLevel;
  /** Log everything */
  debug: boolean;
}

/**
 * Read repsync settings from environment variables.
 *
 * | Variable | Default |
 * |---|---|
 * | `REPSYNC_BASE_URL` | unset |
 * | `REPSYNC_LOG_LEVEL` | unset |
 * | `REPSYNC_DEBUG` | `false` |
 *
 * @throws RepsyncError (REPSYNC_V100) listing every invalid variable
 */
export function loadEnvConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new RepsyncError({
      code: 'REPSYNC_V100',
      message: `Invalid environment configuration: ${issues.join('; ')}`,
      context: { issues },
    });
  }

  return {
    baseUrl: result.data.REPSYNC_BASE_URL,
    logLevel: result.data.REPSYNC_LOG_LEVEL,
    debug: result.data.REPSYNC_DEBUG,
  };
}

/**
 * Logger settings for components built without a logger. Console JSON
 * output is on only when `REPSYNC_LOG_LEVEL` or `REPSYNC_DEBUG` is set.
 */
export function loggerConfigFromEnv(env: EnvConfig): LoggerConfig {
  return {
    level: env.logLevel ?? 'info',
    debug: env.debug,
    json: env.debug || env.logLevel !== undefined,
  };
}
