import { RepsyncError } from '@repsync/core';
import { z } from 'zod';

/**
 * How the delay between reconnect attempts grows.
 *
 * - `constant`: every attempt waits `reconnectDelayMs`
 * - `exponential`: attempt n waits `reconnectDelayMs * 2^(n-1)`, capped at `maxReconnectDelayMs`
 */
export type ReconnectBackoff = 'constant' | 'exponential';

/**
 * Immutable settings for one logical channel.
 */
export interface ChannelConfig {
  /** Unique channel name (e.g. `exercise_session`) */
  readonly id: string;
  /** Path appended to the base URL */
  readonly endpoint: string;
  /** Attach `Authorization: Bearer <token>` when a token is available */
  readonly requiresAuth: boolean;
  /** Reconnect after an unexpected drop */
  readonly autoReconnect: boolean;
  /** Reconnect attempts before the connection gives up */
  readonly maxReconnectAttempts: number;
  /** Delay before each reconnect attempt, in ms */
  readonly reconnectDelayMs: number;
  /** Growth of the reconnect delay */
  readonly reconnectBackoff: ReconnectBackoff;
  /** Upper bound for exponential backoff, in ms */
  readonly maxReconnectDelayMs: number;
  /** Transport-level ping interval, in ms */
  readonly heartbeatIntervalMs: number;
  /** Handshake timeout, in ms */
  readonly connectTimeoutMs: number;
  /** Headers sent with the upgrade request */
  readonly extraHeaders: Readonly<Record<string, string>>;
}

/**
 * Input accepted by {@link defineChannelConfig}. Only `id` and `endpoint` are required.
 */
export type ChannelConfigInput = Pick<ChannelConfig, 'id' | 'endpoint'> &
  Partial<Omit<ChannelConfig, 'id' | 'endpoint' | 'extraHeaders'>> & {
    extraHeaders?: Record<string, string>;
  };

/**
 * Defaults applied by {@link defineChannelConfig}
 */
export const DEFAULT_CHANNEL_CONFIG = {
  requiresAuth: true,
  autoReconnect: true,
  maxReconnectAttempts: 5,
  reconnectDelayMs: 2000,
  reconnectBackoff: 'constant',
  maxReconnectDelayMs: 30_000,
  heartbeatIntervalMs: 30_000,
  connectTimeoutMs: 10_000,
} as const satisfies Omit<ChannelConfig, 'id' | 'endpoint' | 'extraHeaders'>;

const channelConfigSchema = z
  .object({
    id: z.string().min(1),
    endpoint: z.string().min(1),
    requiresAuth: z.boolean().default(DEFAULT_CHANNEL_CONFIG.requiresAuth),
    autoReconnect: z.boolean().default(DEFAULT_CHANNEL_CONFIG.autoReconnect),
    maxReconnectAttempts: z.number().int().min(0).default(DEFAULT_CHANNEL_CONFIG.maxReconnectAttempts),
    reconnectDelayMs: z.number().positive().default(DEFAULT_CHANNEL_CONFIG.reconnectDelayMs),
    reconnectBackoff: z.enum(['constant', 'exponential']).default(DEFAULT_CHANNEL_CONFIG.reconnectBackoff),
    maxReconnectDelayMs: z.number().positive().default(DEFAULT_CHANNEL_CONFIG.maxReconnectDelayMs),
    heartbeatIntervalMs: z.number().positive().default(DEFAULT_CHANNEL_CONFIG.heartbeatIntervalMs),
    connectTimeoutMs: z.number().positive().default(DEFAULT_CHANNEL_CONFIG.connectTimeoutMs),
    extraHeaders: z.record(z.string(), z.string()).default({}),
  })
  .strict();

/**
 * Validate channel settings, apply defaults and freeze the result.
 *
 * @throws RepsyncError (REPSYNC_V100) when a value is out of range
 *
 * @example
 * ```typescript
 * const config = defineChannelConfig({
 *   id: 'exercise_session',
 *   endpoint: '/session/ws/',
 *   maxReconnectAttempts: 3,
 * });
 * ```
 */
export function defineChannelConfig(input: ChannelConfigInput): ChannelConfig {
  const result = channelConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new RepsyncError({
      code: 'REPSYNC_V100',
      message: `Invalid channel config "${input.id}": ${issues.join('; ')}`,
      context: { channelId: input.id, issues },
    });
  }

  return Object.freeze({
    ...result.data,
    extraHeaders: Object.freeze({ ...result.data.extraHeaders }),
  });
}

/**
 * Delay before reconnect attempt number `attempt` (1-based)
 */
export function computeReconnectDelay(config: ChannelConfig, attempt: number): number {
  if (config.reconnectBackoff === 'constant') {
    return config.reconnectDelayMs;
  }
  const delay = config.reconnectDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(delay, config.maxReconnectDelayMs);
}

/**
 * Channel used for collaborative exercise sessions
 */
export function exerciseSessionChannel(
  overrides: Partial<Omit<ChannelConfigInput, 'id'>> = {}
): ChannelConfig {
  return defineChannelConfig({
    id: 'exercise_session',
    endpoint: '/session/ws/',
    requiresAuth: true,
    autoReconnect: true,
    maxReconnectAttempts: 3,
    reconnectDelayMs: 2000,
    heartbeatIntervalMs: 30_000,
    connectTimeoutMs: 10_000,
    ...overrides,
  });
}
