import { RepsyncError } from '@repsync/core';
import { describe, expect, it } from 'vitest';
import {
  DEFAULT_CHANNEL_CONFIG,
  computeReconnectDelay,
  defineChannelConfig,
  exerciseSessionChannel,
} from '../channel-config.js';

describe('defineChannelConfig', () => {
  it('should apply defaults', () => {
    const config = defineChannelConfig({ id: 'notifications', endpoint: '/notifications/ws/' });

    expect(config).toEqual({
      id: 'notifications',
      endpoint: '/notifications/ws/',
      ...DEFAULT_CHANNEL_CONFIG,
      extraHeaders: {},
    });
    expect(config.maxReconnectAttempts).toBe(5);
    expect(config.reconnectDelayMs).toBe(2000);
  });

  it('should freeze the config and its headers', () => {
    const config = defineChannelConfig({
      id: 'notifications',
      endpoint: '/notifications/ws/',
      extraHeaders: { 'X-Client': 'repsync-tests' },
    });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.extraHeaders)).toBe(true);
  });

  it('should not share the caller header object', () => {
    const headers = { 'X-Client': 'repsync-tests' };
    const config = defineChannelConfig({ id: 'a', endpoint: '/a', extraHeaders: headers });
    headers['X-Client'] = 'changed';

    expect(config.extraHeaders['X-Client']).toBe('repsync-tests');
  });

  it.each([
    { maxReconnectAttempts: -1 },
    { maxReconnectAttempts: 1.5 },
    { reconnectDelayMs: 0 },
    { heartbeatIntervalMs: -5 },
    { connectTimeoutMs: 0 },
  ])('should reject %j', (override) => {
    let thrown: unknown;
    try {
      defineChannelConfig({ id: 'bad', endpoint: '/bad', ...override });
    } catch (error) {
      thrown = error;
    }
    expect(RepsyncError.isCode(thrown, 'REPSYNC_V100')).toBe(true);
  });

  it('should reject an empty id', () => {
    expect(() => defineChannelConfig({ id: '', endpoint: '/bad' })).toThrow(/Invalid channel config/);
  });

  it('should accept zero reconnect attempts', () => {
    expect(defineChannelConfig({ id: 'a', endpoint: '/a', maxReconnectAttempts: 0 }).maxReconnectAttempts).toBe(0);
  });
});

describe('exerciseSessionChannel', () => {
  it('should describe the exercise session channel', () => {
    const config = exerciseSessionChannel();

    expect(config.id).toBe('exercise_session');
    expect(config.endpoint).toBe('/session/ws/');
    expect(config.requiresAuth).toBe(true);
    expect(config.maxReconnectAttempts).toBe(3);
    expect(config.reconnectDelayMs).toBe(2000);
    expect(config.reconnectBackoff).toBe('constant');
  });

  it('should accept overrides', () => {
    expect(exerciseSessionChannel({ maxReconnectAttempts: 1 }).maxReconnectAttempts).toBe(1);
  });
});

describe('computeReconnectDelay', () => {
  it('should keep a constant delay by default', () => {
    const config = defineChannelConfig({ id: 'a', endpoint: '/a', reconnectDelayMs: 2000 });

    expect([1, 2, 3].map((attempt) => computeReconnectDelay(config, attempt))).toEqual([2000, 2000, 2000]);
  });

  it('should double the delay and cap it with exponential backoff', () => {
    const config = defineChannelConfig({
      id: 'a',
      endpoint: '/a',
      reconnectDelayMs: 2000,
      reconnectBackoff: 'exponential',
      maxReconnectDelayMs: 30_000,
    });

    expect([1, 2, 3, 4, 5].map((attempt) => computeReconnectDelay(config, attempt))).toEqual([
      2000, 4000, 8000, 16_000, 30_000,
    ]);
  });
});
