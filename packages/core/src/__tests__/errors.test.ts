import { describe, expect, it } from 'vitest';
import {
  AuthError,
  ChannelNotFoundError,
  CodecError,
  ConnectionError,
  ERROR_CODES,
  RepsyncError,
  ServerError,
  ensureRepsyncError,
  getErrorCategory,
  toError,
} from '../errors/index.js';

describe('RepsyncError', () => {
  it('should take the default message and suggestion from the code table', () => {
    const error = new ConnectionError('REPSYNC_C501');
    expect(error.message).toBe('WebSocket disconnected');
    expect(error.suggestion).toBe(ERROR_CODES.REPSYNC_C501.suggestion);
    expect(error.category).toBe('connection');
    expect(error.context).toEqual({});
  });

  it('should allow a custom message and context', () => {
    const error = new RepsyncError({
      code: 'REPSYNC_V100',
      message: 'bad config',
      context: { field: 'reconnectDelayMs' },
    });
    expect(error.message).toBe('bad config');
    expect(error.category).toBe('validation');
    expect(error.context).toEqual({ field: 'reconnectDelayMs' });
  });

  it('should wrap an existing error and keep it as the cause', () => {
    const cause = new Error('socket hang up');
    const error = RepsyncError.wrap(cause, 'REPSYNC_C500', { channel: 'exercise_session' });
    expect(error.message).toBe('socket hang up');
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ channel: 'exercise_session' });
  });

  it('should chain repsync causes', () => {
    const inner = new ConnectionError('REPSYNC_C503');
    const outer = new ConnectionError('REPSYNC_C500', undefined, undefined, inner);
    expect(outer.cause).toMatchObject({ code: 'REPSYNC_C503', category: 'connection' });
  });

  it('should match codes and categories', () => {
    const error = new AuthError('REPSYNC_A601');
    expect(RepsyncError.isCode(error, 'REPSYNC_A601')).toBe(true);
    expect(RepsyncError.isCode(error, 'REPSYNC_A600')).toBe(false);
    expect(RepsyncError.isCategory(error, 'authentication')).toBe(true);
    expect(RepsyncError.isCode(new Error('plain'), 'REPSYNC_A601')).toBe(false);
  });
});

describe('error subclasses', () => {
  it('should name the missing channel', () => {
    const error = new ChannelNotFoundError('exercise_session');
    expect(error.name).toBe('ChannelNotFoundError');
    expect(error.code).toBe('REPSYNC_C504');
    expect(error.channelId).toBe('exercise_session');
    expect(error.message).toBe('WebSocket connection not found: exercise_session');
  });

  it('should keep the server message', () => {
    const error = new ServerError('session is full');
    expect(error.serverMessage).toBe('session is full');
    expect(error.message).toBe('Server error: session is full');
    expect(error.category).toBe('server');
  });

  it('should categorize codec errors', () => {
    expect(new CodecError('REPSYNC_E701').category).toBe('codec');
    expect(getErrorCategory('REPSYNC_E700')).toBe('codec');
    expect(getErrorCategory('REPSYNC_X900')).toBe('internal');
  });
});

describe('ensureRepsyncError', () => {
  it('should return repsync errors unchanged', () => {
    const error = new ConnectionError('REPSYNC_C500');
    expect(ensureRepsyncError(error)).toBe(error);
  });

  it('should wrap plain errors with the default code', () => {
    const wrapped = ensureRepsyncError(new Error('boom'));
    expect(wrapped.code).toBe('REPSYNC_X900');
    expect(wrapped.message).toBe('boom');
  });

  it('should stringify non-error values', () => {
    const wrapped = ensureRepsyncError('oops', 'REPSYNC_C500');
    expect(wrapped.code).toBe('REPSYNC_C500');
    expect(wrapped.message).toBe('oops');
  });

  it('should normalize unknown values with toError', () => {
    expect(toError(42).message).toBe('42');
  });
});
