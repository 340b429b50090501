import { RepsyncError } from '@repsync/core';
import { describe, expect, it } from 'vitest';
import { toWebSocketUrl } from '../url.js';

describe('toWebSocketUrl', () => {
  it.each([
    ['http://api.example.test', 'ws://api.example.test/session/ws/'],
    ['https://api.example.test', 'wss://api.example.test/session/ws/'],
    ['ws://api.example.test', 'ws://api.example.test/session/ws/'],
    ['wss://api.example.test', 'wss://api.example.test/session/ws/'],
  ])('should map %s to %s', (baseUrl, expected) => {
    expect(toWebSocketUrl(baseUrl, '/session/ws/')).toBe(expected);
  });

  it('should treat the scheme case-insensitively', () => {
    expect(toWebSocketUrl('HTTPS://api.example.test', '/session/ws/')).toBe(
      'wss://api.example.test/session/ws/'
    );
  });

  it('should keep the port', () => {
    expect(toWebSocketUrl('http://localhost:8080', '/session/ws/')).toBe(
      'ws://localhost:8080/session/ws/'
    );
  });

  it('should replace the base path with the endpoint', () => {
    expect(toWebSocketUrl('https://api.example.test/v1/', 'session/ws/')).toBe(
      'wss://api.example.test/session/ws/'
    );
  });

  it.each(['ftp://api.example.test', 'file:///tmp/socket', 'not a url', ''])(
    'should reject %j as an invalid URL',
    (baseUrl) => {
      let thrown: unknown;
      try {
        toWebSocketUrl(baseUrl, '/session/ws/');
      } catch (error) {
        thrown = error;
      }
      expect(RepsyncError.isCode(thrown, 'REPSYNC_C502')).toBe(true);
    }
  );
});
