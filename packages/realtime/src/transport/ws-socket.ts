import { AuthError, ConnectionError } from '@repsync/core';
import { WebSocket, type RawData } from 'ws';
import type { RealtimeSocket, SocketFactory } from './types.js';

const NORMAL_CLOSURE = 1000;

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Socket factory backed by the `ws` client.
 *
 * A 401 or 403 answer to the upgrade request is reported as an
 * {@link AuthError} so the connection does not retry it: `REPSYNC_A600`
 * when no Authorization header was sent, `REPSYNC_A601` otherwise.
 */
export const createWsSocket: SocketFactory = (request, listeners): RealtimeSocket => {
  const ws = new WebSocket(request.url, {
    headers: { ...request.headers },
    handshakeTimeout: request.connectTimeoutMs,
  });

  ws.on('open', () => listeners.onOpen());

  ws.on('message', (data, isBinary) => {
    const buffer = toBuffer(data);
    listeners.onMessage(isBinary ? new Uint8Array(buffer) : buffer.toString('utf8'));
  });

  ws.on('close', (code, reason) => listeners.onClose(code, reason.toString()));

  ws.on('error', (error) => listeners.onError(error));

  ws.on('unexpected-response', (_req, res) => {
    const status = res.statusCode ?? 0;
    const authenticated = 'Authorization' in request.headers;
    const error =
      status === 401 || status === 403
        ? new AuthError(
            authenticated ? 'REPSYNC_A601' : 'REPSYNC_A600',
            `${authenticated ? 'Unauthorized access' : 'Authentication required'} (HTTP ${status})`,
            { url: request.url, status }
          )
        : new ConnectionError('REPSYNC_C500', `Unexpected server response (HTTP ${status})`, {
            url: request.url,
            status,
          });
    listeners.onError(error);
    ws.terminate();
  });

  return {
    send: (data) =>
      new Promise<void>((resolve, reject) => {
        ws.send(data, (error) => (error ? reject(error) : resolve()));
      }),

    ping: () =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error('WebSocket is not open'));
          return;
        }
        ws.ping(undefined, undefined, (error) => (error ? reject(error) : resolve()));
      }),

    close: (code = NORMAL_CLOSURE, reason) => {
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else if (ws.readyState === WebSocket.OPEN) {
        ws.close(code, reason);
      }
    },
  };
};
