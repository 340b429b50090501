import { noopLogger } from '@repsync/core';
import { firstValueFrom } from 'rxjs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { WebSocketServer, type WebSocket } from 'ws';
import { defineChannelConfig } from '../channel-config.js';
import { Connection } from '../connection.js';
import { staticCredentials } from '../credentials.js';
import { createProtocolMessage, encodeProtocolMessage } from '../protocol/protocol-message.js';

describe('createWsSocket', () => {
  let wss: WebSocketServer;
  let baseUrl: string;
  let connection: Connection | undefined;

  beforeEach(async () => {
    wss = new WebSocketServer({
      host: '127.0.0.1',
      port: 0,
      verifyClient: (info, done) => {
        if (info.req.headers.authorization === 'Bearer test-token') {
          done(true);
        } else {
          done(false, 401, 'Unauthorized');
        }
      },
    });
    await new Promise<void>((resolve) => wss.once('listening', () => resolve()));
    const address = wss.address();
    if (typeof address === 'string' || address === null) {
      throw new Error(`Unexpected server address: ${address}`);
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    connection?.dispose();
    connection = undefined;
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  });

  function createConnection(token: string): Connection {
    return new Connection(
      defineChannelConfig({
        id: 'exercise_session',
        endpoint: '/session/ws/',
        autoReconnect: false,
        extraHeaders: { 'X-Client': 'repsync-tests' },
      }),
      { credentials: staticCredentials(token), logger: noopLogger }
    );
  }

  it('should exchange frames with a ws server', async () => {
    const serverSide = new Promise<{ socket: WebSocket; path: string | undefined; client: string | string[] | undefined }>(
      (resolve) => {
        wss.once('connection', (socket, request) => {
          resolve({ socket, path: request.url, client: request.headers['x-client'] });
        });
      }
    );

    connection = createConnection('test-token');
    const incoming = firstValueFrom(connection.subscribe('session_sync'));
    await connection.connect(baseUrl);

    const { socket, path, client } = await serverSide;
    expect(path).toBe('/session/ws/');
    expect(client).toBe('repsync-tests');

    const clientFrame = new Promise<string>((resolve) => {
      socket.once('message', (data) => resolve(String(data)));
    });
    await connection.send(createProtocolMessage({ id: 'client-1', type: 'sync_request', sessionId: 's1' }));
    expect(JSON.parse(await clientFrame)).toMatchObject({
      id: 'client-1',
      type: 'sync_request',
      session_id: 's1',
    });

    socket.send(encodeProtocolMessage(createProtocolMessage({ id: 'server-1', type: 'session_sync', version: 2 })));
    const message = await incoming;
    expect(message.id).toBe('server-1');
    expect(message.version).toBe(2);
  });

  it('should report a rejected handshake as unauthorized', async () => {
    connection = createConnection('wrong-token');

    await expect(connection.connect(baseUrl)).rejects.toMatchObject({
      code: 'REPSYNC_C500',
      cause: { name: 'AuthError', code: 'REPSYNC_A601' },
    });
    expect(connection.state.status).toBe('failed');
  });

  it('should report a handshake without a token as requiring authentication', async () => {
    connection = createConnection('');

    await expect(connection.connect(baseUrl)).rejects.toMatchObject({
      code: 'REPSYNC_C500',
      cause: { name: 'AuthError', code: 'REPSYNC_A600', message: 'Authentication required (HTTP 401)' },
    });
    expect(connection.state.status).toBe('failed');
  });

  it('should fail over to the failure path when the server closes the socket', async () => {
    wss.once('connection', (socket) => socket.close(4000, 'session ended'));
    const current = createConnection('test-token');
    connection = current;
    const failed = new Promise<string>((resolve) => {
      current.state$.subscribe((state) => {
        if (state.status === 'failed') resolve(state.error.message);
      });
    });

    await current.connect(baseUrl);

    expect(await failed).toBe('WebSocket closed (code 4000: session ended)');
  });
});
