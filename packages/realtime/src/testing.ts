/**
 * In-process socket stand-ins for tests. Nothing here touches the network.
 *
 * @example
 * ```typescript
 * const server = new FakeSocketServer();
 * const connection = new Connection(config, { socketFactory: server.factory });
 *
 * await connection.connect('https://api.example.test');
 * server.latest.deliverMessage(createProtocolMessage({ type: 'session_sync', payload }));
 * server.latest.drop();
 * ```
 *
 * @module testing
 */

import { AuthError } from '@repsync/core';
import {
  decodeProtocolMessage,
  encodeProtocolMessage,
  type ProtocolMessage,
} from './protocol/protocol-message.js';
import type { RealtimeSocket, SocketFactory, SocketListeners, SocketRequest } from './transport/types.js';

/**
 * How the fake server answers a new socket:
 * - `open`: accepts the handshake
 * - `refuse`: reports a connection error
 * - `unauthorized`: rejects the handshake with a 401
 * - `hang`: never answers
 */
export type FakeSocketBehavior = 'open' | 'refuse' | 'unauthorized' | 'hang';

export class FakeSocket implements RealtimeSocket {
  readonly sent: string[] = [];
  pingCount = 0;
  closed = false;
  closeCode: number | undefined;
  /** Rejects the next send() */
  sendError: Error | null = null;
  /** Rejects every ping() while set */
  pingError: Error | null = null;

  constructor(
    readonly request: SocketRequest,
    private readonly listeners: SocketListeners
  ) {}

  send(data: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('Socket is closed'));
    }
    const error = this.sendError;
    if (error) {
      this.sendError = null;
      return Promise.reject(error);
    }
    this.sent.push(data);
    return Promise.resolve();
  }

  ping(): Promise<void> {
    this.pingCount++;
    return this.pingError ? Promise.reject(this.pingError) : Promise.resolve();
  }

  close(code?: number): void {
    this.closed = true;
    this.closeCode = code;
  }

  /** Frames written by the client, decoded */
  get sentMessages(): ProtocolMessage[] {
    return this.sent.map((frame) => decodeProtocolMessage(frame));
  }

  // ── Server side ──────────────────────────────────────────

  accept(): void {
    this.listeners.onOpen();
  }

  deliver(frame: string | Uint8Array): void {
    this.listeners.onMessage(frame);
  }

  deliverMessage(message: ProtocolMessage): void {
    this.deliver(encodeProtocolMessage(message));
  }

  /** Close from the server side */
  drop(code = 1006, reason = ''): void {
    this.closed = true;
    this.listeners.onClose(code, reason);
  }

  fail(error: Error): void {
    this.listeners.onError(error);
  }
}

export class FakeSocketServer {
  readonly sockets: FakeSocket[] = [];
  behavior: FakeSocketBehavior | ((request: SocketRequest) => FakeSocketBehavior) = 'open';

  readonly factory: SocketFactory = (request, listeners) => {
    const socket = new FakeSocket(request, listeners);
    this.sockets.push(socket);

    const behavior = typeof this.behavior === 'function' ? this.behavior(request) : this.behavior;
    queueMicrotask(() => {
      switch (behavior) {
        case 'open':
          socket.accept();
          break;
        case 'refuse':
          socket.fail(new Error('connect ECONNREFUSED'));
          break;
        case 'unauthorized':
          socket.fail(new AuthError('REPSYNC_A601', 'Unauthorized access (HTTP 401)', { status: 401 }));
          break;
        case 'hang':
          break;
      }
    });

    return socket;
  };

  /** Most recently opened socket */
  get latest(): FakeSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) {
      throw new Error('No socket has been opened');
    }
    return socket;
  }
}
