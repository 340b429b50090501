/**
 * One named WebSocket channel: connect, heartbeat, reconnect, send and
 * typed subscriptions.
 *
 * All connection state is written by the Connection itself. Every socket
 * attempt carries a generation number; callbacks from an abandoned socket
 * see a stale generation and are ignored. Every `connect()` and
 * `disconnect()` starts a new epoch; an attempt that outlives its epoch
 * rejects its caller and leaves state and `errors$` alone.
 *
 * @module connection
 */

import {
  ConnectionError,
  RepsyncError,
  createLogger,
  ensureRepsyncError,
  toError,
  type Logger,
} from '@repsync/core';
import {
  BehaviorSubject,
  EMPTY,
  Subject,
  distinctUntilChanged,
  filter,
  map,
  mergeMap,
  of,
  type Observable,
} from 'rxjs';
import {
  computeReconnectDelay,
  defineChannelConfig,
  type ChannelConfig,
  type ChannelConfigInput,
} from './channel-config.js';
import {
  ConnectionStates,
  connectionStatesEqual,
  type ConnectionState,
} from './connection-state.js';
import { anonymousCredentials, type CredentialProvider } from './credentials.js';
import { sleep } from './delay.js';
import type { MessageType } from './protocol/message-types.js';
import {
  encodeProtocolMessage,
  protocolMessageDecoder,
  type MessageDecoder,
  type ProtocolMessage,
} from './protocol/protocol-message.js';
import type { RealtimeSocket, SocketFactory } from './transport/types.js';
import { createWsSocket } from './transport/ws-socket.js';
import { toWebSocketUrl } from './url.js';

const CLIENT_CLOSE_CODE = 1000;

export interface ConnectionOptions {
  /** Token source for auth-required channels (default: no token) */
  credentials?: CredentialProvider;
  /** Opens sockets (default: the `ws` client) */
  socketFactory?: SocketFactory;
  /** Logger (default: silent logger named after the channel) */
  logger?: Logger;
}

/**
 * A single channel's socket and its lifecycle.
 *
 * @example
 * ```typescript
 * const connection = new Connection(exerciseSessionChannel(), {
 *   credentials: { getAccessToken: () => auth.token },
 * });
 *
 * connection.state$.subscribe((state) => render(describeConnectionState(state)));
 * connection.subscribe('session_sync').subscribe((message) => apply(message));
 *
 * await connection.connect('https://api.example.com');
 * ```
 */
export class Connection {
  readonly config: ChannelConfig;

  private readonly credentials: CredentialProvider;
  private readonly socketFactory: SocketFactory;
  private readonly logger: Logger;

  private readonly stateSubject = new BehaviorSubject<ConnectionState>(ConnectionStates.disconnected);
  private readonly framesSubject = new Subject<string | Uint8Array>();
  private readonly errorsSubject = new Subject<RepsyncError>();

  private socket: RealtimeSocket | null = null;
  private generation = 0;
  private epoch = 0;
  private attempts = 0;
  private manualDisconnect = false;
  private baseUrl: string | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private reconnectAbort: AbortController | null = null;
  private cancelHandshake: ((error: Error) => void) | null = null;
  private sendQueue: Promise<void> = Promise.resolve();

  constructor(config: ChannelConfig | ChannelConfigInput, options: ConnectionOptions = {}) {
    this.config = defineChannelConfig(config);
    this.credentials = options.credentials ?? anonymousCredentials;
    this.socketFactory = options.socketFactory ?? createWsSocket;
    this.logger = options.logger ?? createLogger({ module: `realtime:${this.config.id}` });
  }

  // ── Observables ──────────────────────────────────────────

  get id(): string {
    return this.config.id;
  }

  /** Connection state, deduplicated with {@link connectionStatesEqual} */
  get state$(): Observable<ConnectionState> {
    return this.stateSubject.pipe(distinctUntilChanged(connectionStatesEqual));
  }

  get state(): ConnectionState {
    return this.stateSubject.getValue();
  }

  get connected$(): Observable<boolean> {
    return this.stateSubject.pipe(
      map((state) => state.status === 'connected'),
      distinctUntilChanged()
    );
  }

  get isConnected(): boolean {
    return this.state.status === 'connected';
  }

  /** Every connection failure as it happens, recovered or not */
  get errors$(): Observable<RepsyncError> {
    return this.errorsSubject.asObservable();
  }

  /** Raw inbound frames */
  get messages$(): Observable<string | Uint8Array> {
    return this.framesSubject.asObservable();
  }

  /** Reconnect attempts since the last successful open */
  get reconnectAttempts(): number {
    return this.attempts;
  }

  // ── Lifecycle ────────────────────────────────────────────

  /**
   * Open the socket. Does nothing when already connecting or connected.
   *
   * A failed attempt rejects the caller and then takes the same path as a
   * lost socket: a reconnect is scheduled while `autoReconnect` allows it,
   * otherwise the state becomes `failed`. Authentication failures and an
   * invalid URL are never retried.
   *
   * @throws ConnectionError (REPSYNC_C500) with the underlying error as `cause`
   */
  async connect(baseUrl: string): Promise<void> {
    const { status } = this.state;
    if (status === 'connecting' || status === 'connected') {
      this.logger.debug('Connect ignored', { status });
      return;
    }

    const epoch = ++this.epoch;
    this.manualDisconnect = false;
    this.cancelReconnect();
    this.attempts = 0;
    this.baseUrl = baseUrl;

    try {
      await this.open(baseUrl);
    } catch (error) {
      const cause = toError(error);
      const failure = new ConnectionError(
        'REPSYNC_C500',
        `Failed to connect channel ${this.config.id}: ${cause.message}`,
        { channelId: this.config.id },
        cause
      );

      if (epoch !== this.epoch) {
        this.logger.debug('Superseded connect attempt settled', { error: cause.message });
        throw failure;
      }

      this.logger.error('Connect failed', cause);
      if (RepsyncError.isCategory(cause, 'authentication') || RepsyncError.isCode(cause, 'REPSYNC_C502')) {
        this.errorsSubject.next(failure);
        this.setState(ConnectionStates.failed(failure));
      } else {
        this.handleFailure(failure);
      }
      throw failure;
    }
  }

  /**
   * Close the socket and stop every timer. A pending reconnect never
   * resumes afterwards. Safe to call repeatedly.
   */
  disconnect(): void {
    this.epoch++;
    this.manualDisconnect = true;
    this.cancelReconnect();
    this.cancelHandshake?.(
      new ConnectionError('REPSYNC_C501', 'Connection attempt cancelled by disconnect', {
        channelId: this.config.id,
      })
    );
    this.releaseSocket(CLIENT_CLOSE_CODE, 'Client disconnect');

    if (this.state.status !== 'disconnected') {
      this.logger.info('Disconnected');
    }
    this.setState(ConnectionStates.disconnected);
  }

  /** Disconnect, then connect again (e.g. after a token refresh) */
  async reconnect(baseUrl: string): Promise<void> {
    this.disconnect();
    await this.connect(baseUrl);
  }

  /** Disconnect and complete every stream */
  dispose(): void {
    this.disconnect();
    this.stateSubject.complete();
    this.framesSubject.complete();
    this.errorsSubject.complete();
  }

  // ── Messaging ────────────────────────────────────────────

  /**
   * Send one envelope. Concurrent calls are written one at a time in call order.
   *
   * @throws ConnectionError (REPSYNC_C501) when not connected
   * @throws CodecError (REPSYNC_E700) when the message cannot be serialized
   * @throws ConnectionError (REPSYNC_C505) when the socket write fails
   */
  async send(message: ProtocolMessage): Promise<void> {
    if (!this.isConnected) {
      throw this.notConnected(message.type);
    }
    const data = encodeProtocolMessage(message);

    const write = this.sendQueue.then(() => this.write(data, message.type));
    // Failures reach the caller through `write`; the queue itself keeps going
    this.sendQueue = write.catch(() => undefined);
    return write;
  }

  /**
   * Decoded envelopes of the given type(s), or all of them.
   * Frames that fail to decode are logged and skipped.
   */
  subscribe(types?: MessageType | readonly MessageType[]): Observable<ProtocolMessage> {
    const wanted: ReadonlySet<MessageType> | null =
      types === undefined ? null : new Set(typeof types === 'string' ? [types] : types);

    return this.subscribeWith(protocolMessageDecoder).pipe(
      filter((message) => wanted === null || wanted.has(message.type))
    );
  }

  /** Inbound frames run through a custom decoder */
  subscribeWith<T>(decoder: MessageDecoder<T>): Observable<T> {
    return this.framesSubject.pipe(
      mergeMap((frame) => {
        try {
          return of(decoder.decode(frame));
        } catch (error) {
          this.logger.warn('Dropped undecodable frame', {
            decoder: decoder.name,
            error: toError(error).message,
          });
          return EMPTY;
        }
      })
    );
  }

  // ── Private ──────────────────────────────────────────────

  private async open(baseUrl: string): Promise<void> {
    const generation = ++this.generation;
    this.setState(ConnectionStates.connecting);

    const url = toWebSocketUrl(baseUrl, this.config.endpoint);
    const headers = await this.buildHeaders();
    if (generation !== this.generation) {
      throw this.superseded();
    }

    this.logger.debug('Opening socket', { url, authenticated: 'Authorization' in headers });

    await new Promise<void>((resolve, reject) => {
      let settled = false;

      const settle = (error?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.cancelHandshake = null;
        if (error) {
          if (generation === this.generation) this.releaseSocket();
          reject(error);
        } else {
          resolve();
        }
      };

      const timer = setTimeout(() => {
        settle(
          new ConnectionError(
            'REPSYNC_C503',
            `WebSocket connection timeout after ${this.config.connectTimeoutMs}ms`,
            { url, timeoutMs: this.config.connectTimeoutMs }
          )
        );
      }, this.config.connectTimeoutMs);

      this.cancelHandshake = settle;

      try {
        const socket = this.socketFactory(
          { url, headers, connectTimeoutMs: this.config.connectTimeoutMs },
          {
            onOpen: () => settle(),
            onMessage: (frame) => {
              if (generation === this.generation) this.framesSubject.next(frame);
            },
            onClose: (code, reason) => {
              const error = new ConnectionError(
                'REPSYNC_C500',
                `WebSocket closed (code ${code}${reason ? `: ${reason}` : ''})`,
                { url, code, reason }
              );
              if (settled) this.handleSocketLost(generation, error);
              else settle(error);
            },
            onError: (error) => {
              if (settled) this.handleSocketLost(generation, error);
              else settle(error);
            },
          }
        );

        if (generation === this.generation) {
          this.socket = socket;
        } else {
          socket.close();
        }
      } catch (error) {
        settle(toError(error));
      }
    });

    if (generation !== this.generation) {
      throw this.superseded();
    }

    this.attempts = 0;
    this.startHeartbeat(generation);
    this.setState(ConnectionStates.connected);
    this.logger.info('Connected', { url });
  }

  private async buildHeaders(): Promise<Record<string, string>> {
    const headers: Record<string, string> = {};

    if (this.config.requiresAuth) {
      const token = await this.credentials.getAccessToken();
      if (token) {
        headers['Authorization'] = `Bearer ${token}`;
      } else {
        this.logger.warn('No access token available for auth-required channel');
      }
    }

    return { ...headers, ...this.config.extraHeaders };
  }

  private async write(data: string, type: MessageType): Promise<void> {
    const socket = this.socket;
    if (socket === null || !this.isConnected) {
      throw this.notConnected(type);
    }

    try {
      await socket.send(data);
    } catch (error) {
      const cause = toError(error);
      throw new ConnectionError(
        'REPSYNC_C505',
        `Failed to write ${type} message: ${cause.message}`,
        { channelId: this.config.id, type },
        cause
      );
    }

    this.logger.debug('Sent', { type, bytes: data.length });
  }

  private handleSocketLost(generation: number, error: Error): void {
    if (generation !== this.generation) return;
    this.releaseSocket();
    this.handleFailure(ensureRepsyncError(error, 'REPSYNC_C500'));
  }

  private handleFailure(error: RepsyncError): void {
    this.errorsSubject.next(error);
    if (this.manualDisconnect) return;

    if (RepsyncError.isCategory(error, 'authentication')) {
      this.logger.error('Authentication rejected, not reconnecting', error);
      this.setState(ConnectionStates.failed(error));
      return;
    }

    const baseUrl = this.baseUrl;
    if (
      baseUrl !== null &&
      this.config.autoReconnect &&
      this.attempts < this.config.maxReconnectAttempts
    ) {
      this.logger.warn('Connection lost', { error: error.message });
      this.scheduleReconnect(baseUrl);
      return;
    }

    const terminal = this.config.autoReconnect
      ? new ConnectionError(
          'REPSYNC_C500',
          `Gave up after ${this.attempts} reconnect attempts: ${error.message}`,
          { channelId: this.config.id, attempts: this.attempts },
          error
        )
      : error;
    this.logger.error('Connection failed', terminal);
    this.setState(ConnectionStates.failed(terminal));
  }

  private scheduleReconnect(baseUrl: string): void {
    this.attempts++;
    const attempt = this.attempts;
    const delayMs = computeReconnectDelay(this.config, attempt);
    const abort = new AbortController();
    this.reconnectAbort = abort;

    this.setState(ConnectionStates.reconnecting(attempt));
    this.logger.info('Reconnecting', {
      attempt,
      maxAttempts: this.config.maxReconnectAttempts,
      delayMs,
    });

    this.runReconnect(baseUrl, delayMs, abort, this.epoch).catch((error: unknown) => {
      this.logger.error('Reconnect task failed', toError(error));
    });
  }

  private async runReconnect(
    baseUrl: string,
    delayMs: number,
    abort: AbortController,
    epoch: number
  ): Promise<void> {
    const elapsed = await sleep(delayMs, abort.signal);
    if (!elapsed || this.manualDisconnect || this.reconnectAbort !== abort) return;
    this.reconnectAbort = null;

    try {
      await this.open(baseUrl);
      this.logger.info('Reconnected');
    } catch (error) {
      if (this.manualDisconnect || epoch !== this.epoch) return;
      this.handleFailure(ensureRepsyncError(error, 'REPSYNC_C500'));
    }
  }

  private cancelReconnect(): void {
    this.reconnectAbort?.abort();
    this.reconnectAbort = null;
  }

  private startHeartbeat(generation: number): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      const socket = this.socket;
      if (socket === null || generation !== this.generation) return;

      socket.ping().catch((error: unknown) => {
        const cause = toError(error);
        this.logger.warn('Heartbeat failed', { error: cause.message });
        this.handleSocketLost(
          generation,
          new ConnectionError(
            'REPSYNC_C500',
            `Heartbeat failed: ${cause.message}`,
            { channelId: this.config.id },
            cause
          )
        );
      });
    }, this.config.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  /** Abandon the current socket; its late callbacks become stale */
  private releaseSocket(code?: number, reason?: string): void {
    this.generation++;
    this.stopHeartbeat();
    const socket = this.socket;
    this.socket = null;
    socket?.close(code, reason);
  }

  private setState(state: ConnectionState): void {
    this.stateSubject.next(state);
  }

  private notConnected(type: MessageType): ConnectionError {
    return new ConnectionError('REPSYNC_C501', `Channel ${this.config.id} is not connected`, {
      channelId: this.config.id,
      type,
    });
  }

  private superseded(): ConnectionError {
    return new ConnectionError('REPSYNC_C501', 'Connection attempt cancelled by disconnect', {
      channelId: this.config.id,
    });
  }
}
