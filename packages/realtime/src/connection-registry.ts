/**
 * Registry of named channels sharing one base URL and credential source.
 *
 * Owned by the composition root and passed by reference. Channels are
 * independent: a failing channel never blocks another.
 *
 * @module connection-registry
 */

import {
  ChannelNotFoundError,
  RepsyncError,
  createLogger,
  loadEnvConfig,
  loggerConfigFromEnv,
  toError,
  type EnvConfig,
  type Logger,
} from '@repsync/core';
import { BehaviorSubject, distinctUntilChanged, map, of, switchMap, type Observable } from 'rxjs';
import type { ChannelConfig, ChannelConfigInput } from './channel-config.js';
import { Connection } from './connection.js';
import { ConnectionStates, connectionStatesEqual, type ConnectionState } from './connection-state.js';
import { anonymousCredentials, type CredentialProvider } from './credentials.js';
import type { MessageType } from './protocol/message-types.js';
import type { ProtocolMessage } from './protocol/protocol-message.js';
import type { SocketFactory } from './transport/types.js';

export interface ConnectionRegistryConfig {
  /** Server base URL (`http(s)://` or `ws(s)://`, default: `env.baseUrl`) */
  baseUrl?: string;
  /** Token source for auth-required channels */
  credentials?: CredentialProvider;
  /** Socket factory handed to every connection */
  socketFactory?: SocketFactory;
  /** Logger (default: configured from `env`) */
  logger?: Logger;
  /** Environment settings (default: read from `process.env`) */
  env?: EnvConfig;
}

/** Outcome of {@link ConnectionRegistry.connectAll} */
export interface ConnectAllResult {
  readonly connected: readonly string[];
  readonly failed: readonly { readonly channelId: string; readonly error: Error }[];
}

/**
 * @example
 * ```typescript
 * const registry = new ConnectionRegistry({
 *   baseUrl: 'https://api.example.com',
 *   credentials: authStore,
 * });
 *
 * registry.addConnection(exerciseSessionChannel());
 * await registry.connect('exercise_session');
 *
 * registry.observeConnectionStatus('exercise_session').subscribe(setOnline);
 * ```
 */
export class ConnectionRegistry {
  private readonly baseUrl: string;
  private readonly credentials: CredentialProvider;
  private readonly socketFactory: SocketFactory | undefined;
  private readonly logger: Logger;
  private readonly connectionsSubject = new BehaviorSubject<ReadonlyMap<string, Connection>>(new Map());

  /**
   * @throws RepsyncError (REPSYNC_V100) when no base URL is given or set in the environment
   */
  constructor(config: ConnectionRegistryConfig) {
    const env = config.env ?? loadEnvConfig();
    const baseUrl = config.baseUrl ?? env.baseUrl;
    if (baseUrl === undefined) {
      throw new RepsyncError({
        code: 'REPSYNC_V100',
        message: 'No base URL configured: pass baseUrl or set REPSYNC_BASE_URL',
      });
    }

    this.baseUrl = baseUrl;
    this.credentials = config.credentials ?? anonymousCredentials;
    this.socketFactory = config.socketFactory;
    this.logger = config.logger ?? createLogger({ module: 'realtime', ...loggerConfigFromEnv(env) });
  }

  /** Registered channel ids */
  get channelIds(): string[] {
    return [...this.connections.keys()];
  }

  /**
   * Register a channel. A duplicate id logs a warning and returns the
   * existing connection unchanged.
   */
  addConnection(config: ChannelConfig | ChannelConfigInput): Connection {
    const existing = this.connections.get(config.id);
    if (existing) {
      this.logger.warn('Connection already registered', { channelId: config.id });
      return existing;
    }

    const connection = new Connection(config, {
      credentials: this.credentials,
      socketFactory: this.socketFactory,
      logger: this.logger.child(config.id),
    });

    const next = new Map(this.connections);
    next.set(config.id, connection);
    this.connectionsSubject.next(next);
    this.logger.debug('Connection added', { channelId: config.id });
    return connection;
  }

  /** Disconnect and forget a channel. Unknown ids are ignored. */
  removeConnection(channelId: string): void {
    const connection = this.connections.get(channelId);
    if (!connection) return;

    const next = new Map(this.connections);
    next.delete(channelId);
    this.connectionsSubject.next(next);
    connection.dispose();
    this.logger.debug('Connection removed', { channelId });
  }

  has(channelId: string): boolean {
    return this.connections.has(channelId);
  }

  getConnection(channelId: string): Connection | undefined {
    return this.connections.get(channelId);
  }

  /** @throws ChannelNotFoundError */
  async connect(channelId: string): Promise<void> {
    await this.require(channelId).connect(this.baseUrl);
  }

  /** @throws ChannelNotFoundError */
  disconnect(channelId: string): void {
    this.require(channelId).disconnect();
  }

  /** @throws ChannelNotFoundError */
  async send(channelId: string, message: ProtocolMessage): Promise<void> {
    await this.require(channelId).send(message);
  }

  /** @throws ChannelNotFoundError */
  subscribe(channelId: string, types?: MessageType | readonly MessageType[]): Observable<ProtocolMessage> {
    return this.require(channelId).subscribe(types);
  }

  /**
   * Connect every registered channel. Each channel is attempted
   * independently and failures are reported, not thrown.
   */
  async connectAll(): Promise<ConnectAllResult> {
    const entries = [...this.connections.entries()];
    const results = await Promise.allSettled(
      entries.map(([, connection]) => connection.connect(this.baseUrl))
    );

    const connected: string[] = [];
    const failed: { channelId: string; error: Error }[] = [];
    results.forEach((result, index) => {
      const channelId = entries[index]?.[0] ?? '';
      if (result.status === 'fulfilled') {
        connected.push(channelId);
      } else {
        const error = toError(result.reason);
        this.logger.error('Channel failed to connect', error, { channelId });
        failed.push({ channelId, error });
      }
    });

    return { connected, failed };
  }

  disconnectAll(): void {
    for (const connection of this.connections.values()) {
      connection.disconnect();
    }
  }

  /**
   * Reconnect every connected auth-required channel so the new token is
   * sent. Call after the credential provider's token changes.
   */
  async reconnectAuthenticated(): Promise<ConnectAllResult> {
    const targets = [...this.connections.values()].filter(
      (connection) => connection.config.requiresAuth && connection.isConnected
    );
    const results = await Promise.allSettled(
      targets.map((connection) => connection.reconnect(this.baseUrl))
    );

    const connected: string[] = [];
    const failed: { channelId: string; error: Error }[] = [];
    results.forEach((result, index) => {
      const channelId = targets[index]?.id ?? '';
      if (result.status === 'fulfilled') {
        connected.push(channelId);
      } else {
        const error = toError(result.reason);
        this.logger.error('Channel failed to reconnect', error, { channelId });
        failed.push({ channelId, error });
      }
    });

    return { connected, failed };
  }

  /**
   * State of a channel. Emits `disconnected` while the id is unknown and
   * follows the channel once it is registered.
   */
  observeConnectionState(channelId: string): Observable<ConnectionState> {
    return this.connectionsSubject.pipe(
      switchMap((connections) => connections.get(channelId)?.state$ ?? of(ConnectionStates.disconnected)),
      distinctUntilChanged(connectionStatesEqual)
    );
  }

  /** Whether a channel is connected; `false` for unknown ids */
  observeConnectionStatus(channelId: string): Observable<boolean> {
    return this.observeConnectionState(channelId).pipe(
      map((state) => state.status === 'connected'),
      distinctUntilChanged()
    );
  }

  isConnected(channelId: string): boolean {
    return this.connections.get(channelId)?.isConnected ?? false;
  }

  getConnectionState(channelId: string): ConnectionState {
    return this.connections.get(channelId)?.state ?? ConnectionStates.disconnected;
  }

  getAllConnectionStates(): Record<string, ConnectionState> {
    const states: Record<string, ConnectionState> = {};
    for (const [channelId, connection] of this.connections) {
      states[channelId] = connection.state;
    }
    return states;
  }

  /** Dispose every connection and complete the registry's streams */
  dispose(): void {
    for (const connection of this.connections.values()) {
      connection.dispose();
    }
    this.connectionsSubject.next(new Map());
    this.connectionsSubject.complete();
  }

  private get connections(): ReadonlyMap<string, Connection> {
    return this.connectionsSubject.getValue();
  }

  private require(channelId: string): Connection {
    const connection = this.connections.get(channelId);
    if (!connection) {
      throw new ChannelNotFoundError(channelId);
    }
    return connection;
  }
}
