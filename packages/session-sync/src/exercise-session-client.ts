/**
 * ExerciseSessionClient - entry point for the UI.
 *
 * Owns the `exercise_session` channel, the state store and the protocol
 * handler. Local mutations are applied to the store first and then sent
 * when the channel is up. Every time the channel becomes connected with
 * a session loaded, a `sync_request` asks the server for the
 * authoritative state.
 *
 * @module exercise-session-client
 */

import {
  createLogger,
  generateId,
  loadEnvConfig,
  loggerConfigFromEnv,
  toError,
  type EnvConfig,
  type Logger,
  type ServerError,
} from '@repsync/core';
import {
  ConnectionRegistry,
  exerciseSessionChannel,
  type ChannelConfigInput,
  type ConnectionState,
  type CredentialProvider,
  type SocketFactory,
} from '@repsync/realtime';
import { Subscription, filter, type Observable } from 'rxjs';
import type { SessionCommand } from './schemas.js';
import { SessionProtocolHandler } from './session-protocol-handler.js';
import { SessionStateStore, type NewExerciseSet } from './session-state-store.js';
import type {
  NewExercise,
  ParticipantCursor,
  SessionDocument,
  SessionState,
  SetMetrics,
} from './types.js';

export const EXERCISE_SESSION_CHANNEL = 'exercise_session';

export interface ExerciseSessionClientConfig {
  /** Server base URL (`http(s)://` or `ws(s)://`, default: `REPSYNC_BASE_URL`) */
  baseUrl?: string;
  /** Account of the signed-in user */
  accountId: string;
  credentials?: CredentialProvider;
  socketFactory?: SocketFactory;
  /** Overrides for the `exercise_session` channel config */
  channel?: Partial<Omit<ChannelConfigInput, 'id'>>;
  /** Logger (default: `REPSYNC_LOG_LEVEL` / `REPSYNC_DEBUG` console output) */
  logger?: Logger;
  /** Environment settings (default: read from `process.env`) */
  env?: EnvConfig;
}

/**
 * @example
 * ```typescript
 * const client = new ExerciseSessionClient({
 *   baseUrl: 'https://api.example.com',
 *   accountId: user.id,
 *   credentials: authStore,
 * });
 *
 * client.state$.subscribe(render);
 * await client.start();
 * await client.joinSession(sessionId);
 * await client.toggleSetComplete(exerciseId, setId);
 * ```
 */
export class ExerciseSessionClient {
  readonly registry: ConnectionRegistry;
  readonly store: SessionStateStore;
  readonly handler: SessionProtocolHandler;

  private readonly accountId: string;
  private readonly channelOverrides: Partial<Omit<ChannelConfigInput, 'id'>>;
  private readonly logger: Logger;
  private readonly subscriptions = new Subscription();
  private started = false;

  constructor(config: ExerciseSessionClientConfig) {
    this.accountId = config.accountId;
    this.channelOverrides = config.channel ?? {};
    const env = config.env ?? loadEnvConfig();
    this.logger = config.logger ?? createLogger({ module: 'exercise-session', ...loggerConfigFromEnv(env) });

    this.registry = new ConnectionRegistry({
      baseUrl: config.baseUrl,
      env,
      credentials: config.credentials,
      socketFactory: config.socketFactory,
      logger: this.logger.child('realtime'),
    });
    this.store = new SessionStateStore({ logger: this.logger.child('store') });
    this.handler = new SessionProtocolHandler(this.store, { logger: this.logger.child('protocol') });
  }

  get session$(): Observable<SessionDocument | null> {
    return this.store.session$;
  }

  get state$(): Observable<SessionState | null> {
    return this.store.state$;
  }

  get connectionState$(): Observable<ConnectionState> {
    return this.registry.observeConnectionState(EXERCISE_SESSION_CHANNEL);
  }

  get serverErrors$(): Observable<ServerError> {
    return this.handler.serverErrors$;
  }

  get isConnected(): boolean {
    return this.registry.isConnected(EXERCISE_SESSION_CHANNEL);
  }

  /** Id of the loaded session, if any */
  get sessionId(): string | null {
    return this.store.session?.id ?? this.store.state?.sessionId ?? null;
  }

  // ── Lifecycle ─────────────────────────────────────────────

  /**
   * Register the channel, wire the handler to it and connect.
   *
   * @throws ConnectionError when the first connect fails
   */
  async start(): Promise<void> {
    if (!this.started) {
      this.started = true;
      this.registry.addConnection(exerciseSessionChannel(this.channelOverrides));
      this.subscriptions.add(this.handler.attach(this.registry.subscribe(EXERCISE_SESSION_CHANNEL)));
      this.subscriptions.add(
        this.connectionState$
          .pipe(filter((state) => state.status === 'connected'))
          .subscribe(() => {
            if (this.sessionId === null) return;
            this.requestSync().catch((error: unknown) => {
              this.logger.error('Sync request failed', toError(error));
            });
          })
      );
    }

    await this.registry.connect(EXERCISE_SESSION_CHANNEL);
  }

  /** Disconnect and release everything. The client cannot be restarted. */
  stop(): void {
    this.subscriptions.unsubscribe();
    this.registry.dispose();
  }

  // ── Sessions ──────────────────────────────────────────────

  /**
   * Ask the server to add this account to a session. The server answers
   * with a `sync_response`.
   *
   * @throws ConnectionError (REPSYNC_C501) when offline
   */
  async joinSession(sessionId: string): Promise<void> {
    const message = this.handler.encode({ type: 'session_join', sessionId }, { sessionId });
    await this.registry.send(EXERCISE_SESSION_CHANNEL, message);
  }

  /** Announce the leave when connected, then drop the local session */
  async leaveSession(): Promise<void> {
    const sessionId = this.sessionId;
    if (sessionId === null) return;

    await this.transmit({ type: 'session_leave', sessionId, accountId: this.accountId });
    this.store.clear();
  }

  /** Start a draft session that lives only on this device until synced */
  startOfflineSession(name?: string): SessionDocument {
    return this.store.createOfflineSession({ ownerId: this.accountId, name });
  }

  /** @returns whether the request was sent */
  requestSync(): Promise<boolean> {
    return this.transmit({ type: 'sync_request' }, generateId());
  }

  // ── Local mutations ───────────────────────────────────────
  // The store is updated before the first await, so callers see the
  // optimistic state as soon as the call returns.

  async toggleSetComplete(exerciseId: string, setId: string): Promise<boolean> {
    if (!this.store.toggleSetComplete(exerciseId, setId)) return false;

    const set = this.store.getSet(exerciseId, setId);
    if (set) {
      await this.transmit({ type: 'set_complete', exerciseId, setId, complete: set.complete });
    }
    return true;
  }

  /** Swap two sets and renumber the exercise so `order` matches positions */
  async reorderSet(exerciseId: string, fromSetId: string, toSetId: string): Promise<boolean> {
    if (!this.store.reorderSet(exerciseId, fromSetId, toSetId, { renumber: true })) return false;

    await this.transmit({ type: 'set_reorder', exerciseId, fromSetId, toSetId });
    return true;
  }

  async updateMetrics(exerciseId: string, setId: string, metrics: SetMetrics): Promise<boolean> {
    if (!this.store.updateMetrics(exerciseId, setId, metrics)) return false;

    await this.transmit({ type: 'set_update', exerciseId, setId, patch: { metrics } });
    return true;
  }

  async addExercise(exercise: NewExercise): Promise<boolean> {
    if (!this.store.addExercise(exercise)) return false;

    await this.transmit({ type: 'exercise_add', exercise });
    return true;
  }

  async addSet(exerciseId: string, set: NewExerciseSet): Promise<boolean> {
    if (!this.store.addSet(exerciseId, set)) return false;

    const added = this.store.getSet(exerciseId, set.id);
    if (added) {
      await this.transmit({ type: 'set_add', exerciseId, set: added });
    }
    return true;
  }

  async deleteSet(exerciseId: string, setId: string): Promise<boolean> {
    if (!this.store.deleteSet(exerciseId, setId)) return false;

    await this.transmit({ type: 'set_delete', exerciseId, setId });
    return true;
  }

  async deleteExercise(exerciseId: string): Promise<boolean> {
    if (!this.store.deleteExercise(exerciseId)) return false;

    await this.transmit({ type: 'exercise_delete', exerciseId });
    return true;
  }

  /** Share where this user is looking. Not applied locally; the server echoes it. */
  moveCursor(cursor: ParticipantCursor | null): Promise<boolean> {
    return this.transmit({ type: 'cursor_move', accountId: this.accountId, cursor });
  }

  /**
   * Send a command when connected. Failures are logged; the optimistic
   * state stays until the next sync.
   */
  private async transmit(command: SessionCommand, correlationId?: string): Promise<boolean> {
    if (!this.isConnected) {
      this.logger.debug('Offline, change kept locally', { type: command.type });
      return false;
    }

    const message = this.handler.encode(command, {
      sessionId: this.sessionId ?? undefined,
      correlationId,
    });

    try {
      await this.registry.send(EXERCISE_SESSION_CHANNEL, message);
      return true;
    } catch (error) {
      this.logger.warn('Failed to send change', { type: command.type, reason: toError(error).message });
      return false;
    }
  }
}
