/**
 * @repsync/realtime - named-channel WebSocket connections
 *
 * @example
 * ```typescript
 * import { ConnectionRegistry, exerciseSessionChannel } from '@repsync/realtime';
 *
 * const registry = new ConnectionRegistry({ baseUrl: 'https://api.example.com' });
 * registry.addConnection(exerciseSessionChannel());
 * await registry.connect('exercise_session');
 * ```
 *
 * @packageDocumentation
 * @module @repsync/realtime
 */

export {
  DEFAULT_CHANNEL_CONFIG,
  computeReconnectDelay,
  defineChannelConfig,
  exerciseSessionChannel,
  type ChannelConfig,
  type ChannelConfigInput,
  type ReconnectBackoff,
} from './channel-config.js';
export {
  ConnectionStates,
  connectionStatesEqual,
  describeConnectionState,
  type ConnectionState,
  type ConnectionStatus,
} from './connection-state.js';
export { Connection, type ConnectionOptions } from './connection.js';
export {
  ConnectionRegistry,
  type ConnectAllResult,
  type ConnectionRegistryConfig,
} from './connection-registry.js';
export { anonymousCredentials, staticCredentials, type CredentialProvider } from './credentials.js';
export * from './protocol/index.js';
export * from './transport/index.js';
export { toWebSocketUrl } from './url.js';
