/**
 * Connection lifecycle states.
 *
 * ```
 * disconnected ──connect()──► connecting ──open──► connected
 *      ▲                          │                   │
 *      │                          ▼ (error)           ▼ (drop / ping failure)
 *      │                       failed ◄──(max)── reconnecting ──► connecting
 *      └──────────────── disconnect() from any state
 * ```
 */

export type ConnectionState =
  | { readonly status: 'disconnected' }
  | { readonly status: 'connecting' }
  | { readonly status: 'connected' }
  | { readonly status: 'reconnecting'; readonly attempt: number }
  | { readonly status: 'failed'; readonly error: Error };

export type ConnectionStatus = ConnectionState['status'];

const DISCONNECTED: ConnectionState = { status: 'disconnected' };
const CONNECTING: ConnectionState = { status: 'connecting' };
const CONNECTED: ConnectionState = { status: 'connected' };

export const ConnectionStates = {
  disconnected: DISCONNECTED,
  connecting: CONNECTING,
  connected: CONNECTED,
  reconnecting(attempt: number): ConnectionState {
    return { status: 'reconnecting', attempt };
  },
  failed(error: Error): ConnectionState {
    return { status: 'failed', error };
  },
} as const;

/**
 * Structural equality. Failed states compare by error message and
 * reconnecting states by attempt number.
 */
export function connectionStatesEqual(a: ConnectionState, b: ConnectionState): boolean {
  if (a.status === 'failed' && b.status === 'failed') {
    return a.error.message === b.error.message;
  }
  if (a.status === 'reconnecting' && b.status === 'reconnecting') {
    return a.attempt === b.attempt;
  }
  return a.status === b.status;
}

/**
 * Human-readable status text for UI bindings
 */
export function describeConnectionState(state: ConnectionState): string {
  switch (state.status) {
    case 'disconnected':
      return 'Disconnected';
    case 'connecting':
      return 'Connecting';
    case 'connected':
      return 'Connected';
    case 'reconnecting':
      return `Reconnecting (attempt ${state.attempt})`;
    case 'failed':
      return `Failed: ${state.error.message}`;
  }
}
