/**
 * Socket abstraction used by Connection.
 *
 * The default factory wraps the `ws` client; tests pass an in-process
 * factory instead.
 */

/** Everything needed to open one socket */
export interface SocketRequest {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly connectTimeoutMs: number;
}

/** Callbacks a socket reports into */
export interface SocketListeners {
  onOpen(): void;
  onMessage(frame: string | Uint8Array): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

/** An open (or opening) socket */
export interface RealtimeSocket {
  /** Write one text frame. Resolves once the frame is flushed. */
  send(data: string): Promise<void>;
  /** Transport-level ping with no payload */
  ping(): Promise<void>;
  close(code?: number, reason?: string): void;
}

export type SocketFactory = (request: SocketRequest, listeners: SocketListeners) => RealtimeSocket;
