export type { RealtimeSocket, SocketFactory, SocketListeners, SocketRequest } from './types.js';
export { createWsSocket } from './ws-socket.js';
