/**
 * WebSocket Infrastructure Exports
 */

export { WebSocketServer } from './WebSocketServer';
export type { WebSocketServerConfig, WebSocketServerDependencies } from './WebSocketServer';
export { EventBroadcaster } from './EventBroadcaster';
export type { ClientSocket, InitialStatePayload, WebSocketMessage } from './types';
export { SOCKET_OPEN } from './types';
