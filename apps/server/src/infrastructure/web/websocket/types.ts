/**
 * WebSocket Types and Interfaces
 */

import { PlayerEvent, QueueItem, StatusPayload } from '@queuecast/shared';

/**
 * The part of a WebSocket the broadcaster needs; the `ws` socket handed out by
 * @fastify/websocket satisfies it
 */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export const SOCKET_OPEN = 1;

/**
 * Snapshot sent once to every client when it connects
 */
export interface InitialStatePayload {
  readonly items: readonly QueueItem[];
  readonly status: StatusPayload;
  readonly autoplayEnabled: boolean;
}

/**
 * Wire format of every message pushed to clients
 */
export type WebSocketMessage =
  | {
      type: PlayerEvent['type'];
      data: PlayerEvent['payload'];
      sequenceNumber: number;
      timestamp: string;
    }
  | {
      type: 'initial_state';
      data: InitialStatePayload;
      sequenceNumber: number;
      timestamp: string;
    };
