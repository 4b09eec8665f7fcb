/**
 * Event Broadcaster for Real-Time Updates
 *
 * The engine's event publisher: every published event goes to every open client,
 * numbered in publication order.
 */

import { EventPublisher, PlayerEvent } from '@queuecast/shared';
import { ClientSocket, InitialStatePayload, SOCKET_OPEN, WebSocketMessage } from './types';

export class EventBroadcaster implements EventPublisher {
  private readonly clients = new Map<string, ClientSocket>();
  private sequenceNumber = 0;
  private nextClientId = 0;

  /**
   * Track a connected client; returns its id
   */
  addClient(socket: ClientSocket): string {
    const id = `client_${++this.nextClientId}`;
    this.clients.set(id, socket);
    return id;
  }

  removeClient(id: string): void {
    this.clients.delete(id);
  }

  getClientCount(): number {
    return this.clients.size;
  }

  getSequenceNumber(): number {
    return this.sequenceNumber;
  }

  /**
   * Never throws; a client that fails to receive is dropped
   */
  publish(event: PlayerEvent): void {
    const message: WebSocketMessage = {
      type: event.type,
      data: event.payload,
      sequenceNumber: ++this.sequenceNumber,
      timestamp: new Date().toISOString(),
    };
    const text = JSON.stringify(message);

    for (const [id, socket] of this.clients) {
      this.deliver(id, socket, text);
    }
  }

  sendInitialState(id: string, payload: InitialStatePayload): void {
    const socket = this.clients.get(id);
    if (!socket) return;

    const message: WebSocketMessage = {
      type: 'initial_state',
      data: payload,
      sequenceNumber: this.sequenceNumber,
      timestamp: new Date().toISOString(),
    };
    this.deliver(id, socket, JSON.stringify(message));
  }

  closeAll(): void {
    for (const socket of this.clients.values()) {
      if (socket.readyState === SOCKET_OPEN) {
        socket.close(1001, 'Server shutting down');
      }
    }
    this.clients.clear();
  }

  private deliver(id: string, socket: ClientSocket, text: string): void {
    if (socket.readyState !== SOCKET_OPEN) {
      return;
    }

    try {
      socket.send(text);
    } catch (error) {
      console.error(`Failed to send message to client ${id}:`, error);
      this.clients.delete(id);
    }
  }
}
