/**
 * WebSocket Server Infrastructure
 *
 * Serves `/ws`: each client gets the current state once, then every published event.
 * Clients only listen; incoming messages are ignored.
 */

import { FastifyInstance } from 'fastify';
import { IPlayerService } from '../../../application/PlayerService';
import { EventBroadcaster } from './EventBroadcaster';

export interface WebSocketServerConfig {
  maxConnections: number;
}

export interface WebSocketServerDependencies {
  broadcaster: EventBroadcaster;
  playerService: IPlayerService;
}

export class WebSocketServer {
  constructor(
    private readonly config: WebSocketServerConfig,
    private readonly dependencies: WebSocketServerDependencies
  ) {}

  /**
   * Register the `/ws` route. The @fastify/websocket plugin must already be registered.
   */
  async initialize(fastify: FastifyInstance): Promise<void> {
    const { broadcaster, playerService } = this.dependencies;

    await fastify.register(async (instance) => {
      instance.get('/ws', { websocket: true }, (socket, request) => {
        if (broadcaster.getClientCount() >= this.config.maxConnections) {
          console.warn('WebSocket connection rejected: maximum connections reached');
          socket.close(1013, 'Server overloaded');
          return;
        }

        const id = broadcaster.addClient(socket);
        console.log(`WebSocket client connected: ${id} from ${request.ip}`);

        socket.on('close', () => {
          broadcaster.removeClient(id);
          console.log(`WebSocket client disconnected: ${id}`);
        });

        socket.on('error', (error: Error) => {
          console.error(`WebSocket error for client ${id}:`, error.message);
          broadcaster.removeClient(id);
        });

        broadcaster.sendInitialState(id, {
          items: playerService.getQueue(),
          status: playerService.getStatus(),
          autoplayEnabled: playerService.isAutoplayEnabled(),
        });
      });
    });

    console.log(`✅ WebSocket server initialized at /ws (max ${this.config.maxConnections} clients)`);
  }

  shutdown(): void {
    this.dependencies.broadcaster.closeAll();
    console.log('WebSocket server shut down');
  }
}
