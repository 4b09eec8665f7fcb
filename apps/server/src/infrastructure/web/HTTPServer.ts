/**
 * HTTP Server Infrastructure
 *
 * Fastify server carrying the REST API, the `/ws` event stream and a health check.
 * Only local-network clients are served.
 */

import { networkInterfaces } from 'os';
import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import { IPlayerService } from '../../application/PlayerService';
import { registerAPIRoutes } from './api';
import { EventBroadcaster, WebSocketServer } from './websocket';

export interface ServerInfo {
  port: number;
  host: string;
  addresses: string[];
  uptime: number;
}

export interface HTTPServerConfig {
  port: number;
  host: string;
  logger?: boolean;
  maxWebSocketClients?: number;
}

export interface HTTPServerDependencies {
  playerService: IPlayerService;
  broadcaster: EventBroadcaster;
}

const LOCAL_RANGES = [
  /^127\./, // Loopback
  /^10\./, // Class A private
  /^172\.(1[6-9]|2[0-9]|3[0-1])\./, // Class B private
  /^192\.168\./, // Class C private
  /^100\.(6[4-9]|[7-9][0-9]|1[01][0-9]|12[0-7])\./, // Shared address space (CGNAT, Tailscale)
  /^::1$/, // IPv6 loopback
  /^fe80:/i, // IPv6 link-local
  /^f[cd][0-9a-f]{2}:/i, // IPv6 unique local
];

/**
 * True for loopback, RFC 1918, shared address space, link-local and unique local addresses
 */
export function isLocalNetworkIP(ip: string | undefined): boolean {
  if (!ip) return false;
  const cleanIP = ip.replace(/^::ffff:/, '');
  return LOCAL_RANGES.some((range) => range.test(cleanIP));
}

export class HTTPServer {
  private readonly fastify: FastifyInstance;
  private webSocketServer: WebSocketServer | null = null;
  private startTime: Date | null = null;

  constructor(
    private readonly config: HTTPServerConfig,
    private readonly dependencies: HTTPServerDependencies
  ) {
    this.fastify = Fastify({
      logger: config.logger ?? true,
      trustProxy: false,
    });
  }

  /**
   * Register plugins, hooks and routes
   */
  async initialize(): Promise<void> {
    try {
      await this.fastify.register(cors, {
        origin: true,
        credentials: false,
      });

      await this.fastify.register(websocket, {
        options: { maxPayload: 64 * 1024 },
      });

      this.fastify.addHook('onRequest', async (request, reply) => {
        if (!isLocalNetworkIP(request.ip)) {
          return reply.code(403).send({ error: 'Access denied: Local network only' });
        }
      });

      await registerAPIRoutes(this.fastify, { playerService: this.dependencies.playerService });

      this.webSocketServer = new WebSocketServer(
        { maxConnections: this.config.maxWebSocketClients ?? 50 },
        this.dependencies
      );
      await this.webSocketServer.initialize(this.fastify);

      this.fastify.get('/health', async () => {
        return {
          status: 'healthy',
          server: this.getServerInfo(),
          player: this.dependencies.playerService.getDebugSnapshot().playerStatus,
          timestamp: new Date().toISOString(),
        };
      });

      console.log('HTTP server initialized with Fastify, WebSocket, and CORS support');
    } catch (error) {
      console.error('Failed to initialize HTTP server:', error);
      throw error;
    }
  }

  async start(): Promise<void> {
    try {
      await this.fastify.listen({
        port: this.config.port,
        host: this.config.host,
      });
      this.startTime = new Date();

      console.log(`✅ HTTP Server started on ${this.config.host}:${this.config.port}`);
      console.log(`   - WebSocket endpoint: ws://<host>:${this.config.port}/ws`);
    } catch (error) {
      console.error('Failed to start HTTP server:', error);
      throw error;
    }
  }

  async stop(): Promise<void> {
    try {
      this.webSocketServer?.shutdown();
      await this.fastify.close();
      console.log('HTTP server stopped gracefully');
    } catch (error) {
      console.error('Error stopping HTTP server:', error);
      throw error;
    }
  }

  getServerInfo(): ServerInfo {
    return {
      port: this.config.port,
      host: this.config.host,
      addresses: getNetworkAddresses(),
      uptime: this.startTime ? Date.now() - this.startTime.getTime() : 0,
    };
  }

  getFastifyInstance(): FastifyInstance {
    return this.fastify;
  }
}

function getNetworkAddresses(): string[] {
  const addresses: string[] = [];
  for (const entries of Object.values(networkInterfaces())) {
    for (const iface of entries ?? []) {
      if (!iface.internal && iface.family === 'IPv4') {
        addresses.push(iface.address);
      }
    }
  }
  return addresses;
}
