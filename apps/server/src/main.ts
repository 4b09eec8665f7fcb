/**
 * Queuecast Server Entry Point
 *
 * Loads configuration, checks the player binary, wires the playback engine, starts
 * the background loops and the HTTP server, and guarantees the player is torn down
 * exactly once on exit.
 */

import { loadServerConfig, ServerConfig } from './config';
import {
  PlaybackDirector,
  PlaybackStateStore,
  PlayerService,
  QueueStore,
  ResolutionWorker,
  StatePoller
} from './application';
import { PlayerErrorFactory, IPlayerSupervisor, IResolverClient, IpcTransport } from './domain/player';
import { PlayerChannel, PlayerSupervisor, UnixSocketTransport } from './infrastructure/player';
import { ResolverClient } from './infrastructure/resolver/ResolverClient';
import { DependencyValidator } from './infrastructure/validation/dependency-validator';
import { EventBroadcaster, HTTPServer } from './infrastructure/web';

/**
 * The wired engine, without the HTTP layer
 */
export interface Engine {
  readonly broadcaster: EventBroadcaster;
  readonly supervisor: IPlayerSupervisor & { shutdownSync(): void };
  readonly queue: QueueStore;
  readonly playback: PlaybackStateStore;
  readonly director: PlaybackDirector;
  readonly worker: ResolutionWorker;
  readonly poller: StatePoller;
  readonly playerService: PlayerService;
}

export interface EngineOverrides {
  transport?: IpcTransport;
  resolver?: IResolverClient;
}

export function createEngine(config: ServerConfig, overrides: EngineOverrides = {}): Engine {
  const broadcaster = new EventBroadcaster();
  const transport = overrides.transport ?? new UnixSocketTransport();
  const supervisor = new PlayerSupervisor(
    {
      binary: config.player.binary,
      socketPath: config.player.socketPath,
      initialVolume: config.player.initialVolume
    },
    transport,
    undefined,
    { probeTimeoutMs: config.player.ipcTimeoutMs }
  );
  const channel = new PlayerChannel(transport, supervisor, {
    socketPath: config.player.socketPath,
    timeoutMs: config.player.ipcTimeoutMs
  });
  const resolver = overrides.resolver ?? new ResolverClient({
    endpoint: config.resolver.endpoint,
    timeoutMs: config.resolver.timeoutMs
  });

  const queue = new QueueStore(broadcaster);
  const playback = new PlaybackStateStore(broadcaster, config.player.initialVolume);
  const director = new PlaybackDirector(queue, playback, channel);
  const worker = new ResolutionWorker(resolver, queue, director, broadcaster);
  const poller = new StatePoller(channel, playback, director, { intervalMs: config.pollIntervalMs });
  const playerService = new PlayerService(queue, playback, director, worker, resolver, supervisor);

  return { broadcaster, supervisor, queue, playback, director, worker, poller, playerService };
}

let engine: Engine | null = null;
let httpServer: HTTPServer | null = null;
let shutdownPromise: Promise<void> | null = null;

/**
 * Start everything. A player that fails to start is logged; the server still runs and
 * the next command retries the start.
 */
async function initializeServer(): Promise<void> {
  console.log('Queuecast Server - Starting up...');

  const config = loadServerConfig();

  const dependencies = await new DependencyValidator(config.player.binary).validateAtStartup();
  if (!dependencies.success) {
    console.error('Player binary missing; playback will fail until it is installed');
  }

  engine = createEngine(config);
  installShutdownHooks(engine);

  const started = await engine.supervisor.ensureRunning();
  if (!started.success) {
    const details = PlayerErrorFactory.createSupervisorError(started.error);
    console.error(`❌ ${details.message}. ${details.suggestion ?? ''}`);
  }

  engine.poller.start();

  httpServer = new HTTPServer(
    { port: config.port, host: config.host, logger: config.httpLogger },
    { playerService: engine.playerService, broadcaster: engine.broadcaster }
  );
  await httpServer.initialize();
  await httpServer.start();

  console.log('✅ Queuecast Server ready');
  console.log(`   - Player socket: ${config.player.socketPath}`);
  console.log(`   - Resolver: ${config.resolver.endpoint}`);
  console.log(`   - HTTP server: ${config.host}:${config.port}`);
}

/**
 * Stop the loops, the HTTP server and the player. Every caller shares one run.
 */
function shutdown(): Promise<void> {
  if (!shutdownPromise) {
    shutdownPromise = cleanup();
  }
  return shutdownPromise;
}

async function cleanup(): Promise<void> {
  console.log('Cleaning up services...');

  if (engine) {
    engine.poller.stop();
    engine.worker.stop();
  }

  if (httpServer) {
    try {
      await httpServer.stop();
    } catch (error) {
      console.error('HTTP server shutdown failed:', error);
    }
    httpServer = null;
  }

  if (engine) {
    await engine.supervisor.shutdown();
  }

  console.log('Cleanup completed');
}

function installShutdownHooks(current: Engine): void {
  const onSignal = (signal: NodeJS.Signals) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);
    shutdown()
      .catch((error: unknown) => console.error('Shutdown failed:', error))
      .finally(() => process.exit(0));
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  // Last resort when the process exits without a signal
  process.on('exit', () => current.supervisor.shutdownSync());

  process.on('uncaughtException', (error) => {
    console.error('Uncaught exception:', error);
    shutdown().finally(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
    shutdown().finally(() => process.exit(1));
  });
}

if (require.main === module) {
  initializeServer().catch((error: unknown) => {
    console.error('Fatal startup error:', error instanceof Error ? error.message : error);
    shutdown().finally(() => process.exit(1));
  });
}

export { initializeServer, shutdown };
