/**
 * HTTP Server Infrastructure Tests
 */

import { HTTPServer, HTTPServerConfig, isLocalNetworkIP } from '../HTTPServer';
import { EventBroadcaster } from '../websocket';
import { createTestEngine } from '../../../__tests__/setup/player-fakes';

describe('isLocalNetworkIP', () => {
  it.each(['127.0.0.1', '10.0.0.5', '172.16.4.2', '172.31.255.1', '192.168.1.20', '::1', 'fe80::1', '::ffff:192.168.1.20'])(
    'accepts %s',
    (ip) => {
      expect(isLocalNetworkIP(ip)).toBe(true);
    }
  );

  it.each(['100.64.0.1', '100.101.12.7', '100.127.255.254', 'fd12:3456::1', 'fc00::5'])(
    'accepts the overlay and unique local address %s',
    (ip) => {
      expect(isLocalNetworkIP(ip)).toBe(true);
    }
  );

  it.each(['8.8.8.8', '172.32.0.1', '1.1.1.1', '2001:db8::1', '100.63.255.1', '100.128.0.1', ''])('rejects %s', (ip) => {
    expect(isLocalNetworkIP(ip)).toBe(false);
  });

  it('rejects a missing address', () => {
    expect(isLocalNetworkIP(undefined)).toBe(false);
  });
});

describe('HTTPServer', () => {
  const testConfig: HTTPServerConfig = {
    port: 0,
    host: '127.0.0.1',
    logger: false,
  };
  let server: HTTPServer;
  let engine: ReturnType<typeof createTestEngine>;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    const broadcaster = new EventBroadcaster();
    engine = createTestEngine(broadcaster);
    server = new HTTPServer(testConfig, { playerService: engine.service, broadcaster });
    await server.initialize();
  });

  afterEach(async () => {
    engine.worker.stop();
    await server.stop();
    jest.restoreAllMocks();
  });

  it('reports health with the player state', async () => {
    const response = await server.getFastifyInstance().inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body = response.json<{ status: string; player: string; server: { host: string } }>();
    expect(body.status).toBe('healthy');
    expect(body.player).toBe('Running (PID: 4242)');
    expect(body.server.host).toBe('127.0.0.1');
  });

  it('serves the API', async () => {
    const response = await server.getFastifyInstance().inject({ method: 'GET', url: '/api/queue' });

    expect(response.statusCode).toBe(200);
    expect(response.json<{ data: { items: unknown[] } }>().data.items).toEqual([]);
  });

  it('refuses clients outside the local network', async () => {
    const response = await server.getFastifyInstance().inject({
      method: 'GET',
      url: '/api/queue',
      remoteAddress: '203.0.113.9',
    });

    expect(response.statusCode).toBe(403);
    expect(response.json<{ error: string }>().error).toBe('Access denied: Local network only');
  });

  it('reports server info before start', () => {
    expect(server.getServerInfo()).toMatchObject({
      port: 0,
      host: '127.0.0.1',
      addresses: expect.any(Array),
      uptime: 0,
    });
  });
});
