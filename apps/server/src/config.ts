/**
 * Server Configuration Management
 *
 * Reads the server, resolver and player settings from environment variables.
 * Missing required values throw; out-of-range tunables warn and fall back.
 */

/**
 * Configuration error for setup issues
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly httpLogger: boolean;
  readonly resolver: {
    readonly endpoint: string;
    readonly timeoutMs: number;
  };
  readonly player: {
    readonly binary: string;
    readonly socketPath: string;
    readonly initialVolume: number;
    readonly ipcTimeoutMs: number;
  };
  readonly pollIntervalMs: number;
}

type Env = Readonly<Record<string, string | undefined>>;

function readInteger(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }

  if (value < min || value > max) {
    console.warn(`${name}=${value} is outside the supported range (${min}-${max}). Using ${fallback}.`);
    return fallback;
  }
  return value;
}

function readFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${name} must be a boolean flag, got "${env[name]}"`);
}

/**
 * Load configuration from environment variables
 */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  const endpoint = env.RESOLVER_URL?.trim();
  if (!endpoint) {
    throw new ConfigError('RESOLVER_URL environment variable is required for URL resolution');
  }

  try {
    new URL(endpoint);
  } catch {
    throw new ConfigError(`RESOLVER_URL is not a valid URL: "${endpoint}"`);
  }

  return {
    port: readInteger(env, 'PORT', 5000, 1, 65535),
    host: env.HOST?.trim() || '0.0.0.0',
    httpLogger: readFlag(env, 'HTTP_LOGGER', env.NODE_ENV !== 'test'),
    resolver: {
      endpoint,
      timeoutMs: readInteger(env, 'RESOLVER_TIMEOUT_MS', 30000, 1000, 120000),
    },
    player: {
      binary: env.MPV_BINARY?.trim() || 'mpv',
      socketPath: env.MPV_SOCKET?.trim() || '/tmp/mpv.sock',
      initialVolume: readInteger(env, 'MPV_INITIAL_VOLUME', 50, 0, 100),
      ipcTimeoutMs: readInteger(env, 'IPC_TIMEOUT_MS', 2000, 100, 10000),
    },
    pollIntervalMs: readInteger(env, 'POLL_INTERVAL_MS', 500, 100, 10000),
  };
}
