/**
 * Request/response channel to the media player
 *
 * One outstanding request per call and one reply awaited. A failed exchange gets a
 * single retry after the supervisor has confirmed (or restored) the player. Every
 * failure is reported as an absent result, never as an exception.
 */

import {
  IPlayerChannel,
  IPlayerSupervisor,
  IpcTransport
} from '../../domain/player/interfaces';
import {
  CommandAtom,
  PlayerReply,
  PlayerRequest,
  PlayerValue
} from '../../domain/player/types';

export interface PlayerChannelOptions {
  readonly socketPath: string;
  readonly timeoutMs: number;
}

/**
 * Reply codes that are normal while the player is idle
 */
const QUIET_ERRORS = new Set(['property unavailable']);

function isPlayerValue(value: unknown): value is PlayerValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      return Array.isArray(value)
        ? value.every(isPlayerValue)
        : Object.values(value).every(isPlayerValue);
    default:
      return false;
  }
}

/**
 * Parse one reply line; `null` when it is not a well-formed reply
 */
export function parseReply(line: string): PlayerReply | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  if (!('error' in parsed) || typeof parsed.error !== 'string') {
    return null;
  }

  const data = 'data' in parsed ? parsed.data : undefined;
  const requestId = 'request_id' in parsed ? parsed.request_id : undefined;

  return {
    error: parsed.error,
    ...(data !== undefined && isPlayerValue(data) ? { data } : {}),
    ...(typeof requestId === 'number' ? { request_id: requestId } : {})
  };
}

export class PlayerChannel implements IPlayerChannel {
  private requestId = 0;

  constructor(
    private readonly transport: IpcTransport,
    private readonly supervisor: IPlayerSupervisor,
    private readonly options: PlayerChannelOptions
  ) {}

  /**
   * Send a command and return the player's reply, or null when unavailable
   */
  async sendCommand(argv: readonly CommandAtom[]): Promise<PlayerReply | null> {
    const request: PlayerRequest = { command: [...argv], request_id: ++this.requestId };
    const label = argv.join(' ');

    if (!this.supervisor.isReady()) {
      const started = await this.supervisor.ensureRunning();
      if (!started.success) {
        console.error(`Player unavailable (${started.error}), dropping command: ${label}`);
        return null;
      }
    }

    const message = JSON.stringify(request);
    let line: string;
    try {
      line = await this.transport.exchange(this.options.socketPath, message, this.options.timeoutMs);
    } catch (error) {
      console.warn(`IPC exchange failed for "${label}": ${describe(error)}; checking player`);

      const recovered = await this.supervisor.ensureRunning();
      if (!recovered.success) {
        console.error(`Player unavailable (${recovered.error}), dropping command: ${label}`);
        return null;
      }

      try {
        line = await this.transport.exchange(this.options.socketPath, message, this.options.timeoutMs);
      } catch (retryError) {
        console.error(`IPC retry failed for "${label}": ${describe(retryError)}`);
        return null;
      }
    }

    const reply = parseReply(line);
    if (!reply) {
      console.error(`Unreadable player reply for "${label}": ${line}`);
      return null;
    }

    if (reply.error !== 'success' && !QUIET_ERRORS.has(reply.error)) {
      console.error(`Player command error for "${label}": ${reply.error}`);
    }

    return reply;
  }

  /**
   * Read a property; undefined when the player is unavailable or the property is not set
   */
  async getProperty(name: string): Promise<PlayerValue | undefined> {
    const reply = await this.sendCommand(['get_property', name]);
    if (!reply || reply.error !== 'success') {
      return undefined;
    }
    return reply.data;
  }

  async setProperty(name: string, value: CommandAtom): Promise<PlayerReply | null> {
    return this.sendCommand(['set_property', name, value]);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
