/**
 * Ports between the playback engine and its infrastructure
 */

import { Result, ResolvedMedia } from '@queuecast/shared';
import {
  CommandAtom,
  PlayerReply,
  PlayerValue,
  SearchResult,
  SupervisorState
} from './types';
import { ResolutionError, SupervisorError } from './errors';

/**
 * Moves one request line to the player socket and returns the reply line.
 * Rejects when the socket cannot be reached or no reply arrives in time.
 */
export interface IpcTransport {
  exchange(socketPath: string, message: string, timeoutMs: number): Promise<string>;
}

/**
 * Request/response link to the player. Never throws; `null`/`undefined` mean unavailable.
 */
export interface IPlayerChannel {
  sendCommand(argv: readonly CommandAtom[]): Promise<PlayerReply | null>;
  getProperty(name: string): Promise<PlayerValue | undefined>;
  setProperty(name: string, value: CommandAtom): Promise<PlayerReply | null>;
}

/**
 * Owner of the player process
 */
export interface IPlayerSupervisor {
  /**
   * Start or restart the player when it is not running, its socket is gone,
   * or it fails a liveness probe
   */
  ensureRunning(): Promise<Result<void, SupervisorError>>;

  /**
   * Cheap check: process alive and socket present. No IPC.
   */
  isReady(): boolean;

  getState(): SupervisorState;
  getPid(): number | null;
  socketExists(): boolean;

  /**
   * Terminate the player and remove its socket. Safe to call repeatedly.
   */
  shutdown(): Promise<void>;
}

/**
 * Client for the remote URL resolver
 */
export interface IResolverClient {
  resolve(url: string): Promise<Result<ResolvedMedia, ResolutionError>>;
  search(query: string): Promise<Result<SearchResult[], ResolutionError>>;
}
