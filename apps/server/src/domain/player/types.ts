/**
 * Core types for the playback engine
 */

import { EventEmitter } from 'events';
import { QueueItem, ResolvedMedia } from '@queuecast/shared';

/**
 * JSON values carried in player replies
 */
export type PlayerValue =
  | string
  | number
  | boolean
  | null
  | PlayerValue[]
  | { [key: string]: PlayerValue };

/**
 * One element of a player command line, e.g. `['loadfile', url, 'replace']`
 */
export type CommandAtom = string | number | boolean;

/**
 * Player IPC request structure
 */
export interface PlayerRequest {
  readonly command: readonly CommandAtom[];
  readonly request_id?: number;
}

/**
 * Player IPC reply structure. `error` is 'success' or an error code.
 */
export interface PlayerReply {
  readonly error: string;
  readonly data?: PlayerValue;
  readonly request_id?: number;
}

/**
 * Player process lifecycle
 */
export type SupervisorState = 'not_started' | 'starting' | 'running' | 'dead';

/**
 * Process-wide playback state.
 * `nowPlayingMedia` is a private copy; the playing item is never in the queue.
 */
export interface PlaybackState {
  readonly nowPlayingId: string | null;
  readonly nowPlayingMedia: ResolvedMedia | null;
  readonly paused: boolean;
  readonly positionSeconds: number;
  readonly durationSeconds: number;
  readonly volumePercent: number;
  /** Set by a successful load until the poller first sees the player busy */
  readonly awaitingLoad: boolean;
}

/**
 * What the supervisor learned about the host's audio stack at start time
 */
export interface AudioEnvironment {
  readonly isRaspberryPi: boolean;
  readonly hasPipeWire: boolean;
  readonly hasPulseAudio: boolean;
}

/**
 * Audio output preference handed to the player at start
 */
export interface AudioOutputSelection {
  readonly label: string;
  readonly args: readonly string[];
}

/**
 * Player launch configuration
 */
export interface PlayerLaunchOptions {
  readonly binary: string;
  readonly socketPath: string;
  readonly initialVolume: number;
}

/**
 * Operator-facing details gathered when the player fails to start
 */
export interface StartupDiagnostics {
  readonly playerVersion: string | null;
  readonly pactlAvailable: boolean;
  readonly aplayAvailable: boolean;
  readonly alsaDevices: string | null;
  readonly audioGroups: readonly string[];
}

/**
 * The subset of a spawned child process the supervisor relies on.
 * `ChildProcess` satisfies it; tests use an EventEmitter stand-in.
 */
export interface PlayerProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
}

/**
 * A search hit returned by the resolver
 */
export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly uploader?: string;
  readonly duration?: number;
  readonly thumbnail?: string;
}

/**
 * Submission request handed to the resolution worker
 */
export interface ResolutionRequest {
  readonly id: string;
  readonly url: string;
}

/**
 * Debug view of the whole engine
 */
export interface DebugSnapshot {
  readonly playerStatus: string;
  readonly socketExists: boolean;
  readonly queueLength: number;
  readonly queueItems: ReadonlyArray<{
    readonly id: string;
    readonly status: QueueItem['status'];
    readonly hasDetails: boolean;
    readonly title: string;
  }>;
  readonly playbackState: PlaybackState;
  readonly autoplayEnabled: boolean;
  readonly pendingResolutions: number;
}
