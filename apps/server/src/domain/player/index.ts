/**
 * Playback engine domain exports
 */

export type {
  PlayerValue,
  CommandAtom,
  PlayerRequest,
  PlayerReply,
  SupervisorState,
  PlaybackState,
  AudioEnvironment,
  AudioOutputSelection,
  PlayerLaunchOptions,
  StartupDiagnostics,
  PlayerProcess,
  SearchResult,
  ResolutionRequest,
  DebugSnapshot
} from './types';

export type {
  SupervisorError,
  ResolutionError,
  PlayerErrorDetails
} from './errors';

export { PlayerErrorFactory, signalsStaleCredentials } from './errors';

export type {
  IpcTransport,
  IPlayerChannel,
  IPlayerSupervisor,
  IResolverClient
} from './interfaces';
