/**
 * Application layer exports
 * Queue ownership, playback policy and the background loops
 */

export { QueueStore } from './QueueStore';
export type { IQueueStore, AttachOutcome, RandomSource } from './QueueStore';
export { PlaybackStateStore, clampPercent } from './PlaybackStateStore';
export type { PlayingReading } from './PlaybackStateStore';
export { PlaybackDirector } from './PlaybackDirector';
export { ResolutionWorker } from './ResolutionWorker';
export type { AutoplayTarget } from './ResolutionWorker';
export { StatePoller, isEndOfTrack, DEFAULT_POLLER_OPTIONS } from './StatePoller';
export type { StatePollerOptions, AdvanceTarget } from './StatePoller';
export { PlayerService, normalizeSubmittedUrl } from './PlayerService';
export type { IPlayerService } from './PlayerService';
