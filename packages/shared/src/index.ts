/**
 * Shared types and contracts for the queuecast playback engine
 *
 * Domain types for queue items and resolved media, the event vocabulary published
 * to observers, and the error/result conventions used across packages.
 */

export type { Result } from './domain/Result';

export type { QueueItem, QueueItemStatus, ResolvedMedia, ResolvedMediaError } from './domain/QueueItem';
export { QueueItemFactory, ResolvedMediaValidator } from './domain/QueueItem';

export type {
  PlayerEvent,
  StatusPayload,
  CurrentTrackInfo,
  EventPublisher
} from './domain/PlayerEvent';

export type { QueueError, ErrorDetails } from './domain/errors';
export { ErrorFactory } from './domain/errors';

export { generateUUID, generateShortId } from './utils/uuid';
