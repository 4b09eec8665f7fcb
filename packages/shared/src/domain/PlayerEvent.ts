import { QueueItem } from './QueueItem';

/**
 * The track shown as "now playing" to observers
 */
export interface CurrentTrackInfo {
  readonly id: string;
  readonly title: string;
  readonly thumbnail: string | null;
  readonly source: string;
}

/**
 * Playback status snapshot sent to observers on every poll tick and transition
 */
export interface StatusPayload {
  readonly paused: boolean;
  readonly time: number;
  readonly duration: number;
  readonly volume: number;
  readonly current: CurrentTrackInfo | null;
}

/**
 * Events published by the playback engine, in mutation order
 */
export type PlayerEvent =
  | { type: 'item_removed'; payload: { id: string } }
  | { type: 'queue_update'; payload: { id: string; item: QueueItem } }
  | { type: 'queue_refreshed'; payload: { items: readonly QueueItem[] } }
  | { type: 'queue_cleared'; payload: Record<string, never> }
  | { type: 'status'; payload: StatusPayload }
  | { type: 'autoplay_toggled'; payload: { enabled: boolean } }
  | { type: 'credentials_refresh_needed'; payload: { url: string; itemId: string } };

/**
 * "publish event E with payload P". Implementations must not throw back into the engine;
 * callers wrap them anyway.
 */
export interface EventPublisher {
  publish(event: PlayerEvent): void;
}
