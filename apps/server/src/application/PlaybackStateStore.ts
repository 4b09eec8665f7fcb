import {
  EventPublisher,
  PlayerEvent,
  ResolvedMedia,
  StatusPayload
} from '@queuecast/shared';
import { PlaybackState } from '../domain/player/types';

/**
 * Values read from the player on a non-idle poll tick; absent means "no update"
 */
export interface PlayingReading {
  readonly paused?: boolean;
  readonly positionSeconds?: number;
  readonly durationSeconds?: number;
}

export function clampPercent(value: number): number {
  return Math.max(0, Math.min(100, value));
}

/**
 * Owner of the process-wide playback state and the autoplay flag.
 * All mutations are synchronous; status events are published on request.
 */
export class PlaybackStateStore {
  private state: PlaybackState;
  private autoplayEnabled = true;

  constructor(
    private readonly publisher: EventPublisher,
    initialVolume = 50
  ) {
    this.state = {
      nowPlayingId: null,
      nowPlayingMedia: null,
      paused: true,
      positionSeconds: 0,
      durationSeconds: 0,
      volumePercent: clampPercent(initialVolume),
      awaitingLoad: false
    };
  }

  getState(): PlaybackState {
    return this.state;
  }

  /**
   * Something is loaded and not paused
   */
  isPlaying(): boolean {
    return this.state.nowPlayingId !== null && !this.state.paused;
  }

  hasNowPlaying(): boolean {
    return this.state.nowPlayingId !== null;
  }

  isAutoplayEnabled(): boolean {
    return this.autoplayEnabled;
  }

  toggleAutoplay(): boolean {
    this.autoplayEnabled = !this.autoplayEnabled;
    this.publish({ type: 'autoplay_toggled', payload: { enabled: this.autoplayEnabled } });
    return this.autoplayEnabled;
  }

  /**
   * Install a freshly loaded track. It counts as unconfirmed until the player is seen busy.
   */
  startPlaying(id: string, media: ResolvedMedia): void {
    this.state = {
      ...this.state,
      nowPlayingId: id,
      nowPlayingMedia: { ...media },
      paused: false,
      positionSeconds: 0,
      durationSeconds: media.durationSeconds,
      awaitingLoad: true
    };
  }

  clearNowPlaying(): void {
    this.state = {
      ...this.state,
      nowPlayingId: null,
      nowPlayingMedia: null,
      paused: true,
      positionSeconds: 0,
      durationSeconds: 0,
      awaitingLoad: false
    };
  }

  confirmLoaded(): void {
    if (this.state.awaitingLoad) {
      this.state = { ...this.state, awaitingLoad: false };
    }
  }

  applyIdle(): void {
    this.state = { ...this.state, paused: true, positionSeconds: 0, durationSeconds: 0 };
  }

  applyPlaying(reading: PlayingReading): void {
    this.state = {
      ...this.state,
      paused: reading.paused ?? this.state.paused,
      positionSeconds: reading.positionSeconds ?? this.state.positionSeconds,
      durationSeconds: reading.durationSeconds ?? this.state.durationSeconds
    };
  }

  setVolume(volumePercent: number): void {
    this.state = { ...this.state, volumePercent: clampPercent(volumePercent) };
  }

  toStatusPayload(): StatusPayload {
    const { nowPlayingId, nowPlayingMedia } = this.state;
    return {
      paused: this.state.paused,
      time: this.state.positionSeconds,
      duration: this.state.durationSeconds,
      volume: this.state.volumePercent,
      current: nowPlayingId !== null && nowPlayingMedia !== null
        ? {
            id: nowPlayingId,
            title: nowPlayingMedia.title,
            thumbnail: nowPlayingMedia.thumbnailUrl ?? null,
            source: nowPlayingMedia.sourceLabel
          }
        : null
    };
  }

  publishStatus(): void {
    this.publish({ type: 'status', payload: this.toStatusPayload() });
  }

  private publish(event: PlayerEvent): void {
    try {
      this.publisher.publish(event);
    } catch (error) {
      console.error('Playback event publish error:', error);
    }
  }
}
