/**
 * PlaybackDirector - autoplay and transition policy
 *
 * Decides what plays next, loads it through the player channel and keeps the queue
 * and now-playing state disjoint. Transitions run one at a time.
 */

import { QueueError, QueueItem, QueueItemFactory, Result } from '@queuecast/shared';
import { IPlayerChannel } from '../domain/player/interfaces';
import { IQueueStore } from './QueueStore';
import { PlaybackStateStore, clampPercent } from './PlaybackStateStore';

type AdvanceOutcome = 'played' | 'load_failed' | 'exhausted';

export class PlaybackDirector {
  private transition: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly queue: IQueueStore,
    private readonly playback: PlaybackStateStore,
    private readonly channel: IPlayerChannel
  ) {}

  /**
   * Load a ready item. True once the player acknowledged the load and the item moved
   * from the queue to now-playing.
   */
  playItem(item: QueueItem): Promise<boolean> {
    return this.exclusive(() => this.load(item));
  }

  /**
   * Autoplay advance: first ready item after the playing one, or from the head when
   * nothing plays. Does nothing while autoplay is off.
   */
  playNext(): Promise<void> {
    return this.exclusive(async () => {
      if (!this.playback.isAutoplayEnabled()) {
        return;
      }
      await this.advance();
    });
  }

  /**
   * Autoplay advance once `finishedId` stopped on its own. Dropped when that item is
   * no longer the one playing by the time this transition runs.
   */
  advanceFrom(finishedId: string): Promise<void> {
    return this.exclusive(async () => {
      if (this.playback.getState().nowPlayingId !== finishedId || !this.playback.isAutoplayEnabled()) {
        return;
      }
      await this.advance();
    });
  }

  /**
   * User-requested advance; ignores the autoplay flag and stops the player when
   * nothing is left
   */
  skip(): Promise<void> {
    return this.exclusive(async () => {
      const outcome = await this.advance();
      if (outcome === 'exhausted') {
        await this.channel.sendCommand(['stop']);
      }
    });
  }

  /**
   * Start a freshly resolved item when autoplay is on and nothing is playing
   */
  autoplayIfIdle(item: QueueItem): Promise<boolean> {
    return this.exclusive(async () => {
      if (!this.playback.isAutoplayEnabled() || this.playback.hasNowPlaying()) {
        return false;
      }

      const current = this.queue.get(item.id);
      if (!current) {
        return false;
      }
      console.log(`Starting autoplay for item ${item.id}`);
      return this.load(current);
    });
  }

  /**
   * Move a ready item to the front and play it
   */
  playNow(id: string): Promise<Result<boolean, QueueError>> {
    return this.exclusive(async (): Promise<Result<boolean, QueueError>> => {
      const item = this.queue.get(id);
      if (!item) {
        return { success: false, error: 'NOT_FOUND' };
      }
      if (!QueueItemFactory.isPlayable(item)) {
        return { success: false, error: 'NOT_READY' };
      }

      this.queue.moveToFront(id);
      return { success: true, value: await this.load(item) };
    });
  }

  /**
   * Best-effort stop; local state is cleared whatever the player answers
   */
  stop(): Promise<void> {
    return this.exclusive(async () => {
      const reply = await this.channel.sendCommand(['stop']);
      if (!reply) {
        console.warn('Stop command got no reply; clearing playback state anyway');
      }
      this.goIdle();
    });
  }

  async togglePause(): Promise<boolean> {
    const reply = await this.channel.sendCommand(['cycle', 'pause']);
    return reply?.error === 'success';
  }

  /**
   * Set the player volume; returns the clamped value applied
   */
  async setVolume(volumePercent: number): Promise<number> {
    const volume = clampPercent(volumePercent);
    await this.channel.setProperty('volume', volume);
    this.playback.setVolume(volume);
    return volume;
  }

  /**
   * Seek to a percentage of the current track; returns the clamped value applied
   */
  async seek(percent: number): Promise<number> {
    const position = clampPercent(percent);
    await this.channel.setProperty('percent-pos', position);
    return position;
  }

  private async advance(): Promise<AdvanceOutcome> {
    const next = this.queue.nextReady(this.playback.hasNowPlaying());
    if (!next) {
      this.goIdle();
      return 'exhausted';
    }

    return (await this.load(next)) ? 'played' : 'load_failed';
  }

  private async load(item: QueueItem): Promise<boolean> {
    if (!QueueItemFactory.isPlayable(item)) {
      console.error(`No stream URL for item ${item.id}, not playing it`);
      return false;
    }

    const media = item.resolved;
    console.log(`Loading stream for item ${item.id}: ${media.streamUrl}`);
    const reply = await this.channel.sendCommand(['loadfile', media.streamUrl, 'replace']);
    if (!reply || reply.error !== 'success') {
      console.error(`Player did not load item ${item.id}: ${reply?.error ?? 'no reply'}`);
      return false;
    }

    // Queue removal and now-playing install happen in one synchronous step
    const taken = this.queue.takeForPlayback(item.id);
    if (!taken.success) {
      console.warn(`Item ${item.id} was removed while loading; stopping the player`);
      await this.channel.sendCommand(['stop']);
      this.goIdle();
      return false;
    }
    this.playback.startPlaying(item.id, media);
    this.playback.publishStatus();

    await this.channel.setProperty('media-title', media.title);
    return true;
  }

  private goIdle(): void {
    this.playback.clearNowPlaying();
    this.queue.resetPlayCursor();
    this.playback.publishStatus();
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.transition.then(task, task);
    this.transition = run.catch((error: unknown) => {
      console.error('Playback transition failed:', error);
    });
    return run;
  }
}
