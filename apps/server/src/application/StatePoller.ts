/**
 * StatePoller - fixed-interval reconciliation of player state
 *
 * Reads the player's properties on each tick, stores them in the playback state,
 * publishes a status snapshot and detects the end of a track.
 */

import { IPlayerChannel } from '../domain/player/interfaces';
import { PlaybackStateStore } from './PlaybackStateStore';

export interface StatePollerOptions {
  readonly intervalMs: number;
  /** idle ticks tolerated after a load before it is treated as failed */
  readonly loadConfirmTicks: number;
}

export const DEFAULT_POLLER_OPTIONS: StatePollerOptions = {
  intervalMs: 500,
  loadConfirmTicks: 20
};

/**
 * A track ended when something was playing before this tick and the player is now idle
 */
export function isEndOfTrack(wasPlaying: boolean, nowIdle: boolean): boolean {
  return wasPlaying && nowIdle;
}

/**
 * The part of the director the poller drives
 */
export interface AdvanceTarget {
  advanceFrom(finishedId: string): Promise<void>;
}

export class StatePoller {
  private readonly options: StatePollerOptions;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private unconfirmedId: string | null = null;
  private unconfirmedIdleTicks = 0;

  constructor(
    private readonly channel: IPlayerChannel,
    private readonly playback: PlaybackStateStore,
    private readonly director: AdvanceTarget,
    options: Partial<StatePollerOptions> = {}
  ) {
    this.options = { ...DEFAULT_POLLER_OPTIONS, ...options };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * One reconciliation pass. Unreadable properties leave the stored values alone.
   * An idle reading only counts against the item that was playing when the pass began.
   */
  async tick(): Promise<void> {
    const wasPlaying = this.playback.isPlaying();
    const playingId = this.playback.getState().nowPlayingId;
    const idle = await this.readBoolean('idle-active');

    if (idle === false) {
      this.playback.confirmLoaded();
      this.unconfirmedId = null;
      this.unconfirmedIdleTicks = 0;

      const paused = await this.readBoolean('pause');
      const positionSeconds = await this.readNumber('time-pos');
      const durationSeconds = await this.readNumber('duration');
      this.playback.applyPlaying({ paused, positionSeconds, durationSeconds });
    }

    const volume = await this.readNumber('volume');
    if (volume !== undefined) {
      this.playback.setVolume(volume);
    }

    let advance = false;
    if (idle === true) {
      const { nowPlayingId, awaitingLoad } = this.playback.getState();
      if (nowPlayingId !== null && nowPlayingId === playingId) {
        advance = awaitingLoad ? this.loadTimedOut() : isEndOfTrack(wasPlaying, true);
      }
      if (!this.playback.getState().awaitingLoad) {
        this.playback.applyIdle();
      }
    }

    this.playback.publishStatus();

    if (advance && playingId !== null) {
      await this.director.advanceFrom(playingId);
    }
  }

  /**
   * Count an idle tick against the pending load; true once the allowance is used up
   */
  private loadTimedOut(): boolean {
    const id = this.playback.getState().nowPlayingId;
    if (id !== this.unconfirmedId) {
      this.unconfirmedId = id;
      this.unconfirmedIdleTicks = 0;
    }

    this.unconfirmedIdleTicks++;
    if (this.unconfirmedIdleTicks < this.options.loadConfirmTicks) {
      return false;
    }

    console.error(`Player stayed idle after loading item ${id ?? 'unknown'}; treating the load as failed`);
    this.playback.confirmLoaded();
    this.unconfirmedId = null;
    this.unconfirmedIdleTicks = 0;
    return true;
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      void this.runTick();
    }, this.options.intervalMs);
    this.timer.unref();
  }

  private async runTick(): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      console.error('State poll tick failed:', error);
    } finally {
      if (this.running) {
        this.schedule();
      }
    }
  }

  private async readBoolean(name: string): Promise<boolean | undefined> {
    const value = await this.channel.getProperty(name);
    return typeof value === 'boolean' ? value : undefined;
  }

  private async readNumber(name: string): Promise<number | undefined> {
    const value = await this.channel.getProperty(name);
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
  }
}
