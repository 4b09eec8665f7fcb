import { QueueError, QueueItem, Result, StatusPayload } from '@queuecast/shared';
import { IPlayerSupervisor, IResolverClient } from '../domain/player/interfaces';
import { DebugSnapshot, SearchResult } from '../domain/player/types';
import { ResolutionError } from '../domain/player/errors';
import { IQueueStore } from './QueueStore';
import { PlaybackStateStore } from './PlaybackStateStore';
import { PlaybackDirector } from './PlaybackDirector';
import { ResolutionWorker } from './ResolutionWorker';

/**
 * Control surface exposed to the transport layer
 */
export interface IPlayerService {
  submit(url: string): Result<QueueItem, QueueError>;
  search(query: string): Promise<Result<SearchResult[], ResolutionError>>;
  togglePause(): Promise<boolean>;
  stop(): Promise<void>;
  skip(): Promise<void>;
  setVolume(volumePercent: number): Promise<number>;
  seek(percent: number): Promise<number>;
  clearQueue(): Promise<void>;
  playNow(id: string): Promise<Result<boolean, QueueError>>;
  remove(id: string): Result<QueueItem, QueueError>;
  shuffle(): void;
  moveUp(id: string): Result<void, QueueError>;
  moveDown(id: string): Result<void, QueueError>;
  reorder(oldIndex: number, newIndex: number): Result<void, QueueError>;
  toggleAutoplay(): boolean;
  isAutoplayEnabled(): boolean;
  getQueue(): QueueItem[];
  getStatus(): StatusPayload;
  getDebugSnapshot(): DebugSnapshot;
}

/**
 * Accepts absolute http(s) URLs only
 */
export function normalizeSubmittedUrl(raw: unknown): string | null {
  if (typeof raw !== 'string') return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;

  try {
    const parsed = new URL(trimmed);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? trimmed : null;
  } catch {
    return null;
  }
}

export class PlayerService implements IPlayerService {
  constructor(
    private readonly queue: IQueueStore,
    private readonly playback: PlaybackStateStore,
    private readonly director: PlaybackDirector,
    private readonly worker: ResolutionWorker,
    private readonly resolver: IResolverClient,
    private readonly supervisor: IPlayerSupervisor
  ) {}

  /**
   * Queue a URL; resolution continues in the background
   */
  submit(url: string): Result<QueueItem, QueueError> {
    const normalized = normalizeSubmittedUrl(url);
    if (!normalized) {
      return { success: false, error: 'INVALID_URL' };
    }

    const item = this.queue.submit(normalized);
    this.worker.enqueue({ id: item.id, url: normalized });
    return { success: true, value: item };
  }

  search(query: string): Promise<Result<SearchResult[], ResolutionError>> {
    return this.resolver.search(query);
  }

  togglePause(): Promise<boolean> {
    return this.director.togglePause();
  }

  stop(): Promise<void> {
    return this.director.stop();
  }

  skip(): Promise<void> {
    return this.director.skip();
  }

  setVolume(volumePercent: number): Promise<number> {
    return this.director.setVolume(volumePercent);
  }

  seek(percent: number): Promise<number> {
    return this.director.seek(percent);
  }

  /**
   * Empty the queue and stop whatever is playing
   */
  async clearQueue(): Promise<void> {
    this.queue.clear();
    await this.director.stop();
  }

  playNow(id: string): Promise<Result<boolean, QueueError>> {
    return this.director.playNow(id);
  }

  remove(id: string): Result<QueueItem, QueueError> {
    return this.queue.removeAt(id);
  }

  /**
   * Shuffle, keeping the now-playing id's slot at the top if it is queued
   */
  shuffle(): void {
    this.queue.shuffleExceptLeading(this.playback.getState().nowPlayingId ?? undefined);
  }

  moveUp(id: string): Result<void, QueueError> {
    return this.queue.swapWithPrevious(id);
  }

  moveDown(id: string): Result<void, QueueError> {
    return this.queue.swapWithNext(id);
  }

  reorder(oldIndex: number, newIndex: number): Result<void, QueueError> {
    return this.queue.moveTo(oldIndex, newIndex);
  }

  toggleAutoplay(): boolean {
    return this.playback.toggleAutoplay();
  }

  isAutoplayEnabled(): boolean {
    return this.playback.isAutoplayEnabled();
  }

  getQueue(): QueueItem[] {
    return this.queue.getItems();
  }

  getStatus(): StatusPayload {
    return this.playback.toStatusPayload();
  }

  getDebugSnapshot(): DebugSnapshot {
    const items = this.queue.getItems();
    return {
      playerStatus: describeSupervisor(this.supervisor),
      socketExists: this.supervisor.socketExists(),
      queueLength: items.length,
      queueItems: items.map((item) => ({
        id: item.id,
        status: item.status,
        hasDetails: item.resolved !== undefined,
        title: item.resolved ? item.resolved.title : 'No details'
      })),
      playbackState: this.playback.getState(),
      autoplayEnabled: this.playback.isAutoplayEnabled(),
      pendingResolutions: this.worker.pendingCount()
    };
  }
}

function describeSupervisor(supervisor: IPlayerSupervisor): string {
  switch (supervisor.getState()) {
    case 'not_started':
      return 'Not started';
    case 'starting':
      return 'Starting';
    case 'running':
      return `Running (PID: ${supervisor.getPid() ?? 'unknown'})`;
    case 'dead':
      return 'Dead';
  }
}
