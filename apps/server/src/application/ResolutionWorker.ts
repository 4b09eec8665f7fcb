import { EventPublisher, QueueItem, ResolvedMedia, Result } from '@queuecast/shared';
import { IResolverClient } from '../domain/player/interfaces';
import { ResolutionRequest } from '../domain/player/types';
import { ResolutionError, signalsStaleCredentials } from '../domain/player/errors';
import { IQueueStore } from './QueueStore';

/**
 * The part of the director the worker hands ready items to
 */
export interface AutoplayTarget {
  autoplayIfIdle(item: QueueItem): Promise<boolean>;
}

/**
 * Single consumer of submitted URLs.
 *
 * Requests wait in an unbounded FIFO and are resolved one at a time; enqueueing never
 * blocks. A failed resolution is final: the user resubmits.
 */
export class ResolutionWorker {
  private readonly pending: ResolutionRequest[] = [];
  private active = false;
  private current: ResolutionRequest | null = null;
  private idle: Promise<void> = Promise.resolve();
  private stopped = false;

  constructor(
    private readonly resolver: IResolverClient,
    private readonly queue: IQueueStore,
    private readonly director: AutoplayTarget,
    private readonly publisher: EventPublisher
  ) {}

  enqueue(request: ResolutionRequest): void {
    if (this.stopped) {
      console.warn(`Resolution worker stopped, dropping ${request.id}`);
      return;
    }

    this.pending.push(request);
    if (!this.active) {
      this.active = true;
      this.idle = this.drain();
    }
  }

  /**
   * Requests waiting or in progress
   */
  pendingCount(): number {
    return this.pending.length + (this.current ? 1 : 0);
  }

  /**
   * Resolves once the FIFO is empty
   */
  drained(): Promise<void> {
    return this.idle;
  }

  stop(): void {
    this.stopped = true;
    this.pending.length = 0;
  }

  private async drain(): Promise<void> {
    try {
      let request = this.pending.shift();
      while (request && !this.stopped) {
        this.current = request;
        await this.process(request);
        this.current = null;
        request = this.pending.shift();
      }
    } finally {
      this.current = null;
      this.active = false;
    }
  }

  private async process({ id, url }: ResolutionRequest): Promise<void> {
    console.log(`Resolving ${url} for item ${id}`);

    let result: Result<ResolvedMedia, ResolutionError>;
    try {
      result = await this.resolver.resolve(url);
    } catch (error) {
      console.error(`Resolver threw for item ${id}:`, error);
      this.queue.attachResult(id, { ok: false });
      return;
    }

    if (!result.success) {
      console.error(`Resolution failed for item ${id}: ${result.error}`);
      const updated = this.queue.attachResult(id, { ok: false });
      if (updated && signalsStaleCredentials(result.error)) {
        this.notifyCredentialsStale(url, id);
      }
      return;
    }

    const updated = this.queue.attachResult(id, { ok: true, media: result.value });
    if (!updated) {
      console.warn(`Item ${id} was removed before its resolution finished`);
      return;
    }

    console.log(`Item ${id} ready: ${result.value.title}`);
    try {
      await this.director.autoplayIfIdle(updated);
    } catch (error) {
      console.error(`Autoplay failed for item ${id}:`, error);
    }
  }

  private notifyCredentialsStale(url: string, itemId: string): void {
    try {
      this.publisher.publish({ type: 'credentials_refresh_needed', payload: { url, itemId } });
    } catch (error) {
      console.error('Credential refresh notification failed:', error);
    }
  }
}
