import { generateShortId } from '../utils/uuid';
import { Result } from './Result';

/**
 * Playable stream metadata produced by the resolver.
 * Frozen when created; never mutated afterwards.
 */
export interface ResolvedMedia {
  readonly title: string;
  readonly thumbnailUrl?: string;
  readonly streamUrl: string;
  readonly durationSeconds: number;
  readonly sourceLabel: string;
}

export type QueueItemStatus = 'pending' | 'ready' | 'error';

/**
 * A submitted URL waiting in the queue.
 * An item with status 'ready' always carries `resolved`.
 */
export interface QueueItem {
  readonly id: string;
  readonly sourceUrl: string;
  readonly status: QueueItemStatus;
  readonly resolved?: ResolvedMedia;
}

export type ResolvedMediaError = 'MALFORMED_RESPONSE';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Builds ResolvedMedia from a resolver response body
 */
export class ResolvedMediaValidator {
  /**
   * Accepts `audioUrl` or `streamUrl` for the stream; everything else is optional.
   * `fallbackSource` labels the media when the body carries no `source`.
   */
  static fromPayload(payload: unknown, fallbackSource: string): Result<ResolvedMedia, ResolvedMediaError> {
    if (!isRecord(payload)) {
      return { success: false, error: 'MALFORMED_RESPONSE' };
    }

    const streamUrl = nonEmptyString(payload.audioUrl) ?? nonEmptyString(payload.streamUrl);
    if (!streamUrl) {
      return { success: false, error: 'MALFORMED_RESPONSE' };
    }

    const duration = typeof payload.duration === 'number' && Number.isFinite(payload.duration) && payload.duration > 0
      ? payload.duration
      : 0;
    const thumbnailUrl = nonEmptyString(payload.thumbnail);

    const media: ResolvedMedia = {
      title: nonEmptyString(payload.title) ?? 'Unknown',
      streamUrl,
      durationSeconds: duration,
      sourceLabel: nonEmptyString(payload.source) ?? fallbackSource,
      ...(thumbnailUrl !== undefined ? { thumbnailUrl } : {})
    };

    return { success: true, value: Object.freeze(media) };
  }
}

/**
 * QueueItem creation and state transitions.
 * Items are replaced, not mutated, on every transition.
 */
export class QueueItemFactory {
  static pending(sourceUrl: string, id: string = generateShortId()): QueueItem {
    return { id, sourceUrl, status: 'pending' };
  }

  static ready(item: QueueItem, resolved: ResolvedMedia): QueueItem {
    return { id: item.id, sourceUrl: item.sourceUrl, status: 'ready', resolved };
  }

  static failed(item: QueueItem): QueueItem {
    return { id: item.id, sourceUrl: item.sourceUrl, status: 'error' };
  }

  static isPlayable(item: QueueItem): item is QueueItem & { status: 'ready'; resolved: ResolvedMedia } {
    return item.status === 'ready' && item.resolved !== undefined;
  }
}
