import {
  EventPublisher,
  PlayerEvent,
  QueueError,
  QueueItem,
  QueueItemFactory,
  ResolvedMedia,
  Result
} from '@queuecast/shared';

/**
 * Outcome the resolution worker hands back for one item
 */
export type AttachOutcome =
  | { readonly ok: true; readonly media: ResolvedMedia }
  | { readonly ok: false };

/**
 * Random source in [0, 1); injectable so shuffles are reproducible in tests
 */
export type RandomSource = () => number;

/**
 * Queue store interface for the ordered list of not-yet-playing items
 */
export interface IQueueStore {
  submit(url: string): QueueItem;
  attachResult(id: string, outcome: AttachOutcome): QueueItem | null;
  findIndex(id: string): Result<number, QueueError>;
  get(id: string): QueueItem | null;
  removeAt(id: string): Result<QueueItem, QueueError>;
  moveToFront(id: string): Result<void, QueueError>;
  swapWithPrevious(id: string): Result<void, QueueError>;
  swapWithNext(id: string): Result<void, QueueError>;
  moveTo(oldIndex: number, newIndex: number): Result<void, QueueError>;
  shuffleExceptLeading(protectedId?: string): void;
  clear(): void;
  takeForPlayback(id: string): Result<QueueItem, QueueError>;
  nextReady(fromCursor: boolean): QueueItem | null;
  resetPlayCursor(): void;
  getPlayCursor(): number;
  getItems(): QueueItem[];
  size(): number;
}

/**
 * Single owner of the queue.
 *
 * Every operation is synchronous, so operations never interleave on the event loop,
 * and each mutation publishes its event before returning.
 *
 * The play cursor marks where the playing item sat when it left the queue: items at
 * index >= cursor come after it. Removals, moves and inserts keep it pointing at the
 * same boundary.
 */
export class QueueStore implements IQueueStore {
  private items: QueueItem[] = [];
  private playCursor = 0;

  constructor(
    private readonly publisher: EventPublisher,
    private readonly random: RandomSource = Math.random
  ) {}

  /**
   * Append a pending item at the tail
   */
  submit(url: string): QueueItem {
    let item = QueueItemFactory.pending(url);
    while (this.indexOf(item.id) >= 0) {
      item = QueueItemFactory.pending(url);
    }

    this.items.push(item);
    this.publish({ type: 'queue_update', payload: { id: item.id, item } });
    return item;
  }

  /**
   * Record a resolution outcome. Null (and no event) when the item left the queue meanwhile.
   */
  attachResult(id: string, outcome: AttachOutcome): QueueItem | null {
    const index = this.indexOf(id);
    if (index < 0) {
      return null;
    }

    const current = this.items[index];
    const updated = outcome.ok
      ? QueueItemFactory.ready(current, outcome.media)
      : QueueItemFactory.failed(current);
    this.items[index] = updated;

    this.publish({ type: 'queue_update', payload: { id, item: updated } });
    return updated;
  }

  findIndex(id: string): Result<number, QueueError> {
    const index = this.indexOf(id);
    return index < 0
      ? { success: false, error: 'NOT_FOUND' }
      : { success: true, value: index };
  }

  get(id: string): QueueItem | null {
    const index = this.indexOf(id);
    return index < 0 ? null : this.items[index];
  }

  removeAt(id: string): Result<QueueItem, QueueError> {
    const index = this.indexOf(id);
    if (index < 0) {
      return { success: false, error: 'NOT_FOUND' };
    }

    const removed = this.detach(index);
    this.publish({ type: 'item_removed', payload: { id } });
    return { success: true, value: removed };
  }

  /**
   * Move an item to the head. The whole queue then counts as upcoming.
   */
  moveToFront(id: string): Result<void, QueueError> {
    const index = this.indexOf(id);
    if (index < 0) {
      return { success: false, error: 'NOT_FOUND' };
    }

    if (index > 0) {
      const [item] = this.items.splice(index, 1);
      this.items.unshift(item);
    }
    this.playCursor = 0;
    this.publishRefresh();
    return { success: true, value: undefined };
  }

  swapWithPrevious(id: string): Result<void, QueueError> {
    const index = this.indexOf(id);
    if (index < 0) {
      return { success: false, error: 'NOT_FOUND' };
    }

    if (index > 0) {
      this.relocate(index, index - 1);
      this.publishRefresh();
    }
    return { success: true, value: undefined };
  }

  swapWithNext(id: string): Result<void, QueueError> {
    const index = this.indexOf(id);
    if (index < 0) {
      return { success: false, error: 'NOT_FOUND' };
    }

    if (index < this.items.length - 1) {
      this.relocate(index, index + 1);
      this.publishRefresh();
    }
    return { success: true, value: undefined };
  }

  /**
   * Move the item at oldIndex so it ends up at newIndex
   */
  moveTo(oldIndex: number, newIndex: number): Result<void, QueueError> {
    if (!this.inRange(oldIndex) || !this.inRange(newIndex)) {
      return { success: false, error: 'INDEX_OUT_OF_RANGE' };
    }

    this.relocate(oldIndex, newIndex);
    this.publishRefresh();
    return { success: true, value: undefined };
  }

  /**
   * Fisher-Yates over every item except the protected one, which goes to index 0
   */
  shuffleExceptLeading(protectedId?: string): void {
    const protectedIndex = protectedId === undefined ? -1 : this.indexOf(protectedId);
    const leading = protectedIndex >= 0 ? this.items[protectedIndex] : null;
    const rest = this.items.filter((_, index) => index !== protectedIndex);

    for (let i = rest.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [rest[i], rest[j]] = [rest[j], rest[i]];
    }

    this.items = leading ? [leading, ...rest] : rest;
    this.playCursor = 0;
    this.publishRefresh();
  }

  /**
   * Empty the queue. Now-playing state lives elsewhere and is untouched.
   */
  clear(): void {
    this.items = [];
    this.playCursor = 0;
    this.publish({ type: 'queue_cleared', payload: {} });
  }

  /**
   * Remove an item because it started playing; its slot becomes the play cursor
   */
  takeForPlayback(id: string): Result<QueueItem, QueueError> {
    const index = this.indexOf(id);
    if (index < 0) {
      return { success: false, error: 'NOT_FOUND' };
    }

    const [taken] = this.items.splice(index, 1);
    this.playCursor = index;
    this.publish({ type: 'item_removed', payload: { id } });
    return { success: true, value: taken };
  }

  /**
   * First ready item from the head, or from the play cursor when `fromCursor`
   */
  nextReady(fromCursor: boolean): QueueItem | null {
    const start = fromCursor ? this.playCursor : 0;
    for (let index = start; index < this.items.length; index++) {
      if (QueueItemFactory.isPlayable(this.items[index])) {
        return this.items[index];
      }
    }
    return null;
  }

  resetPlayCursor(): void {
    this.playCursor = 0;
  }

  getPlayCursor(): number {
    return this.playCursor;
  }

  getItems(): QueueItem[] {
    return [...this.items];
  }

  size(): number {
    return this.items.length;
  }

  private indexOf(id: string): number {
    return this.items.findIndex((item) => item.id === id);
  }

  private inRange(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.items.length;
  }

  private detach(index: number): QueueItem {
    const [item] = this.items.splice(index, 1);
    if (index < this.playCursor) {
      this.playCursor--;
    }
    return item;
  }

  /**
   * Shared by every move so the cursor boundary shifts the same way for each
   */
  private relocate(oldIndex: number, newIndex: number): void {
    const item = this.detach(oldIndex);
    this.items.splice(newIndex, 0, item);
    if (newIndex < this.playCursor) {
      this.playCursor++;
    }
  }

  private publishRefresh(): void {
    this.publish({ type: 'queue_refreshed', payload: { items: this.getItems() } });
  }

  private publish(event: PlayerEvent): void {
    try {
      this.publisher.publish(event);
    } catch (error) {
      console.error('Queue event publish error:', error);
    }
  }
}
