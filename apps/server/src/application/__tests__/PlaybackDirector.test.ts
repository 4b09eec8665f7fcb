/**
 * PlaybackDirector tests: transitions between the queue and the player
 */

import { PlaybackDirector } from '../PlaybackDirector';
import { PlaybackStateStore } from '../PlaybackStateStore';
import { QueueStore } from '../QueueStore';
import {
  FakePlayerChannel,
  RecordingPublisher,
  submitReady
} from '../../__tests__/setup/player-fakes';

describe('PlaybackDirector', () => {
  let publisher: RecordingPublisher;
  let queue: QueueStore;
  let playback: PlaybackStateStore;
  let channel: FakePlayerChannel;
  let director: PlaybackDirector;

  const queuedTitles = () => queue.getItems().map((item) => item.resolved?.title);
  const nowPlayingTitle = () => playback.getState().nowPlayingMedia?.title ?? null;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});

    publisher = new RecordingPublisher();
    queue = new QueueStore(publisher);
    playback = new PlaybackStateStore(publisher);
    channel = new FakePlayerChannel();
    director = new PlaybackDirector(queue, playback, channel);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('autoplayIfIdle', () => {
    it('loads a freshly resolved item when nothing plays', async () => {
      const [a] = submitReady(queue, 'A');
      publisher.clear();

      await expect(director.autoplayIfIdle(a)).resolves.toBe(true);

      expect(channel.actions()).toEqual([
        ['loadfile', 'https://cdn.example.test/A.opus', 'replace'],
        ['set_property', 'media-title', 'A']
      ]);
      expect(queue.size()).toBe(0);
      expect(playback.getState().nowPlayingId).toBe(a.id);
      expect(publisher.events).toEqual([
        { type: 'item_removed', payload: { id: a.id } },
        {
          type: 'status',
          payload: {
            paused: false,
            time: 0,
            duration: 180,
            volume: 50,
            current: { id: a.id, title: 'A', thumbnail: null, source: 'example.test' }
          }
        }
      ]);
    });

    it('leaves the queue alone while something plays', async () => {
      const [a, b] = submitReady(queue, 'A', 'B');
      await director.autoplayIfIdle(a);

      await expect(director.autoplayIfIdle(b)).resolves.toBe(false);
      expect(channel.loads()).toHaveLength(1);
      expect(queuedTitles()).toEqual(['B']);
    });

    it('does nothing with autoplay off', async () => {
      const [a] = submitReady(queue, 'A');
      playback.toggleAutoplay();

      await expect(director.autoplayIfIdle(a)).resolves.toBe(false);
      expect(channel.commands).toEqual([]);
    });

    it('does nothing for an item removed meanwhile', async () => {
      const [a] = submitReady(queue, 'A');
      queue.removeAt(a.id);

      await expect(director.autoplayIfIdle(a)).resolves.toBe(false);
      expect(channel.commands).toEqual([]);
    });
  });

  describe('failed loads', () => {
    it('keeps the item queued when the player rejects the load', async () => {
      const [a] = submitReady(queue, 'A');
      channel.respond = (argv) => (argv[0] === 'loadfile' ? { error: 'loading failed' } : undefined);

      await expect(director.playItem(a)).resolves.toBe(false);

      expect(queuedTitles()).toEqual(['A']);
      expect(playback.hasNowPlaying()).toBe(false);
      expect(channel.actions()).toEqual([['loadfile', 'https://cdn.example.test/A.opus', 'replace']]);
    });

    it('keeps the item queued when the player is unavailable', async () => {
      const [a] = submitReady(queue, 'A');
      channel.respond = () => null;

      await expect(director.playItem(a)).resolves.toBe(false);
      expect(queuedTitles()).toEqual(['A']);
    });

    it('refuses items without a stream', async () => {
      const pending = queue.submit('https://example.test/watch?v=pending');

      await expect(director.playItem(pending)).resolves.toBe(false);
      expect(channel.commands).toEqual([]);
    });

    it('stops instead of playing an item removed while it was loading', async () => {
      const [a] = submitReady(queue, 'A');
      channel.respond = (argv) => {
        if (argv[0] === 'loadfile') {
          queue.removeAt(a.id);
        }
        return undefined;
      };

      await expect(director.autoplayIfIdle(a)).resolves.toBe(false);

      expect(playback.getState().nowPlayingId).toBeNull();
      expect(channel.actions()).toEqual([
        ['loadfile', 'https://cdn.example.test/A.opus', 'replace'],
        ['stop']
      ]);
      expect(console.warn).toHaveBeenCalledWith(`Item ${a.id} was removed while loading; stopping the player`);
    });

    it('leaves the current track in place when the next one fails to load', async () => {
      const [a] = submitReady(queue, 'A', 'B');
      await director.autoplayIfIdle(a);
      channel.respond = (argv) => (argv[0] === 'loadfile' ? { error: 'loading failed' } : undefined);

      await director.skip();

      expect(nowPlayingTitle()).toBe('A');
      expect(queuedTitles()).toEqual(['B']);
    });
  });

  describe('advancing', () => {
    it('plays the queue in order and goes idle at the end', async () => {
      const [a] = submitReady(queue, 'A', 'B', 'C');
      await director.autoplayIfIdle(a);

      await director.playNext();
      expect(nowPlayingTitle()).toBe('B');
      await director.playNext();
      expect(nowPlayingTitle()).toBe('C');

      await director.playNext();
      expect(playback.hasNowPlaying()).toBe(false);
      expect(queue.getPlayCursor()).toBe(0);
      expect(channel.actions().filter((command) => command[0] === 'stop')).toEqual([]);
      expect(channel.loads()).toEqual([
        'https://cdn.example.test/A.opus',
        'https://cdn.example.test/B.opus',
        'https://cdn.example.test/C.opus'
      ]);
    });

    it('continues after the slot the playing item came from', async () => {
      const [, b] = submitReady(queue, 'A', 'B', 'C');
      await director.playItem(b);
      expect(queuedTitles()).toEqual(['A', 'C']);

      await director.playNext();
      expect(nowPlayingTitle()).toBe('C');
    });

    it('skips items that are still resolving', async () => {
      const [a] = submitReady(queue, 'A');
      queue.submit('https://example.test/watch?v=pending');
      submitReady(queue, 'C');
      await director.autoplayIfIdle(a);

      await director.playNext();
      expect(nowPlayingTitle()).toBe('C');
      expect(queue.getItems().map((item) => item.status)).toEqual(['pending']);
    });

    it('does not advance on its own with autoplay off', async () => {
      const [a] = submitReady(queue, 'A', 'B');
      await director.autoplayIfIdle(a);
      playback.toggleAutoplay();

      await director.playNext();
      expect(nowPlayingTitle()).toBe('A');
    });

    it('skips regardless of autoplay', async () => {
      const [a] = submitReady(queue, 'A', 'B');
      await director.autoplayIfIdle(a);
      playback.toggleAutoplay();

      await director.skip();
      expect(nowPlayingTitle()).toBe('B');
    });

    it('stops the player when a skip finds nothing left', async () => {
      const [a] = submitReady(queue, 'A');
      await director.autoplayIfIdle(a);

      await director.skip();

      expect(playback.hasNowPlaying()).toBe(false);
      expect(channel.actions().at(-1)).toEqual(['stop']);
      expect(publisher.events.at(-1)).toEqual({
        type: 'status',
        payload: { paused: true, time: 0, duration: 0, volume: 50, current: null }
      });
    });

    it('advances from a finished track while it is still the one playing', async () => {
      const [a] = submitReady(queue, 'A', 'B');
      await director.autoplayIfIdle(a);

      await director.advanceFrom(a.id);

      expect(nowPlayingTitle()).toBe('B');
    });

    it('drops an advance for a track the user already stopped', async () => {
      const [a] = submitReady(queue, 'A', 'B');
      await director.autoplayIfIdle(a);

      await Promise.all([director.stop(), director.advanceFrom(a.id)]);

      expect(playback.hasNowPlaying()).toBe(false);
      expect(queuedTitles()).toEqual(['B']);
      expect(channel.loads()).toEqual(['https://cdn.example.test/A.opus']);
    });

    it('drops an advance with autoplay off', async () => {
      const [a] = submitReady(queue, 'A', 'B');
      await director.autoplayIfIdle(a);
      playback.toggleAutoplay();

      await director.advanceFrom(a.id);

      expect(nowPlayingTitle()).toBe('A');
    });

    it('runs overlapping transitions one after the other', async () => {
      submitReady(queue, 'A', 'B', 'C');

      await Promise.all([director.skip(), director.skip()]);

      expect(channel.loads()).toEqual([
        'https://cdn.example.test/A.opus',
        'https://cdn.example.test/B.opus'
      ]);
      expect(nowPlayingTitle()).toBe('B');
      expect(queuedTitles()).toEqual(['C']);
    });

    it('keeps accepting transitions after one throws', async () => {
      submitReady(queue, 'A');
      channel.respond = () => {
        throw new Error('socket exploded');
      };

      await expect(director.skip()).rejects.toThrow('socket exploded');

      channel.respond = null;
      await director.skip();
      expect(nowPlayingTitle()).toBe('A');
    });
  });

  describe('playNow', () => {
    it('moves a ready item to the front and plays it', async () => {
      const [, , c] = submitReady(queue, 'A', 'B', 'C');

      await expect(director.playNow(c.id)).resolves.toEqual({ success: true, value: true });

      expect(nowPlayingTitle()).toBe('C');
      expect(queuedTitles()).toEqual(['A', 'B']);

      await director.playNext();
      expect(nowPlayingTitle()).toBe('A');
    });

    it('rejects unknown and unresolved items', async () => {
      const pending = queue.submit('https://example.test/watch?v=pending');

      await expect(director.playNow('missing')).resolves.toEqual({ success: false, error: 'NOT_FOUND' });
      await expect(director.playNow(pending.id)).resolves.toEqual({ success: false, error: 'NOT_READY' });
      expect(channel.commands).toEqual([]);
    });
  });

  describe('player controls', () => {
    it('stops and clears now playing even without a reply', async () => {
      const [a] = submitReady(queue, 'A');
      await director.autoplayIfIdle(a);
      channel.respond = () => null;

      await director.stop();

      expect(playback.hasNowPlaying()).toBe(false);
      expect(channel.commands.at(-1)).toEqual(['stop']);
    });

    it('reports whether a pause toggle was accepted', async () => {
      await expect(director.togglePause()).resolves.toBe(true);
      expect(channel.commands).toEqual([['cycle', 'pause']]);

      channel.respond = () => null;
      await expect(director.togglePause()).resolves.toBe(false);
    });

    it('clamps volume and seek', async () => {
      await expect(director.setVolume(150)).resolves.toBe(100);
      await expect(director.seek(-5)).resolves.toBe(0);

      expect(channel.commands).toEqual([
        ['set_property', 'volume', 100],
        ['set_property', 'percent-pos', 0]
      ]);
      expect(playback.getState().volumePercent).toBe(100);
    });
  });
});
