/**
 * StatePoller tests: property reconciliation and end-of-track detection
 */

import { PlaybackDirector } from '../PlaybackDirector';
import { PlaybackStateStore } from '../PlaybackStateStore';
import { QueueStore } from '../QueueStore';
import { AdvanceTarget, StatePoller, isEndOfTrack } from '../StatePoller';
import {
  FakePlayerChannel,
  RecordingPublisher,
  mediaFor,
  submitReady
} from '../../__tests__/setup/player-fakes';

describe('isEndOfTrack', () => {
  it.each([
    [true, true, true],
    [true, false, false],
    [false, true, false],
    [false, false, false]
  ])('wasPlaying=%p nowIdle=%p -> %p', (wasPlaying, nowIdle, expected) => {
    expect(isEndOfTrack(wasPlaying, nowIdle)).toBe(expected);
  });
});

describe('StatePoller', () => {
  let publisher: RecordingPublisher;
  let playback: PlaybackStateStore;
  let channel: FakePlayerChannel;
  let advanceFrom: jest.Mock<Promise<void>, [string]>;
  let poller: StatePoller;

  const busy = (overrides: { pause?: boolean; time?: number; duration?: number } = {}) => {
    channel.properties.set('idle-active', false);
    channel.properties.set('pause', overrides.pause ?? false);
    channel.properties.set('time-pos', overrides.time ?? 10);
    channel.properties.set('duration', overrides.duration ?? 180);
  };

  const idle = () => {
    channel.properties.clear();
    channel.properties.set('idle-active', true);
  };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});

    publisher = new RecordingPublisher();
    playback = new PlaybackStateStore(publisher);
    channel = new FakePlayerChannel();
    advanceFrom = jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined);
    const director: AdvanceTarget = { advanceFrom };
    poller = new StatePoller(channel, playback, director, { intervalMs: 500, loadConfirmTicks: 3 });
  });

  afterEach(() => {
    poller.stop();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('stores what a busy player reports and publishes status', async () => {
    playback.startPlaying('abc', mediaFor('Song', 180));
    busy({ time: 42.5, duration: 181 });
    channel.properties.set('volume', 70);

    await poller.tick();

    const state = playback.getState();
    expect(state.awaitingLoad).toBe(false);
    expect(state.positionSeconds).toBe(42.5);
    expect(state.durationSeconds).toBe(181);
    expect(state.volumePercent).toBe(70);
    expect(publisher.types()).toEqual(['status']);
    expect(advanceFrom).not.toHaveBeenCalled();
  });

  it('advances when a playing track ends', async () => {
    playback.startPlaying('abc', mediaFor('Song'));
    busy();
    await poller.tick();

    idle();
    await poller.tick();

    expect(advanceFrom).toHaveBeenCalledTimes(1);
    expect(advanceFrom).toHaveBeenCalledWith('abc');
    expect(playback.getState().paused).toBe(true);
    expect(playback.getState().positionSeconds).toBe(0);
  });

  it('does not advance when the player was paused', async () => {
    playback.startPlaying('abc', mediaFor('Song'));
    busy({ pause: true });
    await poller.tick();

    idle();
    await poller.tick();

    expect(advanceFrom).not.toHaveBeenCalled();
  });

  it('does not advance while nothing is loaded', async () => {
    idle();
    await poller.tick();
    await poller.tick();

    expect(advanceFrom).not.toHaveBeenCalled();
  });

  it('tolerates idle ticks right after a load, then gives up on it', async () => {
    playback.startPlaying('abc', mediaFor('Song'));
    idle();

    await poller.tick();
    await poller.tick();
    expect(advanceFrom).not.toHaveBeenCalled();
    expect(playback.getState().paused).toBe(false);
    expect(playback.getState().awaitingLoad).toBe(true);

    await poller.tick();
    expect(advanceFrom).toHaveBeenCalledWith('abc');
    expect(playback.getState().awaitingLoad).toBe(false);
    expect(console.error).toHaveBeenCalledWith(
      'Player stayed idle after loading item abc; treating the load as failed'
    );
  });

  it('restarts the idle allowance for each new load', async () => {
    playback.startPlaying('first', mediaFor('First'));
    idle();
    await poller.tick();
    await poller.tick();

    playback.startPlaying('second', mediaFor('Second'));
    await poller.tick();
    await poller.tick();
    expect(advanceFrom).not.toHaveBeenCalled();

    await poller.tick();
    expect(advanceFrom).toHaveBeenCalledTimes(1);
    expect(advanceFrom).toHaveBeenCalledWith('second');
  });

  it('leaves state alone when the player cannot be read', async () => {
    playback.startPlaying('abc', mediaFor('Song', 90));
    channel.respond = () => null;

    await poller.tick();

    expect(playback.getState().durationSeconds).toBe(90);
    expect(playback.getState().paused).toBe(false);
    expect(publisher.types()).toEqual(['status']);
    expect(advanceFrom).not.toHaveBeenCalled();
  });

  it('ignores an idle reading when playback was cleared during the read', async () => {
    playback.startPlaying('abc', mediaFor('Song'));
    busy();
    await poller.tick();

    idle();
    channel.respond = (argv) => {
      if (argv[1] === 'idle-active') {
        playback.clearNowPlaying();
      }
      return undefined;
    };
    await poller.tick();

    expect(advanceFrom).not.toHaveBeenCalled();
  });

  it('ticks on its interval until stopped', async () => {
    jest.useFakeTimers();
    idle();

    poller.start();
    expect(poller.isRunning()).toBe(true);

    await jest.advanceTimersByTimeAsync(500);
    expect(publisher.types()).toEqual(['status']);

    await jest.advanceTimersByTimeAsync(500);
    expect(publisher.types()).toEqual(['status', 'status']);

    poller.stop();
    await jest.advanceTimersByTimeAsync(2000);
    expect(poller.isRunning()).toBe(false);
    expect(publisher.types()).toHaveLength(2);
  });

  it('keeps polling after a failing tick', async () => {
    jest.useFakeTimers();
    idle();
    advanceFrom.mockRejectedValueOnce(new Error('advance failed'));
    playback.startPlaying('abc', mediaFor('Song'));
    playback.confirmLoaded();

    poller.start();
    await jest.advanceTimersByTimeAsync(500);
    expect(console.error).toHaveBeenCalledWith('State poll tick failed:', expect.any(Error));

    await jest.advanceTimersByTimeAsync(500);
    expect(publisher.types()).toEqual(['status', 'status']);
  });
});

describe('StatePoller with the director', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('moves to the next queued track at the end of the current one', async () => {
    const publisher = new RecordingPublisher();
    const queue = new QueueStore(publisher);
    const playback = new PlaybackStateStore(publisher);
    const channel = new FakePlayerChannel();
    const director = new PlaybackDirector(queue, playback, channel);
    const poller = new StatePoller(channel, playback, director);

    const [a] = submitReady(queue, 'A', 'B');
    await director.autoplayIfIdle(a);

    channel.properties.set('idle-active', false);
    channel.properties.set('pause', false);
    await poller.tick();

    channel.properties.set('idle-active', true);
    await poller.tick();

    expect(playback.getState().nowPlayingMedia?.title).toBe('B');
    expect(playback.getState().awaitingLoad).toBe(true);
    expect(queue.size()).toBe(0);
    expect(channel.loads()).toEqual([
      'https://cdn.example.test/A.opus',
      'https://cdn.example.test/B.opus'
    ]);
  });

  it('does not start the next track when the user stops during the idle read', async () => {
    const publisher = new RecordingPublisher();
    const queue = new QueueStore(publisher);
    const playback = new PlaybackStateStore(publisher);
    const channel = new FakePlayerChannel();
    const director = new PlaybackDirector(queue, playback, channel);
    const poller = new StatePoller(channel, playback, director);

    const [a, b] = submitReady(queue, 'A', 'B');
    await director.autoplayIfIdle(a);

    channel.properties.set('idle-active', false);
    channel.properties.set('pause', false);
    await poller.tick();

    let stopped: Promise<void> = Promise.resolve();
    channel.respond = (argv) => {
      if (argv[1] === 'idle-active') {
        stopped = director.stop();
        return { error: 'success', data: true };
      }
      return undefined;
    };
    await poller.tick();
    await stopped;

    expect(playback.getState().nowPlayingId).toBeNull();
    expect(queue.getItems().map((item) => item.id)).toEqual([b.id]);
    expect(channel.loads()).toEqual(['https://cdn.example.test/A.opus']);
  });
});
