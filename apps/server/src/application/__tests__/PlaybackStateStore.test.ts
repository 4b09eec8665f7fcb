import { PlaybackStateStore, clampPercent } from '../PlaybackStateStore';
import { RecordingPublisher, mediaFor } from '../../__tests__/setup/player-fakes';

describe('PlaybackStateStore', () => {
  let publisher: RecordingPublisher;
  let playback: PlaybackStateStore;

  beforeEach(() => {
    publisher = new RecordingPublisher();
    playback = new PlaybackStateStore(publisher, 65);
  });

  it('starts idle with autoplay on', () => {
    expect(playback.getState()).toEqual({
      nowPlayingId: null,
      nowPlayingMedia: null,
      paused: true,
      positionSeconds: 0,
      durationSeconds: 0,
      volumePercent: 65,
      awaitingLoad: false
    });
    expect(playback.isAutoplayEnabled()).toBe(true);
    expect(playback.isPlaying()).toBe(false);
  });

  it('clamps the initial volume', () => {
    expect(new PlaybackStateStore(publisher, 140).getState().volumePercent).toBe(100);
  });

  it('installs a track as playing and awaiting confirmation', () => {
    const media = mediaFor('Song', 240);
    playback.startPlaying('abc', media);

    const state = playback.getState();
    expect(state.nowPlayingId).toBe('abc');
    expect(state.nowPlayingMedia).toEqual(media);
    expect(state.nowPlayingMedia).not.toBe(media);
    expect(state.paused).toBe(false);
    expect(state.durationSeconds).toBe(240);
    expect(state.awaitingLoad).toBe(true);
    expect(playback.isPlaying()).toBe(true);

    playback.confirmLoaded();
    expect(playback.getState().awaitingLoad).toBe(false);
  });

  it('applies readings, keeping values that were not read', () => {
    playback.startPlaying('abc', mediaFor('Song', 240));
    playback.applyPlaying({ positionSeconds: 12.5 });
    playback.applyPlaying({ paused: true, durationSeconds: 241 });

    const state = playback.getState();
    expect(state.positionSeconds).toBe(12.5);
    expect(state.durationSeconds).toBe(241);
    expect(state.paused).toBe(true);
  });

  it('keeps the now-playing item through an idle reading and drops it on clear', () => {
    playback.startPlaying('abc', mediaFor('Song'));
    playback.applyIdle();
    expect(playback.getState().nowPlayingId).toBe('abc');
    expect(playback.getState().paused).toBe(true);

    playback.clearNowPlaying();
    expect(playback.hasNowPlaying()).toBe(false);
    expect(playback.getState().nowPlayingMedia).toBeNull();
  });

  it('builds the status payload', () => {
    playback.startPlaying('abc', { ...mediaFor('Song', 200), thumbnailUrl: 'https://cdn.example.test/t.jpg' });
    playback.applyPlaying({ positionSeconds: 30 });

    expect(playback.toStatusPayload()).toEqual({
      paused: false,
      time: 30,
      duration: 200,
      volume: 65,
      current: {
        id: 'abc',
        title: 'Song',
        thumbnail: 'https://cdn.example.test/t.jpg',
        source: 'example.test'
      }
    });
  });

  it('publishes status and autoplay changes', () => {
    playback.publishStatus();
    expect(playback.toggleAutoplay()).toBe(false);

    expect(publisher.events).toEqual([
      {
        type: 'status',
        payload: { paused: true, time: 0, duration: 0, volume: 65, current: null }
      },
      { type: 'autoplay_toggled', payload: { enabled: false } }
    ]);
  });

  it('clamps volume updates', () => {
    playback.setVolume(-3);
    expect(playback.getState().volumePercent).toBe(0);
    expect(clampPercent(101)).toBe(100);
    expect(clampPercent(42.5)).toBe(42.5);
  });
});
