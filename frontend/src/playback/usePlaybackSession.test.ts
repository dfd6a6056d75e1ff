import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import { PlaybackSession } from './PlaybackSession';
import { usePlaybackSession } from './usePlaybackSession';
import { FakeAudioOutput, flushAsync, makeTrack, runNow } from '../test/fixtures';

const t1 = makeTrack({ id: '1' });
const t2 = makeTrack({ id: '2' });

describe('usePlaybackSession', () => {
  let output: FakeAudioOutput;
  let session: PlaybackSession;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    output = new FakeAudioOutput();
    session = new PlaybackSession({ output, schedule: runNow });
    session.setTracks([t1, t2]);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reflects playback state and time labels', async () => {
    const { result } = renderHook(() => usePlaybackSession(session));
    expect(result.current.status).toBe('idle');

    await act(async () => {
      await result.current.playTrack(t1);
      await flushAsync();
    });
    expect(result.current.isPlaying).toBe(true);
    expect(result.current.currentTrack?.id).toBe('1');
    expect(result.current.elapsedLabel).toBe('00:00');
    expect(result.current.durationLabel).toBe('03:00');

    await act(async () => {
      await result.current.seekTo(75);
    });
    expect(result.current.elapsedLabel).toBe('01:15');

    await act(async () => {
      await result.current.togglePause();
    });
    expect(result.current.status).toBe('paused');
  });

  it('reports track end until unmounted', async () => {
    const onTrackEnded = vi.fn();
    const { unmount } = renderHook(() => usePlaybackSession(session, { onTrackEnded }));

    await act(async () => {
      await session.playTrack(t1);
      output.latestEvents().onEnded();
      await flushAsync();
    });
    expect(onTrackEnded).toHaveBeenCalledWith(t1);

    unmount();
    output.latestEvents().onEnded();
    await flushAsync();
    expect(onTrackEnded).toHaveBeenCalledTimes(1);
  });
});
