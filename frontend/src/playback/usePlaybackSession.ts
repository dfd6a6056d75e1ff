/**
 * React hook over a PlaybackSession.
 * Provides the session snapshot and transport actions to UI components.
 */
import { useCallback, useEffect, useState } from 'react';
import type { Track } from '../catalog/types';
import type { PlaybackSession } from './PlaybackSession';
import type { PlaybackSnapshot } from './types';
import { formatPlaybackTime } from './display';

export interface UsePlaybackSessionOptions {
  /** Called when the current track finishes; unsubscribed on unmount */
  onTrackEnded?: (track: Track) => void;
}

export interface UsePlaybackSessionResult extends PlaybackSnapshot {
  elapsedLabel: string;
  durationLabel: string;
  playTrack: (track: Track) => Promise<boolean>;
  togglePause: () => Promise<boolean>;
  next: () => Promise<boolean>;
  previous: () => Promise<boolean>;
  seekTo: (seconds: number) => Promise<boolean>;
}

export function usePlaybackSession(
  session: PlaybackSession,
  options: UsePlaybackSessionOptions = {}
): UsePlaybackSessionResult {
  const { onTrackEnded } = options;
  const [snapshot, setSnapshot] = useState<PlaybackSnapshot>(() => session.getSnapshot());

  useEffect(() => {
    setSnapshot(session.getSnapshot());
    return session.subscribe((event) => {
      setSnapshot(session.getSnapshot());
      if (event.type === 'TRACK_ENDED') onTrackEnded?.(event.track);
    });
  }, [session, onTrackEnded]);

  const playTrack = useCallback((track: Track) => session.playTrack(track), [session]);
  const togglePause = useCallback(() => session.togglePlayPause(), [session]);
  const next = useCallback(() => session.next(), [session]);
  const previous = useCallback(() => session.previous(), [session]);
  const seekTo = useCallback((seconds: number) => session.seek(seconds), [session]);

  return {
    ...snapshot,
    elapsedLabel: formatPlaybackTime(snapshot.position),
    durationLabel: formatPlaybackTime(snapshot.duration),
    playTrack,
    togglePause,
    next,
    previous,
    seekTo,
  };
}
