/**
 * Now-playing descriptor and a display backed by the browser Media Session API.
 */
import type { NowPlayingDisplay, NowPlayingInfo, PlaybackSnapshot } from './types';

export function buildNowPlayingInfo(snapshot: PlaybackSnapshot): NowPlayingInfo | null {
  const track = snapshot.currentTrack;
  if (!track) return null;
  const info: NowPlayingInfo = {
    title: track.title,
    artist: track.artist,
    album: track.album,
    playbackRate: snapshot.isPlaying ? 1 : 0,
    elapsed: snapshot.position,
  };
  if (track.art) info.artworkUrl = track.art;
  if (snapshot.duration > 0) info.duration = snapshot.duration;
  return info;
}

/** Subset of `navigator.mediaSession` the display writes to. */
export interface MediaSessionLike<M = MediaMetadata> {
  metadata: M | null;
  playbackState: MediaSessionPlaybackState;
  setPositionState(state?: MediaPositionState): void;
}

/**
 * Display writing to the Media Session API. In a browser:
 * `createMediaSessionDisplay(navigator.mediaSession, (init) => new MediaMetadata(init))`.
 */
export function createMediaSessionDisplay<M>(
  mediaSession: MediaSessionLike<M>,
  createMetadata: (init: MediaMetadataInit) => M
): NowPlayingDisplay {
  return {
    update(info) {
      if (!info) {
        mediaSession.metadata = null;
        mediaSession.playbackState = 'none';
        return;
      }
      mediaSession.metadata = createMetadata({
        title: info.title,
        artist: info.artist,
        album: info.album,
        artwork: info.artworkUrl ? [{ src: info.artworkUrl }] : [],
      });
      mediaSession.playbackState = info.playbackRate > 0 ? 'playing' : 'paused';
      if (info.duration !== undefined) {
        mediaSession.setPositionState({
          duration: info.duration,
          playbackRate: 1,
          position: Math.min(info.elapsed, info.duration),
        });
      }
    },
  };
}
