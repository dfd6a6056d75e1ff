export { PlaybackSession } from './PlaybackSession';
export type { PlaybackSessionOptions } from './PlaybackSession';
export { createHtmlAudioOutput } from './htmlAudioOutput';
export type { AudioElementLike } from './htmlAudioOutput';
export { buildNowPlayingInfo, createMediaSessionDisplay } from './nowPlaying';
export type { MediaSessionLike } from './nowPlaying';
export { logPlaybackEvent } from './events';
export {
  LYRIC_FONT_DEFAULT,
  LYRIC_FONT_MAX,
  LYRIC_FONT_MIN,
  formatPlaybackTime,
  hasLyrics,
  stepLyricFontSize,
} from './display';
export { usePlaybackSession } from './usePlaybackSession';
export type { UsePlaybackSessionOptions, UsePlaybackSessionResult } from './usePlaybackSession';
export type {
  AudioHandle,
  AudioOutputEvents,
  AudioOutputPort,
  NowPlayingDisplay,
  NowPlayingInfo,
  PlaybackEvent,
  PlaybackListener,
  PlaybackSnapshot,
  PlaybackStatus,
  Scheduler,
} from './types';
