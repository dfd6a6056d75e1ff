/**
 * Debug logging for playback events.
 * PLAYBACK_EVENT: one console line per session event worth seeing in a log.
 */
import type { PlaybackEvent } from './types';

function logPlaybackEventLine(type: string, payload: Record<string, unknown>): void {
  console.log('[PLAYBACK_EVENT]', { type, ...payload });
}

export function logPlaybackEvent(event: PlaybackEvent): void {
  switch (event.type) {
    case 'TRACKS_UPDATED':
      logPlaybackEventLine('TRACKS_UPDATED', {
        count: event.count,
        currentIndex: event.currentIndex,
      });
      break;

    case 'TRACK_CHANGED':
      logPlaybackEventLine('TRACK_CHANGED', {
        id: event.track.id,
        title: event.track.title,
        artist: event.track.artist,
        index: event.index,
      });
      break;

    case 'PLAYBACK_STATUS':
      logPlaybackEventLine('PLAYBACK_STATUS', { status: event.status });
      break;

    case 'TRACK_ENDED':
      logPlaybackEventLine('TRACK_ENDED', { id: event.track.id });
      break;

    case 'LOAD_ERROR':
      console.warn('[PLAYBACK_EVENT]', {
        type: 'LOAD_ERROR',
        id: event.track.id,
        message: event.message,
      });
      break;

    // position ticks are not logged
    case 'POSITION':
      break;

    default:
      break;
  }
}
