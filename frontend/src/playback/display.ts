/**
 * Formatting helpers for the track detail screen.
 */
import type { Track } from '../catalog/types';

export const LYRIC_FONT_MIN = 12;
export const LYRIC_FONT_MAX = 30;
export const LYRIC_FONT_STEP = 2;
export const LYRIC_FONT_DEFAULT = 20;

/** Seconds as zero-padded `mm:ss`. */
export function formatPlaybackTime(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const mins = Math.floor(total / 60);
  const secs = total % 60;
  return `${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
}

/** Step the lyrics font size up or down, staying inside the allowed range. */
export function stepLyricFontSize(size: number, direction: 'smaller' | 'larger'): number {
  if (direction === 'smaller') {
    return size > LYRIC_FONT_MIN ? Math.max(LYRIC_FONT_MIN, size - LYRIC_FONT_STEP) : size;
  }
  return size < LYRIC_FONT_MAX ? Math.min(LYRIC_FONT_MAX, size + LYRIC_FONT_STEP) : size;
}

export function hasLyrics(track: Track): boolean {
  return track.lyric.trim() !== '';
}
