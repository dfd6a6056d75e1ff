import { describe, it, expect } from 'vitest';
import { LYRIC_FONT_MAX, LYRIC_FONT_MIN, formatPlaybackTime, hasLyrics, stepLyricFontSize } from './display';
import { makeTrack } from '../test/fixtures';

describe('formatPlaybackTime', () => {
  it('pads minutes and seconds', () => {
    expect(formatPlaybackTime(0)).toBe('00:00');
    expect(formatPlaybackTime(65.9)).toBe('01:05');
    expect(formatPlaybackTime(180)).toBe('03:00');
    expect(formatPlaybackTime(3725)).toBe('62:05');
  });

  it('shows zero for unknown values', () => {
    expect(formatPlaybackTime(Number.NaN)).toBe('00:00');
    expect(formatPlaybackTime(-3)).toBe('00:00');
  });
});

describe('stepLyricFontSize', () => {
  it('steps by two', () => {
    expect(stepLyricFontSize(20, 'larger')).toBe(22);
    expect(stepLyricFontSize(20, 'smaller')).toBe(18);
  });

  it('stops at the bounds', () => {
    expect(stepLyricFontSize(LYRIC_FONT_MAX, 'larger')).toBe(LYRIC_FONT_MAX);
    expect(stepLyricFontSize(LYRIC_FONT_MIN, 'smaller')).toBe(LYRIC_FONT_MIN);
    expect(stepLyricFontSize(29, 'larger')).toBe(30);
    expect(stepLyricFontSize(13, 'smaller')).toBe(12);
  });
});

describe('hasLyrics', () => {
  it('is false for blank lyrics', () => {
    expect(hasLyrics(makeTrack({ id: '1', lyric: '  ' }))).toBe(false);
    expect(hasLyrics(makeTrack({ id: '2', lyric: 'Amen' }))).toBe(true);
  });
});
