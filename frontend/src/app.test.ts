import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createPlayerApp } from './app';
import type { TrackSource } from './catalog/types';
import { FakeAudioOutput, RecordingDisplay, flushAsync, makeTrack, runNow } from './test/fixtures';

const catalogTracks = [
  makeTrack({ id: '1', typeOf: 'Hymn', language: 'Hebrew', album: 'A', title: 'Shalom' }),
  makeTrack({ id: '2', typeOf: 'Song', language: 'English', album: 'B', title: 'Morning' }),
  makeTrack({ id: '3', typeOf: 'Hymn', language: 'English', album: 'A', title: 'Evening' }),
];

const source: TrackSource = {
  fetchAll: async () => ({ success: true, tracks: catalogTracks, dropped: 0 }),
};

const config = { trackStoreUrl: null, trackCollection: 'Music', searchDebounceMs: 300 };

describe('createPlayerApp', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('navigates the filtered list after a refresh', async () => {
    const app = createPlayerApp({ config, output: new FakeAudioOutput(), trackSource: source, schedule: runNow, logEvents: false });
    await app.refresh();
    app.catalog.toggleFilter('typeOf', 'Hymn');
    expect(app.session.getTracks().map((t) => t.id)).toEqual(['1', '3']);

    await app.session.playTrack(catalogTracks[2]);
    await app.session.next();
    expect(app.session.getSnapshot().currentTrack?.id).toBe('1');
    app.dispose();
  });

  it('feeds debounced search text into the catalog', () => {
    vi.useFakeTimers();
    const app = createPlayerApp({ config, output: new FakeAudioOutput(), trackSource: source, schedule: runNow, logEvents: false });
    app.catalog.setTracks(catalogTracks);

    app.search.submit('even');
    expect(app.catalog.getVisibleTracks()).toHaveLength(3);
    vi.advanceTimersByTime(300);
    expect(app.catalog.getVisibleTracks().map((t) => t.id)).toEqual(['3']);
    expect(app.session.getTracks().map((t) => t.id)).toEqual(['3']);
    app.dispose();
  });

  it('keeps the catalog empty without a Track Store', async () => {
    const app = createPlayerApp({ config, output: new FakeAudioOutput(), logEvents: false });
    const result = await app.refresh();
    expect(result).toEqual({ success: false, tracks: [], dropped: 0, error: 'Track Store URL not configured' });
    expect(app.catalog.getVisibleTracks()).toEqual([]);
  });

  it('logs playback events and updates the display', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const display = new RecordingDisplay();
    const app = createPlayerApp({ config, output: new FakeAudioOutput(), display, trackSource: source, schedule: runNow });
    await app.refresh();
    await app.session.playTrack(catalogTracks[0]);
    await flushAsync();
    expect(log).toHaveBeenCalledWith('[PLAYBACK_EVENT]', { type: 'PLAYBACK_STATUS', status: 'playing' });
    expect(display.latest?.title).toBe('Shalom');
    app.dispose();
    expect(display.latest).toBeNull();
  });
});
