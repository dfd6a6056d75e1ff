/**
 * Composition root. Builds one catalog store, one debouncer and one playback
 * session at startup and wires them together; consumers receive the instances
 * by reference instead of reaching for globals.
 */
import { CatalogStore } from './catalog/CatalogStore';
import { createHttpTrackSource } from './catalog/trackStore';
import type { TrackFetchResult, TrackSource } from './catalog/types';
import type { PlayerConfig } from './config';
import { PlaybackSession } from './playback/PlaybackSession';
import { logPlaybackEvent } from './playback/events';
import type { AudioOutputPort, NowPlayingDisplay, Scheduler } from './playback/types';
import { DebouncedSearch } from './search/DebouncedSearch';

export interface PlayerAppDeps {
  config: PlayerConfig;
  output: AudioOutputPort;
  display?: NowPlayingDisplay;
  /** Overrides the HTTP source built from config.trackStoreUrl */
  trackSource?: TrackSource;
  schedule?: Scheduler;
  /** Log every playback event to the console (default true) */
  logEvents?: boolean;
}

export interface PlayerApp {
  catalog: CatalogStore;
  search: DebouncedSearch;
  session: PlaybackSession;
  refresh: () => Promise<TrackFetchResult>;
  dispose: () => void;
}

export function createPlayerApp(deps: PlayerAppDeps): PlayerApp {
  const { config, output, display, schedule, logEvents = true } = deps;
  const catalog = new CatalogStore();
  const search = new DebouncedSearch(config.searchDebounceMs);
  const session = new PlaybackSession({ output, display, schedule });

  const source =
    deps.trackSource ??
    (config.trackStoreUrl
      ? createHttpTrackSource({ databaseUrl: config.trackStoreUrl, collection: config.trackCollection })
      : null);

  const unsubs = [
    search.subscribe((query) => catalog.setQuery(query)),
    catalog.subscribe((snapshot) => session.setTracks(snapshot.visibleTracks)),
  ];
  if (logEvents) unsubs.push(session.subscribe(logPlaybackEvent));
  session.setTracks(catalog.getVisibleTracks());

  return {
    catalog,
    search,
    session,
    async refresh() {
      if (!source) {
        console.warn('[PlayerApp] no Track Store configured; catalog stays empty');
        return { success: false, tracks: [], dropped: 0, error: 'Track Store URL not configured' };
      }
      return catalog.refresh(source);
    },
    dispose() {
      unsubs.forEach((unsub) => unsub());
      search.dispose();
      session.dispose();
    },
  };
}
