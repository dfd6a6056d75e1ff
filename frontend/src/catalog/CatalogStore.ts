/**
 * CatalogStore - owns the catalog and the browse state (filters, debounced
 * query, list/album mode). Derived lists are recomputed on every change and
 * published to subscribers as one snapshot.
 */
import type {
  FilterCategory,
  FilterSelections,
  Track,
  TrackFetchResult,
  TrackSource,
  ViewMode,
} from './types';
import { initialSelections, withToggled } from './filterSelection';
import { filterOptions, filterTracks, tracksInAlbum, uniqueAlbums } from './filterEngine';

export interface CatalogSnapshot {
  tracks: readonly Track[];
  selections: FilterSelections;
  query: string;
  viewMode: ViewMode;
  selectedAlbum: string | null;
  visibleTracks: readonly Track[];
  albums: readonly string[];
  /** Tracks of `selectedAlbum` within the visible list; empty with no album selected */
  albumTracks: readonly Track[];
  filterOptions: Readonly<Record<FilterCategory, readonly string[]>>;
}

export type CatalogListener = (snapshot: CatalogSnapshot) => void;

export class CatalogStore {
  private tracks: readonly Track[] = [];
  private selections: FilterSelections = initialSelections();
  private query = '';
  private viewMode: ViewMode = 'list';
  private selectedAlbum: string | null = null;
  private listeners: Set<CatalogListener> = new Set();
  private snapshot: CatalogSnapshot;

  constructor(tracks: readonly Track[] = []) {
    this.tracks = tracks;
    this.snapshot = this.compute();
  }

  subscribe(listener: CatalogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getSnapshot(): CatalogSnapshot {
    return this.snapshot;
  }

  getVisibleTracks(): readonly Track[] {
    return this.snapshot.visibleTracks;
  }

  private compute(): CatalogSnapshot {
    const visibleTracks = filterTracks(this.tracks, {
      selections: this.selections,
      query: this.query,
    });
    return {
      tracks: this.tracks,
      selections: this.selections,
      query: this.query,
      viewMode: this.viewMode,
      selectedAlbum: this.selectedAlbum,
      visibleTracks,
      albums: uniqueAlbums(visibleTracks),
      albumTracks: this.selectedAlbum === null ? [] : tracksInAlbum(visibleTracks, this.selectedAlbum),
      filterOptions: {
        typeOf: filterOptions(this.tracks, 'typeOf'),
        language: filterOptions(this.tracks, 'language'),
        artist: filterOptions(this.tracks, 'artist'),
      },
    };
  }

  private notify(): void {
    this.snapshot = this.compute();
    for (const listener of this.listeners) {
      try {
        listener(this.snapshot);
      } catch (e) {
        console.error('[CatalogStore] listener error:', e);
      }
    }
  }

  /** Replace the whole catalog. */
  setTracks(tracks: readonly Track[]): void {
    this.tracks = tracks;
    this.notify();
  }

  toggleFilter(category: FilterCategory, value: string): void {
    this.selections = withToggled(this.selections, category, value);
    this.notify();
  }

  resetFilters(): void {
    this.selections = initialSelections();
    this.notify();
  }

  /** Set the debounced query. Raw keystrokes go through DebouncedSearch first. */
  setQuery(query: string): void {
    if (query === this.query) return;
    this.query = query;
    this.notify();
  }

  setViewMode(mode: ViewMode): void {
    this.viewMode = mode;
    if (mode === 'list') this.selectedAlbum = null;
    this.notify();
  }

  selectAlbum(album: string | null): void {
    this.selectedAlbum = album;
    this.notify();
  }

  /** Fetch from `source` and replace the catalog. A failed fetch leaves it empty. */
  async refresh(source: TrackSource): Promise<TrackFetchResult> {
    const result = await source.fetchAll();
    this.setTracks(result.tracks);
    return result;
  }
}
