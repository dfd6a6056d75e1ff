/**
 * Catalog data types.
 * Tracks come from the remote Track Store and are never mutated in place;
 * a refetch replaces the whole catalog.
 */

export interface Track {
  /** Store key of the record; the only field equality looks at */
  readonly id: string;
  readonly title: string;
  readonly artist: string;
  readonly album: string;
  readonly genres: string;
  readonly language: string;
  /** Category tag (stored under `type` in the database) */
  readonly typeOf: string;
  /** Album art URL, empty when missing */
  readonly art: string;
  /** Audio resource URL */
  readonly link: string;
  readonly lyric: string;
  readonly bitrate: string;
  readonly rating: string;
  readonly year: number;
  readonly playcount: number;
  /** Catalog index */
  readonly name: number;
}

/** Track fields that can be filtered from a menu. */
export type FilterCategory = 'typeOf' | 'language' | 'artist';

export const FILTER_CATEGORIES: readonly FilterCategory[] = ['typeOf', 'language', 'artist'];

/** Selection value meaning "no filtering for this category". */
export const ALL = 'All';

export type FilterSelection = ReadonlySet<string>;

export type FilterSelections = Readonly<Record<FilterCategory, FilterSelection>>;

export interface FilterCriteria {
  selections: FilterSelections;
  /** Debounced search text */
  query: string;
}

export type ViewMode = 'list' | 'albums';

export interface TrackFetchResult {
  success: boolean;
  tracks: Track[];
  /** Records dropped for missing required fields */
  dropped: number;
  error?: string;
}

export interface TrackSource {
  fetchAll: () => Promise<TrackFetchResult>;
}

export function isSameTrack(a: Track | null, b: Track | null): boolean {
  if (!a || !b) return false;
  return a.id === b.id;
}
