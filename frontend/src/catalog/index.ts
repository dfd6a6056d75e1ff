export { CatalogStore } from './CatalogStore';
export type { CatalogListener, CatalogSnapshot } from './CatalogStore';
export { filterOptions, filterTracks, trackMatchesQuery, tracksInAlbum, uniqueAlbums } from './filterEngine';
export { initialSelection, initialSelections, selectionAllows, toggleSelection } from './filterSelection';
export {
  UNKNOWN_ALBUM,
  UNKNOWN_ARTIST,
  createHttpTrackSource,
  parseTrackRecord,
  parseTrackSnapshot,
} from './trackStore';
export type { HttpTrackSourceOptions } from './trackStore';
export { useCatalog } from './useCatalog';
export type { UseCatalogResult } from './useCatalog';
export { ALL, FILTER_CATEGORIES, isSameTrack } from './types';
export type {
  FilterCategory,
  FilterCriteria,
  FilterSelection,
  FilterSelections,
  Track,
  TrackFetchResult,
  TrackSource,
  ViewMode,
} from './types';
