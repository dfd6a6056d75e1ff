/**
 * Filter Engine - pure functions over the in-memory catalog.
 * Nothing here is cached; callers recompute whenever the catalog, a selection
 * or the debounced query changes.
 */
import { ALL, FILTER_CATEGORIES } from './types';
import type { FilterCategory, FilterCriteria, Track } from './types';
import { selectionAllows } from './filterSelection';

export function trackMatchesQuery(track: Track, query: string): boolean {
  if (query === '') return true;
  const needle = query.toLocaleLowerCase();
  return [track.album, track.artist, track.title, track.genres].some((field) =>
    field.toLocaleLowerCase().includes(needle)
  );
}

/** Tracks passing every category filter and the search filter, in catalog order. */
export function filterTracks(tracks: readonly Track[], criteria: FilterCriteria): Track[] {
  return tracks.filter(
    (track) =>
      FILTER_CATEGORIES.every((category) =>
        selectionAllows(criteria.selections[category], track[category])
      ) && trackMatchesQuery(track, criteria.query)
  );
}

function sortedDistinct(values: readonly string[]): string[] {
  return Array.from(new Set(values)).sort();
}

/** Distinct album names of `tracks`, ascending. Drives the album grid. */
export function uniqueAlbums(tracks: readonly Track[]): string[] {
  return sortedDistinct(tracks.map((t) => t.album));
}

/**
 * Menu options for a category: every distinct value in the full catalog,
 * ascending, behind the `All` sentinel.
 */
export function filterOptions(catalog: readonly Track[], category: FilterCategory): string[] {
  const values = sortedDistinct(catalog.map((t) => t[category])).filter((v) => v !== ALL);
  return [ALL, ...values];
}

export function tracksInAlbum(tracks: readonly Track[], album: string): Track[] {
  return tracks.filter((t) => t.album === album);
}
