export { DebouncedSearch, SEARCH_DEBOUNCE_MS } from './DebouncedSearch';
export type { DebouncedQueryListener } from './DebouncedSearch';
export { useDebouncedSearch } from './useDebouncedSearch';
export type { UseDebouncedSearchResult } from './useDebouncedSearch';
