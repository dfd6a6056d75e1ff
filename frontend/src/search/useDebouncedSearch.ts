/**
 * React hook binding a text input to a DebouncedSearch.
 */
import { useCallback, useEffect, useState } from 'react';
import type { DebouncedSearch } from './DebouncedSearch';

export interface UseDebouncedSearchResult {
  /** Input value, updated on every keystroke */
  query: string;
  /** Value filtering should use */
  debouncedQuery: string;
  setQuery: (query: string) => void;
}

export function useDebouncedSearch(search: DebouncedSearch): UseDebouncedSearchResult {
  const [query, setRawQuery] = useState(() => search.rawQuery);
  const [debouncedQuery, setDebouncedQuery] = useState(() => search.debouncedQuery);

  useEffect(() => search.subscribe(setDebouncedQuery), [search]);

  const setQuery = useCallback(
    (value: string) => {
      setRawQuery(value);
      search.submit(value);
    },
    [search]
  );

  return { query, debouncedQuery, setQuery };
}
