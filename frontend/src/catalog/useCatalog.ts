/**
 * React hook over a CatalogStore. Re-renders on every store change and
 * exposes the store's actions as stable callbacks.
 */
import { useCallback, useEffect, useState } from 'react';
import type { CatalogSnapshot, CatalogStore } from './CatalogStore';
import type { FilterCategory, ViewMode } from './types';

export interface UseCatalogResult extends CatalogSnapshot {
  toggleFilter: (category: FilterCategory, value: string) => void;
  resetFilters: () => void;
  setViewMode: (mode: ViewMode) => void;
  selectAlbum: (album: string | null) => void;
}

export function useCatalog(store: CatalogStore): UseCatalogResult {
  const [snapshot, setSnapshot] = useState<CatalogSnapshot>(() => store.getSnapshot());

  useEffect(() => {
    setSnapshot(store.getSnapshot());
    const unsub = store.subscribe(setSnapshot);
    return unsub;
  }, [store]);

  const toggleFilter = useCallback(
    (category: FilterCategory, value: string) => store.toggleFilter(category, value),
    [store]
  );
  const resetFilters = useCallback(() => store.resetFilters(), [store]);
  const setViewMode = useCallback((mode: ViewMode) => store.setViewMode(mode), [store]);
  const selectAlbum = useCallback((album: string | null) => store.selectAlbum(album), [store]);

  return { ...snapshot, toggleFilter, resetFilters, setViewMode, selectAlbum };
}
