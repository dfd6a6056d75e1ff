import { describe, it, expect } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import { CatalogStore } from './CatalogStore';
import { useCatalog } from './useCatalog';
import { makeTrack } from '../test/fixtures';

describe('useCatalog', () => {
  it('re-renders with the filtered list after a toggle', () => {
    const store = new CatalogStore([
      makeTrack({ id: '1', typeOf: 'Hymn' }),
      makeTrack({ id: '2', typeOf: 'Song' }),
    ]);
    const { result } = renderHook(() => useCatalog(store));
    expect(result.current.visibleTracks).toHaveLength(2);

    act(() => result.current.toggleFilter('typeOf', 'Song'));
    expect(result.current.visibleTracks.map((t) => t.id)).toEqual(['2']);
  });

  it('follows changes made outside the hook', () => {
    const store = new CatalogStore();
    const { result } = renderHook(() => useCatalog(store));
    act(() => store.setTracks([makeTrack({ id: '5', album: 'Psalms' })]));
    expect(result.current.albums).toEqual(['Psalms']);
  });

  it('stops listening after unmount', () => {
    const store = new CatalogStore();
    const { result, unmount } = renderHook(() => useCatalog(store));
    unmount();
    store.setTracks([makeTrack({ id: '1' })]);
    expect(result.current.tracks).toEqual([]);
  });
});
