import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import { DebouncedSearch } from './DebouncedSearch';
import { useDebouncedSearch } from './useDebouncedSearch';

describe('useDebouncedSearch', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });
  afterEach(() => {
    vi.useRealTimers();
  });

  it('shows keystrokes at once and the debounced value after the delay', () => {
    const search = new DebouncedSearch(300);
    const { result } = renderHook(() => useDebouncedSearch(search));

    act(() => result.current.setQuery('psa'));
    expect(result.current.query).toBe('psa');
    expect(result.current.debouncedQuery).toBe('');

    act(() => {
      vi.advanceTimersByTime(300);
    });
    expect(result.current.debouncedQuery).toBe('psa');
  });
});
