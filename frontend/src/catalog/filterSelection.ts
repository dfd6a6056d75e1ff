/**
 * Category selection rules. `All` is exclusive: it never sits next to a
 * concrete option, and a selection is never empty.
 */
import { ALL } from './types';
import type { FilterCategory, FilterSelection, FilterSelections } from './types';

export function initialSelection(): FilterSelection {
  return new Set([ALL]);
}

export function initialSelections(): FilterSelections {
  return {
    typeOf: initialSelection(),
    language: initialSelection(),
    artist: initialSelection(),
  };
}

/** Toggle `value` in `selection`, returning a new set. */
export function toggleSelection(selection: FilterSelection, value: string): FilterSelection {
  if (value === ALL) return initialSelection();
  const next = new Set(selection);
  next.delete(ALL);
  if (next.has(value)) {
    next.delete(value);
  } else {
    next.add(value);
  }
  return next.size === 0 ? initialSelection() : next;
}

export function selectionAllows(selection: FilterSelection, value: string): boolean {
  return selection.has(ALL) || selection.has(value);
}

export function withToggled(
  selections: FilterSelections,
  category: FilterCategory,
  value: string
): FilterSelections {
  return { ...selections, [category]: toggleSelection(selections[category], value) };
}
