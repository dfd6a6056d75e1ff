/**
 * App configuration from Vite env variables.
 */
import { SEARCH_DEBOUNCE_MS } from './search/DebouncedSearch';

export interface PlayerConfig {
  /** Realtime Database root URL; null leaves the catalog empty */
  trackStoreUrl: string | null;
  trackCollection: string;
  searchDebounceMs: number;
}

export type EnvSource = Readonly<Record<string, string | boolean | undefined>>;

function readString(env: EnvSource, key: string): string | null {
  const value = env[key];
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

export function loadConfig(env: EnvSource = import.meta.env): PlayerConfig {
  const delay = Number(readString(env, 'VITE_SEARCH_DEBOUNCE_MS') ?? SEARCH_DEBOUNCE_MS);
  const searchDebounceMs = Number.isFinite(delay) && delay >= 0 ? delay : SEARCH_DEBOUNCE_MS;
  if (searchDebounceMs !== delay) {
    console.warn('[Config] invalid VITE_SEARCH_DEBOUNCE_MS, using', SEARCH_DEBOUNCE_MS);
  }

  return {
    trackStoreUrl: readString(env, 'VITE_TRACK_STORE_URL'),
    trackCollection: readString(env, 'VITE_TRACK_COLLECTION') ?? 'Music',
    searchDebounceMs,
  };
}
