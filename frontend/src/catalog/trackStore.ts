/**
 * Track Store client. Reads the `Music` collection of a Firebase Realtime
 * Database over its REST endpoint and turns raw records into Tracks.
 */
import type { Track, TrackFetchResult, TrackSource } from './types';

export const UNKNOWN_ALBUM = 'Unknown Album';
export const UNKNOWN_ARTIST = 'Unknown Artist';

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: RawRecord, key: string, fallback = ''): string {
  const value = record[key];
  return typeof value === 'string' ? value : fallback;
}

function readInt(record: RawRecord, key: string): number | null {
  const value = record[key];
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

/**
 * Build a Track from a raw database record. Returns null (and logs) when a
 * required field (`name`, `link`, `title`) is missing or mistyped.
 */
export function parseTrackRecord(id: string, raw: unknown): Track | null {
  if (!isRecord(raw)) {
    console.warn('[TrackStore] record is not an object:', id);
    return null;
  }
  const name = readInt(raw, 'name');
  const link = raw.link;
  const title = raw.title;
  if (name === null || typeof link !== 'string' || typeof title !== 'string') {
    console.warn('[TrackStore] missing required fields for track:', id);
    return null;
  }

  return {
    id,
    title,
    link,
    name,
    album: readString(raw, 'album', UNKNOWN_ALBUM),
    artist: readString(raw, 'artist', UNKNOWN_ARTIST),
    art: readString(raw, 'art'),
    bitrate: readString(raw, 'bitrate'),
    genres: readString(raw, 'genres'),
    language: readString(raw, 'language'),
    lyric: readString(raw, 'lyric'),
    rating: readString(raw, 'rating'),
    typeOf: readString(raw, 'type'),
    playcount: readInt(raw, 'playcount') ?? 0,
    year: readInt(raw, 'year') ?? 0,
  };
}

/**
 * Parse a whole collection snapshot. Firebase returns a keyed object, or an
 * array with null holes when every key is numeric.
 */
export function parseTrackSnapshot(snapshot: unknown): { tracks: Track[]; dropped: number } {
  let entries: [string, unknown][];
  if (Array.isArray(snapshot)) {
    entries = snapshot
      .map((value, index): [string, unknown] => [String(index), value])
      .filter(([, value]) => value !== null && value !== undefined);
  } else if (isRecord(snapshot)) {
    entries = Object.entries(snapshot);
  } else {
    entries = [];
  }

  const tracks: Track[] = [];
  let dropped = 0;
  for (const [id, value] of entries) {
    const track = parseTrackRecord(id, value);
    if (track) {
      tracks.push(track);
    } else {
      dropped++;
    }
  }
  return { tracks, dropped };
}

export interface HttpTrackSourceOptions {
  /** Database root, e.g. https://example-db.firebaseio.com */
  databaseUrl: string;
  collection?: string;
  fetchImpl?: typeof fetch;
}

export function collectionUrl(databaseUrl: string, collection: string): string {
  return `${databaseUrl.replace(/\/$/, '')}/${encodeURIComponent(collection)}.json`;
}

export function createHttpTrackSource(options: HttpTrackSourceOptions): TrackSource {
  const { databaseUrl, collection = 'Music', fetchImpl = fetch } = options;
  const url = collectionUrl(databaseUrl, collection);

  return {
    async fetchAll(): Promise<TrackFetchResult> {
      try {
        const res = await fetchImpl(url);
        if (!res.ok) {
          const error = `Track Store responded ${res.status}`;
          console.error('[TrackStore] fetch failed:', error);
          return { success: false, tracks: [], dropped: 0, error };
        }
        const body: unknown = await res.json();
        const { tracks, dropped } = parseTrackSnapshot(body);
        console.log(`[TrackStore] fetched ${tracks.length} tracks (${dropped} dropped)`);
        return { success: true, tracks, dropped };
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        console.error('[TrackStore] fetch failed:', error);
        return { success: false, tracks: [], dropped: 0, error };
      }
    },
  };
}
