/**
 * Shared test doubles: track builder, in-memory audio output and display.
 */
import type { Track } from '../catalog/types';
import type {
  AudioHandle,
  AudioOutputEvents,
  AudioOutputPort,
  NowPlayingDisplay,
  NowPlayingInfo,
} from '../playback/types';

export function makeTrack(overrides: Partial<Track> & { id: string }): Track {
  return {
    title: `Track ${overrides.id}`,
    artist: 'Artist',
    album: 'Album',
    genres: '',
    language: 'English',
    typeOf: 'Song',
    art: '',
    link: `https://audio.example.test/${overrides.id}.mp3`,
    lyric: '',
    bitrate: '',
    rating: '',
    year: 0,
    playcount: 0,
    name: 0,
    ...overrides,
  };
}

interface FakeBinding {
  handle: AudioHandle;
  events: AudioOutputEvents;
  released: boolean;
}

export class FakeAudioOutput implements AudioOutputPort {
  readonly bindings: FakeBinding[] = [];
  readonly calls: string[] = [];
  /** Links whose bind rejects */
  failingLinks = new Set<string>();
  /** Duration handed back by resolveDuration; null rejects */
  durationSeconds: number | null = 180;
  /** resolveDuration never settles */
  holdDuration = false;
  /** pause rejects */
  failPause = false;

  async bind(link: string, events: AudioOutputEvents): Promise<AudioHandle> {
    this.calls.push(`bind ${link}`);
    if (this.failingLinks.has(link)) throw new Error(`cannot load ${link}`);
    const handle: AudioHandle = { link };
    this.bindings.push({ handle, events, released: false });
    return handle;
  }

  release(handle: AudioHandle): void {
    this.calls.push(`release ${handle.link}`);
    const binding = this.bindings.find((b) => b.handle === handle);
    if (binding) binding.released = true;
  }

  async play(handle: AudioHandle): Promise<void> {
    this.calls.push(`play ${handle.link}`);
  }

  async pause(handle: AudioHandle): Promise<void> {
    this.calls.push(`pause ${handle.link}`);
    if (this.failPause) throw new Error('pause rejected');
  }

  async seek(handle: AudioHandle, seconds: number): Promise<void> {
    this.calls.push(`seek ${handle.link} ${seconds}`);
  }

  async resolveDuration(): Promise<number> {
    if (this.holdDuration) return new Promise<number>(() => {});
    if (this.durationSeconds === null) throw new Error('no duration');
    return this.durationSeconds;
  }

  /** Events of the most recent binding. */
  latestEvents(): AudioOutputEvents {
    const last = this.bindings[this.bindings.length - 1];
    if (!last) throw new Error('nothing bound');
    return last.events;
  }
}

export class RecordingDisplay implements NowPlayingDisplay {
  readonly updates: (NowPlayingInfo | null)[] = [];

  update(info: NowPlayingInfo | null): void {
    this.updates.push(info);
  }

  get latest(): NowPlayingInfo | null | undefined {
    return this.updates[this.updates.length - 1];
  }
}

/** Wait until every pending promise callback has run. */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

/** Runs scheduled port callbacks immediately. */
export const runNow = (task: () => void): void => task();
