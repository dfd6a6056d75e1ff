/**
 * Playback data types and the collaborator ports the session drives.
 * The session owns playback state; the audio output is a device only.
 */
import type { Track } from '../catalog/types';

export type PlaybackStatus = 'idle' | 'loaded' | 'playing' | 'paused';

export interface PlaybackSnapshot {
  currentTrack: Track | null;
  /** Index of currentTrack in the navigation list, -1 when absent */
  currentIndex: number;
  status: PlaybackStatus;
  isPlaying: boolean;
  /** Seconds */
  position: number;
  /** Seconds; 0 until the output resolves it */
  duration: number;
}

/** Opaque handle for one bound audio resource. */
export interface AudioHandle {
  readonly link: string;
}

/** Callbacks an audio output raises on its own clock. */
export interface AudioOutputEvents {
  onTimeUpdate: (seconds: number) => void;
  onEnded: () => void;
  onInterruptionBegan: () => void;
  onInterruptionEnded: (shouldResume: boolean) => void;
  /** The bound stream failed after it loaded */
  onError: (message: string) => void;
}

export interface AudioOutputPort {
  /** Bind a resource. Rejects when the link cannot be loaded. */
  bind(link: string, events: AudioOutputEvents): Promise<AudioHandle>;
  release(handle: AudioHandle): void;
  play(handle: AudioHandle): Promise<void>;
  pause(handle: AudioHandle): Promise<void>;
  seek(handle: AudioHandle, seconds: number): Promise<void>;
  /** Resolves the duration in seconds. May reject. */
  resolveDuration(handle: AudioHandle): Promise<number>;
}

/** Metadata block for the system-level media display and remote controls. */
export interface NowPlayingInfo {
  title: string;
  artist: string;
  album: string;
  artworkUrl?: string;
  /** 1 while playing, 0 otherwise */
  playbackRate: number;
  /** Seconds; omitted until known */
  duration?: number;
  elapsed: number;
}

export interface NowPlayingDisplay {
  update: (info: NowPlayingInfo | null) => void;
}

export type PlaybackEvent =
  | { type: 'TRACKS_UPDATED'; count: number; currentIndex: number }
  | { type: 'TRACK_CHANGED'; track: Track; index: number }
  | { type: 'PLAYBACK_STATUS'; status: PlaybackStatus }
  | { type: 'POSITION'; position: number; duration: number }
  | { type: 'TRACK_ENDED'; track: Track }
  | { type: 'LOAD_ERROR'; track: Track; message: string };

export type PlaybackListener = (event: PlaybackEvent) => void;

/** Runs a port callback on the session's event loop. */
export type Scheduler = (task: () => void) => void;
