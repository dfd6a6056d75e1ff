/**
 * PlaybackSession - owns the current track, play state, position and
 * next/previous navigation over the visible track list.
 * The audio output is treated as a playback device only; every callback it
 * raises is re-dispatched through the scheduler and dropped once its binding
 * has been released.
 */
import { isSameTrack } from '../catalog/types';
import type { Track } from '../catalog/types';
import { buildNowPlayingInfo } from './nowPlaying';
import type {
  AudioHandle,
  AudioOutputEvents,
  AudioOutputPort,
  NowPlayingDisplay,
  PlaybackEvent,
  PlaybackListener,
  PlaybackSnapshot,
  PlaybackStatus,
  Scheduler,
} from './types';

export interface PlaybackSessionOptions {
  output: AudioOutputPort;
  display?: NowPlayingDisplay;
  /** Defaults to queueMicrotask */
  schedule?: Scheduler;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isResolvableLink(link: string): boolean {
  if (link.trim() === '') return false;
  try {
    new URL(link);
    return true;
  } catch {
    return false;
  }
}

export class PlaybackSession {
  private readonly output: AudioOutputPort;
  private readonly display: NowPlayingDisplay | null;
  private readonly schedule: Scheduler;

  private tracks: readonly Track[] = [];
  private currentTrack: Track | null = null;
  private currentIndex = -1;
  private status: PlaybackStatus = 'idle';
  private position = 0;
  private duration = 0;
  /** 'unavailable' once the output failed to report a duration */
  private durationState: 'pending' | 'known' | 'unavailable' = 'pending';
  private handle: AudioHandle | null = null;
  /** Bumped by every load; a bind that resolves under an older token is discarded */
  private loadToken = 0;
  /** Target of a next/previous whose load is still in flight */
  private pendingStep: { index: number; loadToken: number } | null = null;
  private pausedByInterruption = false;
  private disposed = false;
  private listeners: Set<PlaybackListener> = new Set();
  private snapshot: PlaybackSnapshot;

  constructor(options: PlaybackSessionOptions) {
    this.output = options.output;
    this.display = options.display ?? null;
    this.schedule = options.schedule ?? ((task) => queueMicrotask(task));
    this.snapshot = this.buildSnapshot();
  }

  subscribe(listener: PlaybackListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: PlaybackEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (e) {
        console.error('[PlaybackSession] listener error:', e);
      }
    }
  }

  getSnapshot(): PlaybackSnapshot {
    return this.snapshot;
  }

  private buildSnapshot(): PlaybackSnapshot {
    return {
      currentTrack: this.currentTrack,
      currentIndex: this.currentIndex,
      status: this.status,
      isPlaying: this.status === 'playing',
      position: this.position,
      duration: this.duration,
    };
  }

  private commit(): void {
    this.snapshot = this.buildSnapshot();
  }

  private refreshDisplay(): void {
    this.display?.update(buildNowPlayingInfo(this.snapshot));
  }

  private setStatus(status: PlaybackStatus): void {
    this.status = status;
    this.commit();
    this.emit({ type: 'PLAYBACK_STATUS', status });
    this.refreshDisplay();
  }

  private indexOf(track: Track | null): number {
    if (!track) return -1;
    return this.tracks.findIndex((t) => t.id === track.id);
  }

  /** Set the list next/previous walk through (the visible list). */
  setTracks(tracks: readonly Track[]): void {
    this.tracks = tracks;
    this.pendingStep = null;
    this.currentIndex = this.indexOf(this.currentTrack);
    this.commit();
    this.emit({ type: 'TRACKS_UPDATED', count: tracks.length, currentIndex: this.currentIndex });
  }

  getTracks(): readonly Track[] {
    return this.tracks;
  }

  /**
   * Bind `track` to the audio output. Loading the track that is already bound
   * does not rebind. On failure the prior track keeps playing and false is
   * returned.
   */
  async load(track: Track): Promise<boolean> {
    if (this.disposed) return false;
    const token = ++this.loadToken;
    if (this.handle && isSameTrack(this.currentTrack, track)) return true;

    if (!isResolvableLink(track.link)) {
      this.failLoad(track, `Invalid audio URL for track: ${track.title}`);
      return false;
    }

    let bound: AudioHandle | null = null;
    const events = this.createEvents(() => bound !== null && bound === this.handle);
    try {
      bound = await this.output.bind(track.link, events);
    } catch (err) {
      if (token === this.loadToken) this.failLoad(track, errorMessage(err));
      return false;
    }

    if (token !== this.loadToken || this.disposed) {
      this.output.release(bound);
      return false;
    }

    if (this.handle) this.output.release(this.handle);
    this.handle = bound;
    this.currentTrack = track;
    this.currentIndex = this.indexOf(track);
    this.position = 0;
    this.duration = 0;
    this.durationState = 'pending';
    this.pausedByInterruption = false;
    this.commit();
    this.emit({ type: 'TRACK_CHANGED', track, index: this.currentIndex });
    this.setStatus('loaded');
    this.resolveDuration(bound);
    return true;
  }

  private failLoad(track: Track, message: string): void {
    console.warn('[PlaybackSession] load failed:', message);
    this.emit({ type: 'LOAD_ERROR', track, message });
  }

  private resolveDuration(handle: AudioHandle): void {
    this.output.resolveDuration(handle).then(
      (seconds) => this.schedule(() => this.applyDuration(handle, seconds)),
      (err: unknown) =>
        this.schedule(() => {
          console.warn('[PlaybackSession] duration unavailable:', errorMessage(err));
          this.applyDuration(handle, 0);
        })
    );
  }

  private applyDuration(handle: AudioHandle, seconds: number): void {
    if (handle !== this.handle) return;
    this.duration = Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
    this.durationState = this.duration > 0 ? 'known' : 'unavailable';
    if (this.duration > 0) this.position = Math.min(this.position, this.duration);
    this.commit();
    this.emit({ type: 'POSITION', position: this.position, duration: this.duration });
    this.refreshDisplay();
  }

  async play(): Promise<boolean> {
    const handle = this.handle;
    if (!handle) return false;
    if (this.status === 'playing') return true;
    try {
      await this.output.play(handle);
    } catch (err) {
      console.warn('[PlaybackSession] play failed:', errorMessage(err));
      return false;
    }
    if (handle !== this.handle) return false;
    this.pausedByInterruption = false;
    this.setStatus('playing');
    return true;
  }

  async pause(): Promise<boolean> {
    const handle = this.handle;
    if (!handle || this.status !== 'playing') return false;
    try {
      await this.output.pause(handle);
    } catch (err) {
      console.warn('[PlaybackSession] pause failed:', errorMessage(err));
      return false;
    }
    if (handle !== this.handle) return false;
    if (this.status === 'playing') this.setStatus('paused');
    return true;
  }

  async togglePlayPause(): Promise<boolean> {
    return this.status === 'playing' ? this.pause() : this.play();
  }

  /** Load and start `track`. */
  async playTrack(track: Track): Promise<boolean> {
    const loaded = await this.load(track);
    if (!loaded) return false;
    return this.play();
  }

  async next(): Promise<boolean> {
    return this.step(1);
  }

  async previous(): Promise<boolean> {
    return this.step(-1);
  }

  /**
   * Move through the list with wraparound, then load and play. Steps taken
   * while a previous step is still loading count from that step's target.
   */
  private async step(delta: 1 | -1): Promise<boolean> {
    const count = this.tracks.length;
    if (count === 0 || this.disposed) return false;
    const pending = this.pendingStep;
    const from = pending && pending.loadToken === this.loadToken ? pending.index : this.currentIndex;
    const index = from < 0 ? (delta > 0 ? 0 : count - 1) : (from + delta + count) % count;
    const target = this.tracks[index];
    if (this.handle && isSameTrack(this.currentTrack, target)) {
      this.pendingStep = null;
      await this.seek(0);
      return this.playTrack(target);
    }
    // load takes its token synchronously
    const started = this.playTrack(target);
    const step = { index, loadToken: this.loadToken };
    this.pendingStep = step;
    try {
      return await started;
    } finally {
      if (this.pendingStep === step) this.pendingStep = null;
    }
  }

  /**
   * Clamp to [0, duration] and relocate. Only the lower bound applies while
   * the duration is still resolving. Ignored with nothing loaded.
   */
  async seek(seconds: number): Promise<boolean> {
    const handle = this.handle;
    if (!handle || !Number.isFinite(seconds)) return false;
    const upper = this.durationState === 'pending' ? Number.POSITIVE_INFINITY : this.duration;
    const target = Math.min(Math.max(0, seconds), upper);
    this.position = target;
    this.commit();
    this.emit({ type: 'POSITION', position: target, duration: this.duration });
    this.refreshDisplay();
    try {
      await this.output.seek(handle, target);
    } catch (err) {
      console.warn('[PlaybackSession] seek failed:', errorMessage(err));
    }
    return true;
  }

  private createEvents(isCurrent: () => boolean): AudioOutputEvents {
    const run = (task: () => void) =>
      this.schedule(() => {
        if (isCurrent()) task();
      });
    return {
      onTimeUpdate: (seconds) => run(() => this.applyPosition(seconds)),
      onEnded: () => run(() => this.handleEnded()),
      onInterruptionBegan: () => run(() => this.handleInterruptionBegan()),
      onInterruptionEnded: (shouldResume) => run(() => this.handleInterruptionEnded(shouldResume)),
      onError: (message) => run(() => this.handleStreamError(message)),
    };
  }

  private applyPosition(seconds: number): void {
    const clamped = Math.max(0, seconds);
    this.position = this.duration > 0 ? Math.min(clamped, this.duration) : clamped;
    this.commit();
    this.emit({ type: 'POSITION', position: this.position, duration: this.duration });
  }

  private handleEnded(): void {
    const track = this.currentTrack;
    if (!track) return;
    this.emit({ type: 'TRACK_ENDED', track });
    this.setStatus('paused');
    this.next().catch((err: unknown) => {
      console.error('[PlaybackSession] auto-advance failed:', errorMessage(err));
    });
  }

  private handleInterruptionBegan(): void {
    if (this.status !== 'playing') return;
    this.pausedByInterruption = true;
    this.pause().catch((err: unknown) => {
      console.error('[PlaybackSession] interruption pause failed:', errorMessage(err));
    });
  }

  private handleInterruptionEnded(shouldResume: boolean): void {
    const resume = shouldResume && this.pausedByInterruption && this.status === 'paused';
    this.pausedByInterruption = false;
    if (!resume) return;
    this.play().catch((err: unknown) => {
      console.error('[PlaybackSession] resume after interruption failed:', errorMessage(err));
    });
  }

  private handleStreamError(message: string): void {
    const track = this.currentTrack;
    if (!track) return;
    console.warn('[PlaybackSession] stream failed:', message);
    this.pausedByInterruption = false;
    this.emit({ type: 'LOAD_ERROR', track, message });
    if (this.status === 'playing') this.setStatus('paused');
  }

  /** Release the audio binding and drop every subscriber. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.loadToken++;
    if (this.handle) {
      this.output.release(this.handle);
      this.handle = null;
    }
    this.listeners.clear();
    this.display?.update(null);
  }
}
