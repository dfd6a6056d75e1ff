/**
 * Audio output backed by an HTML audio element per bound track.
 * The element streams from the track link; binding resolves once metadata
 * has loaded and rejects on a media error.
 * Pause and play the element raises without a request from this output
 * (audio focus taken by a call or another tab, hardware media keys) are
 * reported as interruptions.
 */
import type { AudioHandle, AudioOutputEvents, AudioOutputPort } from './types';

/** The parts of HTMLAudioElement this output uses. */
export interface AudioElementLike {
  src: string;
  currentTime: number;
  readonly duration: number;
  readonly paused: boolean;
  readonly ended: boolean;
  readonly error: { message: string } | null;
  play(): Promise<void>;
  pause(): void;
  load(): void;
  removeAttribute(name: string): void;
  addEventListener(type: string, listener: () => void): void;
  removeEventListener(type: string, listener: () => void): void;
}

interface HtmlAudioHandle extends AudioHandle {
  readonly element: AudioElementLike;
  readonly detach: () => void;
  /** Set while a play/pause this output issued has not raised its event yet */
  expected: { play: boolean; pause: boolean };
}

export function createHtmlAudioOutput(
  createElement: () => AudioElementLike = () => new Audio()
): AudioOutputPort {
  const handles = new Map<AudioHandle, HtmlAudioHandle>();

  function lookup(handle: AudioHandle): HtmlAudioHandle {
    const entry = handles.get(handle);
    if (!entry) throw new Error(`Audio handle for ${handle.link} is not bound`);
    return entry;
  }

  function waitForDuration(element: AudioElementLike): Promise<number> {
    if (Number.isFinite(element.duration) && element.duration > 0) {
      return Promise.resolve(element.duration);
    }
    return new Promise((resolve, reject) => {
      const onChange = () => {
        if (!Number.isFinite(element.duration) || element.duration <= 0) return;
        cleanup();
        resolve(element.duration);
      };
      const onError = () => {
        cleanup();
        reject(new Error(element.error?.message ?? 'Duration unavailable'));
      };
      const cleanup = () => {
        element.removeEventListener('durationchange', onChange);
        element.removeEventListener('error', onError);
      };
      element.addEventListener('durationchange', onChange);
      element.addEventListener('error', onError);
    });
  }

  return {
    bind(link: string, events: AudioOutputEvents): Promise<AudioHandle> {
      const element = createElement();
      const expected = { play: false, pause: false };
      const onTimeUpdate = () => events.onTimeUpdate(element.currentTime);
      const onEnded = () => events.onEnded();
      const onPause = () => {
        if (expected.pause) {
          expected.pause = false;
          return;
        }
        // the element also pauses on reaching the end; 'ended' follows
        if (element.ended) return;
        events.onInterruptionBegan();
      };
      const onPlay = () => {
        if (expected.play) {
          expected.play = false;
          return;
        }
        events.onInterruptionEnded(true);
      };
      const onStreamError = () => events.onError(element.error?.message ?? `Stream failed: ${link}`);
      const attached: [string, () => void][] = [
        ['timeupdate', onTimeUpdate],
        ['ended', onEnded],
        ['pause', onPause],
        ['play', onPlay],
        ['error', onStreamError],
      ];
      const detach = () => {
        attached.forEach(([type, listener]) => element.removeEventListener(type, listener));
      };

      return new Promise<AudioHandle>((resolve, reject) => {
        const onLoaded = () => {
          settle();
          attached.forEach(([type, listener]) => element.addEventListener(type, listener));
          const handle: HtmlAudioHandle = { link, element, detach, expected };
          handles.set(handle, handle);
          resolve(handle);
        };
        const onError = () => {
          settle();
          reject(new Error(element.error?.message ?? `Cannot load audio: ${link}`));
        };
        const settle = () => {
          element.removeEventListener('loadedmetadata', onLoaded);
          element.removeEventListener('error', onError);
        };
        element.addEventListener('loadedmetadata', onLoaded);
        element.addEventListener('error', onError);
        element.src = link;
      });
    },

    release(handle) {
      const entry = handles.get(handle);
      if (!entry) return;
      handles.delete(handle);
      entry.detach();
      entry.element.pause();
      entry.element.removeAttribute('src');
      entry.element.load();
    },

    async play(handle) {
      const entry = lookup(handle);
      if (entry.element.paused) entry.expected.play = true;
      try {
        await entry.element.play();
      } catch (err) {
        entry.expected.play = false;
        throw err;
      }
    },

    async pause(handle) {
      const entry = lookup(handle);
      if (!entry.element.paused) entry.expected.pause = true;
      entry.element.pause();
    },

    async seek(handle, seconds) {
      lookup(handle).element.currentTime = seconds;
    },

    resolveDuration(handle) {
      const entry = handles.get(handle);
      if (!entry) return Promise.reject(new Error(`Audio handle for ${handle.link} is not bound`));
      return waitForDuration(entry.element);
    },
  };
}
