/**
 * DebouncedSearch - holds the raw query text and a debounced copy that trails
 * it by a fixed delay. Only the latest submission inside a delay window is
 * ever realized; at most one timer is pending.
 */

export const SEARCH_DEBOUNCE_MS = 300;

export type DebouncedQueryListener = (query: string) => void;

export class DebouncedSearch {
  private raw = '';
  private debounced = '';
  private timer: ReturnType<typeof setTimeout> | null = null;
  private listeners: Set<DebouncedQueryListener> = new Set();

  constructor(private readonly delayMs: number = SEARCH_DEBOUNCE_MS) {}

  get rawQuery(): string {
    return this.raw;
  }

  get debouncedQuery(): string {
    return this.debounced;
  }

  get isPending(): boolean {
    return this.timer !== null;
  }

  /** Notified once per realized update. No replay of the current value. */
  subscribe(listener: DebouncedQueryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  submit(query: string): void {
    this.raw = query;
    this.cancel();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.debounced = query;
      for (const listener of this.listeners) {
        try {
          listener(query);
        } catch (e) {
          console.error('[DebouncedSearch] listener error:', e);
        }
      }
    }, this.delayMs);
  }

  /** Drop the pending update, if any. */
  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  dispose(): void {
    this.cancel();
    this.listeners.clear();
  }
}
