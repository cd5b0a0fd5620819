import { errorMessage } from './errors.js';
import type { Log } from './types.js';

export interface Refreshable {
  refresh(): Promise<void>;
}

/**
 * Refresh every handler in turn. A failing device is logged and skipped so
 * the others still get polled.
 * @returns the keys that failed
 */
export async function refreshAll(handlers: ReadonlyMap<string, Refreshable>, log: Pick<Log, 'error'>): Promise<string[]> {
  const failed: string[] = [];
  for (const [mac, handler] of handlers) {
    try {
      await handler.refresh();
    } catch (err) {
      log.error(`Polling ${mac} failed:`, errorMessage(err));
      failed.push(mac);
    }
  }
  return failed;
}

/**
 * Last value read, kept for `ttlMs`. Concurrent callers on a cold cache share
 * one load.
 */
export class StateCache<T> {
  private value: T | undefined;
  private loadedAt = 0;
  private inFlight: Promise<T> | undefined;

  constructor(
    private readonly load: () => Promise<T>,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(): Promise<T> {
    if (this.value !== undefined && this.now() - this.loadedAt < this.ttlMs) {
      return Promise.resolve(this.value);
    }
    if (!this.inFlight) {
      // cleared either way so a failed load is retried on the next call
      this.inFlight = this.load()
        .then((value) => {
          this.value = value;
          this.loadedAt = this.now();
          return value;
        })
        .finally(() => {
          this.inFlight = undefined;
        });
    }
    return this.inFlight;
  }

  /** The next get goes to the device */
  invalidate(): void {
    this.value = undefined;
  }
}
