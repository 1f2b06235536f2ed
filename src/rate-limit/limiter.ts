export interface RateWindow {
  /** Admission times in epoch ms, oldest first. */
  timestamps: number[];
}

export interface RateLimiterOptions {
  maxRequests?: number;
  windowSeconds?: number;
  now?: () => number;
}

export const DEFAULT_MAX_REQUESTS = 20;
export const DEFAULT_WINDOW_SECONDS = 60;

/**
 * Sliding-window request counter, one window per session id.
 *
 * Windows are created on first admission, pruned lazily, and dropped once
 * pruning empties them. `checkAndRecord` is
 * synchronous, so prune + append run as one step on the event loop and
 * concurrent handlers for the same session cannot interleave inside it.
 */
export class RateLimiter {
  private windows: Map<string, RateWindow> = new Map();
  readonly maxRequests: number;
  readonly windowMs: number;
  private now: () => number;

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? DEFAULT_MAX_REQUESTS;
    this.windowMs = (options.windowSeconds ?? DEFAULT_WINDOW_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  checkAndRecord(sessionId: string): boolean {
    const now = this.now();
    const window = this.prune(sessionId, now);

    if (window.timestamps.length >= this.maxRequests) {
      return false;
    }

    window.timestamps.push(now);
    this.windows.set(sessionId, window);
    return true;
  }

  remaining(sessionId: string): number {
    const window = this.prune(sessionId, this.now());
    return Math.max(0, this.maxRequests - window.timestamps.length);
  }

  /** Milliseconds until the next admission is possible; 0 when one is possible now. */
  retryAfterMs(sessionId: string): number {
    const now = this.now();
    const window = this.prune(sessionId, now);
    if (window.timestamps.length < this.maxRequests) return 0;

    const oldest = window.timestamps[0] ?? now;
    return Math.max(0, oldest + this.windowMs - now);
  }

  /** Sessions with at least one admission still inside the window. */
  get trackedSessions(): number {
    return this.windows.size;
  }

  reset(sessionId: string): void {
    this.windows.delete(sessionId);
  }

  private prune(sessionId: string, now: number): RateWindow {
    const window = this.windows.get(sessionId) ?? { timestamps: [] };

    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < window.timestamps.length && (window.timestamps[expired] ?? now) <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      window.timestamps.splice(0, expired);
    }
    if (window.timestamps.length === 0) {
      this.windows.delete(sessionId);
    }

    return window;
  }
}
