export const DEFAULT_FRAMES_PER_MINUTE = 120;
const WINDOW_MS = 60_000;

/**
 * Sliding one-minute window of accepted frames per connection, kept in memory.
 * A frame over the limit is refused and not counted.
 */
export class FrameRateLimiter {
  private readonly windows = new Map<string, number[]>();
  private readonly limit: number;
  private readonly now: () => number;

  constructor(opts: { framesPerMinute?: number; now?: () => number } = {}) {
    this.limit = opts.framesPerMinute ?? DEFAULT_FRAMES_PER_MINUTE;
    this.now = opts.now ?? Date.now;
  }

  take(connectionId: string): boolean {
    const now = this.now();
    const cutoff = now - WINDOW_MS;
    const recent = (this.windows.get(connectionId) ?? []).filter((ts) => ts > cutoff);
    if (recent.length >= this.limit) {
      this.windows.set(connectionId, recent);
      return false;
    }
    recent.push(now);
    this.windows.set(connectionId, recent);
    return true;
  }

  /** Seconds until the oldest counted frame leaves the window. */
  retryAfterSeconds(connectionId: string): number {
    const oldest = this.windows.get(connectionId)?.[0];
    if (oldest === undefined) return 0;
    return Math.max(1, Math.ceil((oldest + WINDOW_MS - this.now()) / 1000));
  }

  forget(connectionId: string) {
    this.windows.delete(connectionId);
  }
}
