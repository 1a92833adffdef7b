export interface SlidingWindowHit {
  allowed: boolean;
  /** Calls counted in the window, including this one when allowed. */
  count: number;
  /** Timestamp of the oldest call still in the window; null when the window was empty. */
  oldestAtMs: number | null;
}

export interface RateLimitRepository {
  /** Counts a call under `key` unless the trailing window already holds `limit` calls. */
  hit(key: string, nowMs: number, windowMs: number, limit: number): Promise<SlidingWindowHit>;
  close(): Promise<void>;
}
