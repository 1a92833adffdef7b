import type { RateLimitRepository, SlidingWindowHit } from './rate-limit-repository.js';

export class InMemoryRateLimitRepository implements RateLimitRepository {
  private readonly logsByKey = new Map<string, number[]>();

  public hit(key: string, nowMs: number, windowMs: number, limit: number): Promise<SlidingWindowHit> {
    const log = (this.logsByKey.get(key) ?? []).filter((timestamp) => timestamp > nowMs - windowMs);

    if (log.length < limit) {
      log.push(nowMs);
      this.logsByKey.set(key, log);
      return Promise.resolve({ allowed: true, count: log.length, oldestAtMs: log[0] ?? null });
    }

    this.logsByKey.set(key, log);
    return Promise.resolve({ allowed: false, count: log.length, oldestAtMs: log[0] ?? null });
  }

  public close(): Promise<void> {
    this.logsByKey.clear();
    return Promise.resolve();
  }
}
