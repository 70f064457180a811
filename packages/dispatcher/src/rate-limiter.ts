const DEFAULT_BACKOFF_MS = 300_000;

/**
 * Tracks providers that reported a rate limit and skips them for a fixed
 * backoff. Expired entries are deleted when read.
 */
export class RateLimiterRegistry {
  private readonly backoffMs: number;
  private readonly limitedAt: Map<string, number>;

  constructor(backoffMs: number = DEFAULT_BACKOFF_MS) {
    this.backoffMs = backoffMs;
    this.limitedAt = new Map();
  }

  isLimited(provider: string, now: number = Date.now()): boolean {
    const limitedAt = this.limitedAt.get(provider);
    if (limitedAt === undefined) return false;

    if (now - limitedAt < this.backoffMs) return true;

    this.limitedAt.delete(provider);
    return false;
  }

  /** Start (or restart) the backoff for a provider. */
  markLimited(provider: string, now: number = Date.now()): void {
    this.limitedAt.set(provider, now);
  }

  clear(provider: string): void {
    this.limitedAt.delete(provider);
  }

  limitedCount(now: number = Date.now()): number {
    let count = 0;
    for (const provider of [...this.limitedAt.keys()]) {
      if (this.isLimited(provider, now)) count++;
    }
    return count;
  }

  reset(): void {
    this.limitedAt.clear();
  }
}
