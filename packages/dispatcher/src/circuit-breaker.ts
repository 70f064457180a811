const DEFAULT_TIMEOUT_MS = 600_000;

/**
 * Per-provider circuit breaker with two states:
 * - closed: no entry, requests flow
 * - open: rejecting requests until `timeoutMs` has passed since opening
 *
 * Lazy cleanup: expired entries are deleted when read.
 */
export class CircuitBreakerRegistry {
  private readonly timeoutMs: number;
  private readonly openedAt: Map<string, number>;

  constructor(timeoutMs: number = DEFAULT_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
    this.openedAt = new Map();
  }

  /**
   * Check whether a provider's circuit is open.
   * Closes (deletes) the entry once the timeout has elapsed.
   */
  isOpen(provider: string, now: number = Date.now()): boolean {
    const openedAt = this.openedAt.get(provider);
    if (openedAt === undefined) return false;

    if (now - openedAt < this.timeoutMs) return true;

    this.openedAt.delete(provider);
    return false;
  }

  /** Open (or re-open) a provider's circuit. */
  open(provider: string, now: number = Date.now()): void {
    this.openedAt.set(provider, now);
  }

  close(provider: string): void {
    this.openedAt.delete(provider);
  }

  /** Number of circuits currently open. */
  openCount(now: number = Date.now()): number {
    let count = 0;
    for (const provider of [...this.openedAt.keys()]) {
      if (this.isOpen(provider, now)) count++;
    }
    return count;
  }

  reset(): void {
    this.openedAt.clear();
  }
}
