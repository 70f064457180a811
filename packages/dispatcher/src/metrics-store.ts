import type { FailureKind, HistoricalMetrics, ProviderMetrics, ProviderStats } from "./types.js";

export interface HealthPolicy {
  /** Consecutive failures at which a provider is unhealthy */
  readonly maxConsecutiveFailures: number;
  /** How long an unanswered failure keeps a provider unhealthy */
  readonly failureWindowMs: number;
}

const DEFAULT_POLICY: HealthPolicy = {
  maxConsecutiveFailures: 3,
  failureWindowMs: 300_000,
};

function emptyMetrics(): ProviderMetrics {
  return {
    successCount: 0,
    failureCount: 0,
    totalLatencyMs: 0,
    totalTokens: 0,
    totalCost: 0,
    failureKinds: {},
    lastSuccessAt: undefined,
    lastFailureAt: undefined,
    consecutiveFailures: 0,
  };
}

export function successRate(metrics: ProviderMetrics): number {
  const total = metrics.successCount + metrics.failureCount;
  return total === 0 ? 0 : metrics.successCount / total;
}

export function averageLatencyMs(metrics: ProviderMetrics): number {
  return metrics.successCount === 0 ? 0 : metrics.totalLatencyMs / metrics.successCount;
}

/**
 * Per-provider counters and the health predicate derived from them.
 *
 * Entries are created on first touch and live for the process lifetime.
 * A failure with no success on record does not make a provider unhealthy
 * on its own; only the consecutive-failure limit does.
 */
export class ProviderMetricsStore {
  private readonly policy: HealthPolicy;
  private readonly metrics: Map<string, ProviderMetrics>;

  constructor(policy?: Partial<HealthPolicy>) {
    this.policy = { ...DEFAULT_POLICY, ...policy };
    this.metrics = new Map();
  }

  /** Mutable entry for a provider, created if absent. */
  get(provider: string): ProviderMetrics {
    let entry = this.metrics.get(provider);
    if (!entry) {
      entry = emptyMetrics();
      this.metrics.set(provider, entry);
    }
    return entry;
  }

  has(provider: string): boolean {
    return this.metrics.has(provider);
  }

  providers(): readonly string[] {
    return [...this.metrics.keys()];
  }

  recordSuccess(
    provider: string,
    result: { readonly latencyMs: number; readonly tokens: number; readonly cost: number },
    now: number = Date.now(),
  ): void {
    const entry = this.get(provider);
    entry.successCount++;
    entry.totalLatencyMs += result.latencyMs;
    entry.totalTokens += result.tokens;
    entry.totalCost += result.cost;
    entry.lastSuccessAt = now;
    entry.consecutiveFailures = 0;
  }

  /**
   * Record a failed attempt.
   * @returns the provider's consecutive failure count after this failure
   */
  recordFailure(provider: string, kind: FailureKind, now: number = Date.now()): number {
    const entry = this.get(provider);
    entry.failureCount++;
    entry.failureKinds[kind] = (entry.failureKinds[kind] ?? 0) + 1;
    entry.lastFailureAt = now;
    entry.consecutiveFailures++;
    return entry.consecutiveFailures;
  }

  isHealthy(provider: string, now: number = Date.now()): boolean {
    const entry = this.metrics.get(provider);
    if (!entry) return true;

    if (entry.consecutiveFailures >= this.policy.maxConsecutiveFailures) return false;

    const { lastFailureAt, lastSuccessAt } = entry;
    if (
      lastFailureAt !== undefined &&
      lastSuccessAt !== undefined &&
      lastFailureAt > lastSuccessAt &&
      now - lastFailureAt < this.policy.failureWindowMs
    ) {
      return false;
    }

    return true;
  }

  stats(provider: string): ProviderStats {
    const entry = this.metrics.get(provider);
    if (!entry) {
      return { successRate: 0, averageLatencyMs: 0, lastSuccessAt: undefined };
    }
    return {
      successRate: successRate(entry),
      averageLatencyMs: averageLatencyMs(entry),
      lastSuccessAt: entry.lastSuccessAt,
    };
  }

  /**
   * Overwrite a provider's counters from stored aggregates. The consecutive
   * failure count is not persisted and starts at zero.
   */
  seed(history: HistoricalMetrics): void {
    const entry = emptyMetrics();
    entry.successCount = history.successCount;
    entry.failureCount = history.failureCount;
    entry.totalLatencyMs = history.averageLatencyMs * history.successCount;
    entry.totalTokens = history.totalTokens;
    entry.totalCost = history.totalCost;
    entry.lastSuccessAt = history.lastSuccessAt;
    entry.lastFailureAt = history.lastFailureAt;
    this.metrics.set(history.provider, entry);
  }

  reset(provider?: string): void {
    if (provider === undefined) {
      this.metrics.clear();
    } else {
      this.metrics.delete(provider);
    }
  }
}
