import type { OrderingContext, OrderingStrategy, ProviderSpec } from "../types.js";

/**
 * Lowest average success latency first. Providers with no successes yet
 * average 0 and so come first.
 */
export class FastestStrategy implements OrderingStrategy {
  readonly name = "fastest";

  order(candidates: readonly ProviderSpec[], context: OrderingContext): readonly ProviderSpec[] {
    return candidates
      .map((spec) => ({ spec, latency: context.stats(spec.provider).averageLatencyMs }))
      .sort((a, b) => a.latency - b.latency)
      .map((entry) => entry.spec);
  }
}
