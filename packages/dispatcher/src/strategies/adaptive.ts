import type { OrderingContext, OrderingStrategy, ProviderSpec } from "../types.js";

const SUCCESS_WEIGHT = 0.4;
const LATENCY_WEIGHT = 0.3;
const COST_WEIGHT = 0.3;
const RECENT_SUCCESS_BOOST = 1.2;

/**
 * Score a candidate from its reliability, speed and price.
 *
 * `0.4·successRate + 0.3/(1 + latencySeconds) + 0.3/(1 + unitPrice)`,
 * multiplied by 1.2 when the provider succeeded within the recent window.
 */
export function adaptiveScore(spec: ProviderSpec, context: OrderingContext): number {
  const stats = context.stats(spec.provider);
  const latencySeconds = stats.averageLatencyMs / 1000;
  const unitPrice = context.costEstimator.unitPrice(spec);

  const score =
    SUCCESS_WEIGHT * stats.successRate +
    LATENCY_WEIGHT * (1 / (1 + latencySeconds)) +
    COST_WEIGHT * (1 / (1 + unitPrice));

  const recent =
    stats.lastSuccessAt !== undefined &&
    context.now - stats.lastSuccessAt < context.recentSuccessWindowMs;

  return recent ? score * RECENT_SUCCESS_BOOST : score;
}

/**
 * Highest {@link adaptiveScore} first. Ties keep their input order.
 */
export class AdaptiveStrategy implements OrderingStrategy {
  readonly name = "adaptive";

  order(candidates: readonly ProviderSpec[], context: OrderingContext): readonly ProviderSpec[] {
    return candidates
      .map((spec) => ({ spec, score: adaptiveScore(spec, context) }))
      .sort((a, b) => b.score - a.score)
      .map((entry) => entry.spec);
  }
}
