import type { OrderingContext, OrderingStrategy, ProviderSpec } from "../types.js";

/**
 * Cheapest first, by the cost estimator's blended unit price.
 * Ties keep their input order.
 */
export class LeastCostStrategy implements OrderingStrategy {
  readonly name = "least-cost";

  order(candidates: readonly ProviderSpec[], context: OrderingContext): readonly ProviderSpec[] {
    return candidates
      .map((spec) => ({ spec, price: context.costEstimator.unitPrice(spec) }))
      .sort((a, b) => a.price - b.price)
      .map((entry) => entry.spec);
  }
}
