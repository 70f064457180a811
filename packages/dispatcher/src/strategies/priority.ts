import type { OrderingContext, OrderingStrategy, ProviderSpec } from "../types.js";

/**
 * Caller order, with the request's preferred providers moved to the front.
 * Relative order within both groups is kept. This is the default strategy.
 */
export class PriorityStrategy implements OrderingStrategy {
  readonly name = "priority";

  order(candidates: readonly ProviderSpec[], context: OrderingContext): readonly ProviderSpec[] {
    const preferred = new Set(context.request.preferredProviders);
    if (preferred.size === 0) return [...candidates];

    return [
      ...candidates.filter((c) => preferred.has(c.provider)),
      ...candidates.filter((c) => !preferred.has(c.provider)),
    ];
  }
}
