import type { OrderingContext, OrderingStrategy, ProviderSpec } from "../types.js";

/**
 * Rotate the candidate list by one: the first candidate goes last.
 * Stateless, so repeated calls with the same list give the same order.
 */
export class RoundRobinStrategy implements OrderingStrategy {
  readonly name = "round-robin";

  order(candidates: readonly ProviderSpec[], _context: OrderingContext): readonly ProviderSpec[] {
    return [...candidates.slice(1), ...candidates.slice(0, 1)];
  }
}
