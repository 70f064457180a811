import { ValidationError } from "@relaykit/errors";
import {
  AdaptiveStrategy,
  FastestStrategy,
  LeastCostStrategy,
  PriorityStrategy,
  RoundRobinStrategy,
} from "./strategies/index.js";
import type { OrderingStrategy, RoutingStrategyName } from "./types.js";

const BUILT_IN: Readonly<Record<RoutingStrategyName, OrderingStrategy>> = {
  priority: new PriorityStrategy(),
  "round-robin": new RoundRobinStrategy(),
  "least-cost": new LeastCostStrategy(),
  fastest: new FastestStrategy(),
  adaptive: new AdaptiveStrategy(),
};

export const ROUTING_STRATEGY_NAMES: readonly RoutingStrategyName[] = [
  "priority",
  "round-robin",
  "least-cost",
  "fastest",
  "adaptive",
];

export function isRoutingStrategyName(name: string): name is RoutingStrategyName {
  return Object.hasOwn(BUILT_IN, name);
}

/**
 * Resolve a strategy name or object. Built-in strategies are stateless and
 * shared.
 *
 * @throws ValidationError for an unknown name
 */
export function resolveStrategy(strategy: RoutingStrategyName | OrderingStrategy): OrderingStrategy {
  if (typeof strategy !== "string") return strategy;
  if (!isRoutingStrategyName(strategy)) {
    throw new ValidationError({
      code: "DISPATCH_INVALID_CONFIG",
      message: `Unknown routing strategy "${String(strategy)}"`,
      issues: [
        {
          field: "strategy",
          message: `Expected one of: ${ROUTING_STRATEGY_NAMES.join(", ")}`,
          code: "invalid_enum_value",
          value: strategy,
        },
      ],
    });
  }
  return BUILT_IN[strategy];
}
