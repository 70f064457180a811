export { AdaptiveStrategy, adaptiveScore } from "./adaptive.js";
export { FastestStrategy } from "./fastest.js";
export { LeastCostStrategy } from "./least-cost.js";
export { PriorityStrategy } from "./priority.js";
export { RoundRobinStrategy } from "./round-robin.js";
