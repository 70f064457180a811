/**
 * @relaykit/dispatcher — resilient multi-provider LLM request dispatch.
 */

export { CircuitBreakerRegistry } from "./circuit-breaker.js";
export { classifyFailure, classifyMessage, FAILURE_PATTERNS } from "./classify.js";
export {
  configFromEnv,
  MAX_TIMEOUT_MS,
  validateDispatcherConfig,
  validateDispatchRequest,
} from "./config.js";
export { alwaysValid, envCredentialValidator } from "./credentials.js";
export { type DeadlineOptions, withDeadline } from "./deadline.js";
export { Dispatcher } from "./dispatcher.js";
export {
  averageLatencyMs,
  type HealthPolicy,
  ProviderMetricsStore,
  successRate,
} from "./metrics-store.js";
export { isRoutingStrategyName, ROUTING_STRATEGY_NAMES, resolveStrategy } from "./ordering.js";
export {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
  prepareRequest,
  requestFormatFor,
  resolveRequest,
} from "./prepare-request.js";
export { DEFAULT_MODEL_PRICING, type ModelPricing, PricingTable } from "./pricing.js";
export { RateLimiterRegistry } from "./rate-limiter.js";
export { fingerprint, ResponseCache, type ResponseCacheOptions } from "./response-cache.js";
export {
  AdaptiveStrategy,
  adaptiveScore,
  FastestStrategy,
  LeastCostStrategy,
  PriorityStrategy,
  RoundRobinStrategy,
} from "./strategies/index.js";
export type {
  AnthropicBody,
  AttemptEvent,
  CacheScope,
  CallProvider,
  ChatBody,
  ChatMessage,
  CostEstimator,
  DispatcherConfig,
  DispatcherDeps,
  DispatchRequest,
  DispatchResponse,
  FailureKind,
  GeminiBody,
  GenericBody,
  HealthReport,
  HistoricalMetrics,
  LoadHistoricalMetrics,
  OrderingContext,
  OrderingStrategy,
  PreparedRequest,
  ProviderCallResult,
  ProviderHealth,
  ProviderMetrics,
  ProviderSpec,
  ProviderStats,
  RecordSpend,
  RequestFormat,
  ResolvedDispatchRequest,
  ResolvedDispatcherConfig,
  RoutingStrategyName,
  ValidateCredential,
} from "./types.js";

// Re-export the dispatch errors callers catch
export {
  AllProvidersUnavailableError,
  DispatchAbortedError,
  isAllProvidersUnavailable,
  NoCandidatesAvailableError,
  ProviderError,
  ProviderTimeoutError,
} from "@relaykit/errors";
