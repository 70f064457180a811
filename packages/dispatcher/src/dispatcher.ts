import { randomUUID } from "node:crypto";
import {
  AllProvidersUnavailableError,
  DispatchAbortedError,
  getErrorMessage,
  NoCandidatesAvailableError,
  TimeoutError,
} from "@relaykit/errors";
import { recordAttempt, recordCacheAccess, withSpan } from "@relaykit/telemetry";
import { CircuitBreakerRegistry } from "./circuit-breaker.js";
import { classifyFailure } from "./classify.js";
import { validateDispatcherConfig } from "./config.js";
import { alwaysValid } from "./credentials.js";
import { withDeadline } from "./deadline.js";
import { averageLatencyMs, ProviderMetricsStore, successRate } from "./metrics-store.js";
import { resolveStrategy } from "./ordering.js";
import { prepareRequest, resolveRequest } from "./prepare-request.js";
import { PricingTable } from "./pricing.js";
import { RateLimiterRegistry } from "./rate-limiter.js";
import { ResponseCache } from "./response-cache.js";
import type {
  AttemptEvent,
  CostEstimator,
  DispatcherConfig,
  DispatcherDeps,
  DispatchRequest,
  DispatchResponse,
  HealthReport,
  OrderingContext,
  OrderingStrategy,
  ProviderCallResult,
  ProviderHealth,
  ProviderSpec,
  ResolvedDispatchRequest,
  ResolvedDispatcherConfig,
  RoutingStrategyName,
} from "./types.js";

const LOG_TAG = "[dispatcher]";

const SPEND_DESCRIPTION = "LLM request";
const FALLBACK_SPEND_DESCRIPTION = "LLM request (fallback)";

/**
 * Multi-provider request dispatcher with resilience features:
 * - Sequential failover across an ordered candidate list
 * - Per-provider health tracking from success/failure history
 * - Circuit breaker after consecutive failures
 * - Fixed backoff for providers that report rate limits
 * - Short-lived response cache for identical requests
 * - Pluggable ordering strategies (priority, round-robin, least-cost,
 *   fastest, adaptive)
 * - Attempt events for usage and cost tracking
 *
 * One instance is meant to live for the whole process; its registries are
 * shared by every call.
 */
export class Dispatcher {
  readonly config: ResolvedDispatcherConfig;
  readonly metrics: ProviderMetricsStore;
  readonly circuitBreakers: CircuitBreakerRegistry;
  readonly rateLimiters: RateLimiterRegistry;
  readonly cache: ResponseCache;

  private readonly deps: DispatcherDeps;
  private readonly costEstimator: CostEstimator;
  private readonly attemptListeners: Set<(event: AttemptEvent) => void>;
  private initialized: boolean;

  /**
   * @throws ValidationError (DISPATCH_INVALID_CONFIG) for an invalid config
   */
  constructor(deps: DispatcherDeps, config?: DispatcherConfig) {
    this.config = validateDispatcherConfig(config);
    this.deps = deps;
    this.costEstimator = deps.costEstimator ?? new PricingTable();
    this.metrics = new ProviderMetricsStore({
      maxConsecutiveFailures: this.config.unhealthyConsecutiveFailures,
      failureWindowMs: this.config.unhealthyWindowMs,
    });
    this.circuitBreakers = new CircuitBreakerRegistry(this.config.circuitBreakerTimeoutMs);
    this.rateLimiters = new RateLimiterRegistry(this.config.rateLimitBackoffMs);
    this.cache = new ResponseCache({
      ttlMs: this.config.cacheTtlMs,
      maxEntries: this.config.cacheMaxEntries,
      scope: this.config.cacheScope,
    });
    this.attemptListeners = new Set();
    this.initialized = false;
  }

  /**
   * Seed provider metrics from stored history. Runs once; later calls are
   * no-ops. A failed load is logged and the dispatcher starts cold.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;

    const load = this.deps.loadHistoricalMetrics;
    if (!load) return;

    try {
      const history = await load();
      for (const row of history) {
        this.metrics.seed(row);
      }
    } catch (error) {
      console.warn(`${LOG_TAG} Failed to load historical metrics: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Execute a request against the first provider that answers.
   *
   * @throws NoCandidatesAvailableError when filtering leaves no candidate
   * @throws AllProvidersUnavailableError when every attempt failed
   * @throws DispatchAbortedError when `signal` aborts first
   * @throws ValidationError for an unknown strategy name
   */
  async execute(
    request: DispatchRequest,
    providers: readonly ProviderSpec[],
    strategy?: RoutingStrategyName | OrderingStrategy,
    signal?: AbortSignal,
  ): Promise<DispatchResponse> {
    const resolved = resolveRequest(request);
    const ordering = resolveStrategy(strategy ?? this.config.defaultStrategy);

    return withSpan(
      "relaykit.dispatch.execute",
      {
        "relaykit.caller_id": resolved.callerId,
        "relaykit.strategy": ordering.name,
        "relaykit.candidates": providers.length,
      },
      async (span) => {
        const cacheKey = this.cache.keyFor(resolved);
        if (this.cache.enabled) {
          const cached = this.cache.get(cacheKey);
          recordCacheAccess(cached !== undefined);
          if (cached) {
            span.setAttribute("relaykit.cache_hit", true);
            console.info(`${LOG_TAG} Cache hit for caller ${resolved.callerId}`);
            return cached;
          }
        }

        if (signal?.aborted) throw new DispatchAbortedError(signal.reason);

        const candidates = await this.filterCandidates(providers, resolved);
        if (candidates.length === 0) {
          throw new NoCandidatesAvailableError([...new Set(providers.map((p) => p.provider))]);
        }

        const ordered = ordering.order(candidates, this.orderingContext(resolved));
        const excluded = new Set(resolved.excludedProviders);
        const attempted: string[] = [];
        let lastError: unknown;

        for (const [index, spec] of ordered.entries()) {
          if (signal?.aborted) throw new DispatchAbortedError(signal.reason);
          if (!this.isAvailable(spec.provider, excluded)) continue;

          attempted.push(spec.provider);
          const startedAt = Date.now();
          let result: ProviderCallResult;
          let cost: number;
          try {
            const prepared = prepareRequest(resolved, spec);
            result = await withDeadline((s) => this.deps.callProvider(spec, prepared, s), {
              providerId: spec.provider,
              timeoutMs: resolved.timeoutMs,
              signal,
            });
            // A result that cannot be priced counts against the provider.
            cost = this.costEstimator.estimateCost(spec, result.inputTokens, result.outputTokens);
          } catch (error) {
            // An abandoned attempt says nothing about the provider.
            if (error instanceof DispatchAbortedError) throw error;
            lastError = error;
            this.handleFailure(spec, error, Date.now() - startedAt, excluded);
            continue;
          }

          const response = await this.handleSuccess(spec, resolved, result, {
            cost,
            latencyMs: Date.now() - startedAt,
            index,
            signal,
          });
          this.cache.set(cacheKey, response);
          span.setAttribute("relaykit.provider", response.provider);
          span.setAttribute("relaykit.fallback_used", response.fallbackUsed);
          return response;
        }

        throw new AllProvidersUnavailableError(attempted, lastError);
      },
    );
  }

  /**
   * Subscribe to per-attempt events. Returns a disposer function.
   */
  onAttempt(listener: (event: AttemptEvent) => void): () => void {
    this.attemptListeners.add(listener);
    return () => {
      this.attemptListeners.delete(listener);
    };
  }

  getHealthReport(now: number = Date.now()): HealthReport {
    const providers: Record<string, ProviderHealth> = {};
    let healthyProviders = 0;

    for (const provider of this.metrics.providers()) {
      const entry = this.metrics.get(provider);
      const healthy = this.metrics.isHealthy(provider, now);
      if (healthy) healthyProviders++;
      providers[provider] = {
        healthy,
        successRate: successRate(entry),
        averageLatencyMs: averageLatencyMs(entry),
        totalRequests: entry.successCount + entry.failureCount,
        consecutiveFailures: entry.consecutiveFailures,
        circuitOpen: this.circuitBreakers.isOpen(provider, now),
        rateLimited: this.rateLimiters.isLimited(provider, now),
        failureKinds: { ...entry.failureKinds },
      };
    }

    return {
      providers,
      summary: {
        totalProviders: Object.keys(providers).length,
        healthyProviders,
        circuitBreakersOpen: this.circuitBreakers.openCount(now),
        rateLimited: this.rateLimiters.limitedCount(now),
      },
    };
  }

  /**
   * Clear metrics, circuit and rate-limit state for one provider, or for
   * every provider when none is given.
   */
  resetProviderMetrics(provider?: string): void {
    this.metrics.reset(provider);
    if (provider === undefined) {
      this.circuitBreakers.reset();
      this.rateLimiters.reset();
    } else {
      this.circuitBreakers.close(provider);
      this.rateLimiters.clear(provider);
    }
    console.info(`${LOG_TAG} Reset metrics for ${provider ?? "all providers"}`);
  }

  private isAvailable(provider: string, excluded: ReadonlySet<string>): boolean {
    return (
      !excluded.has(provider) &&
      !this.circuitBreakers.isOpen(provider) &&
      !this.rateLimiters.isLimited(provider)
    );
  }

  private async filterCandidates(
    providers: readonly ProviderSpec[],
    request: ResolvedDispatchRequest,
  ): Promise<ProviderSpec[]> {
    const validate = this.deps.validateCredential ?? alwaysValid;
    const available: ProviderSpec[] = [];

    for (const spec of providers) {
      if (!this.isAvailable(spec.provider, request.excludedProviders)) continue;
      if (!this.metrics.isHealthy(spec.provider)) continue;

      let valid: boolean;
      try {
        valid = await validate(spec);
      } catch (error) {
        console.warn(
          `${LOG_TAG} Credential check failed for ${spec.provider}: ${getErrorMessage(error)}`,
        );
        valid = false;
      }
      if (valid) available.push(spec);
    }

    return available;
  }

  private orderingContext(request: ResolvedDispatchRequest): OrderingContext {
    return {
      request,
      stats: (provider) => this.metrics.stats(provider),
      costEstimator: this.costEstimator,
      now: Date.now(),
      recentSuccessWindowMs: this.config.recentSuccessWindowMs,
    };
  }

  /**
   * Bookkeeping for a successful attempt. The spend record shares the
   * request's deadline and the caller's signal; a caller abort while it is
   * pending rejects with DispatchAbortedError.
   */
  private async handleSuccess(
    spec: ProviderSpec,
    request: ResolvedDispatchRequest,
    result: ProviderCallResult,
    attempt: {
      readonly cost: number;
      readonly latencyMs: number;
      readonly index: number;
      readonly signal: AbortSignal | undefined;
    },
  ): Promise<DispatchResponse> {
    const { cost, latencyMs, index, signal } = attempt;
    const fallbackUsed = index > 0;
    const recordSpend = this.deps.recordSpend;

    if (recordSpend) {
      try {
        await withDeadline(
          () =>
            recordSpend(
              request.callerId,
              spec,
              result.inputTokens,
              result.outputTokens,
              fallbackUsed ? FALLBACK_SPEND_DESCRIPTION : SPEND_DESCRIPTION,
            ),
          {
            providerId: spec.provider,
            timeoutMs: request.timeoutMs,
            signal,
            onTimeout: () =>
              new TimeoutError(`Spend record timed out after ${request.timeoutMs}ms`),
          },
        );
      } catch (error) {
        if (error instanceof DispatchAbortedError) throw error;
        console.warn(
          `${LOG_TAG} Failed to record spend for caller ${request.callerId}: ${getErrorMessage(error)}`,
        );
      }
    }

    const tokens = result.inputTokens + result.outputTokens;
    const now = Date.now();
    this.metrics.recordSuccess(spec.provider, { latencyMs, tokens, cost }, now);
    recordAttempt({
      provider: spec.provider,
      model: spec.model,
      outcome: "success",
      latencyMs,
      tokens,
      cost,
    });
    this.emit({
      type: "success",
      provider: spec.provider,
      model: spec.model,
      latencyMs,
      inputTokens: result.inputTokens,
      outputTokens: result.outputTokens,
      cost,
      timestamp: now,
    });

    return {
      content: result.content,
      provider: spec.provider,
      model: spec.model,
      inputTokens: result.inputTokens,
      outputTokens: result.outputTokens,
      latencyMs,
      cost,
      requestId: randomUUID(),
      createdAt: now,
      fallbackUsed,
      retryCount: request.retryCount,
    };
  }

  private handleFailure(
    spec: ProviderSpec,
    error: unknown,
    latencyMs: number,
    excluded: Set<string>,
  ): void {
    const kind = classifyFailure(error);
    const message = getErrorMessage(error);
    const now = Date.now();

    console.warn(`${LOG_TAG} Provider ${spec.provider} failed (${kind}): ${message}`);

    const consecutive = this.metrics.recordFailure(spec.provider, kind, now);
    if (consecutive >= this.config.circuitBreakerThreshold) {
      this.circuitBreakers.open(spec.provider, now);
      console.warn(
        `${LOG_TAG} Circuit opened for ${spec.provider} after ${consecutive} consecutive failures`,
      );
    }

    if (kind === "rate_limit") {
      this.rateLimiters.markLimited(spec.provider, now);
      console.warn(`${LOG_TAG} Rate limit applied to ${spec.provider}`);
    }

    if (kind === "authentication") {
      excluded.add(spec.provider);
    }

    recordAttempt({
      provider: spec.provider,
      model: spec.model,
      outcome: "failure",
      latencyMs,
      failureKind: kind,
    });
    this.emit({
      type: "failure",
      provider: spec.provider,
      model: spec.model,
      latencyMs,
      kind,
      message,
      timestamp: now,
    });
  }

  private emit(event: AttemptEvent): void {
    for (const listener of this.attemptListeners) {
      try {
        listener(event);
      } catch (error) {
        console.warn(`${LOG_TAG} Attempt listener threw: ${getErrorMessage(error)}`);
      }
    }
  }
}
