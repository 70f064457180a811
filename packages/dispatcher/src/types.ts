/**
 * Core types for @relaykit/dispatcher
 *
 * Multi-provider request dispatch with failover, per-provider health,
 * circuit breaking, rate-limit backoff, response caching and pluggable
 * ordering strategies.
 */

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

/** One candidate backend: a provider id plus the model to use on it */
export interface ProviderSpec {
  readonly provider: string;
  readonly model: string;
  /** Overrides the request's temperature when set */
  readonly temperature?: number;
  /** Overrides the request's maxTokens when set */
  readonly maxTokens?: number;
  /** How the credential is resolved (e.g. an env var name) */
  readonly credentialRef?: string;
}

// ---------------------------------------------------------------------------
// Request / Response
// ---------------------------------------------------------------------------

export interface DispatchRequest {
  /** Whoever is billed for the request */
  readonly callerId: string;
  readonly prompt: string;
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly systemMessage?: string;
  readonly context?: Readonly<Record<string, unknown>>;
  /** Per-attempt deadline */
  readonly timeoutMs?: number;
  /** Informational; echoed on the response */
  readonly retryCount?: number;
  /** Provider ids moved to the front by the priority strategy */
  readonly preferredProviders?: readonly string[];
  readonly excludedProviders?: ReadonlySet<string>;
}

/** A request with every default applied */
export interface ResolvedDispatchRequest {
  readonly callerId: string;
  readonly prompt: string;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly systemMessage: string | undefined;
  readonly context: Readonly<Record<string, unknown>>;
  readonly timeoutMs: number;
  readonly retryCount: number;
  readonly preferredProviders: readonly string[];
  readonly excludedProviders: ReadonlySet<string>;
}

export interface DispatchResponse {
  readonly content: string;
  readonly provider: string;
  readonly model: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly latencyMs: number;
  readonly cost: number;
  readonly requestId: string;
  /** Epoch milliseconds */
  readonly createdAt: number;
  readonly fallbackUsed: boolean;
  readonly retryCount: number;
}

// ---------------------------------------------------------------------------
// Provider-shaped request bodies
// ---------------------------------------------------------------------------

export interface ChatMessage {
  readonly role: "system" | "user";
  readonly content: string;
}

export interface ChatBody {
  readonly model: string;
  readonly messages: readonly ChatMessage[];
  readonly max_tokens: number;
  readonly temperature: number;
}

export interface AnthropicBody {
  readonly model: string;
  readonly messages: readonly ChatMessage[];
  readonly system?: string;
  readonly max_tokens: number;
  readonly temperature: number;
}

export interface GeminiBody {
  readonly model: string;
  readonly contents: readonly { readonly parts: readonly { readonly text: string }[] }[];
  readonly generationConfig: {
    readonly maxOutputTokens: number;
    readonly temperature: number;
  };
}

export interface GenericBody {
  readonly model: string;
  readonly prompt: string;
  readonly max_tokens: number;
  readonly temperature: number;
}

export type PreparedRequest =
  | { readonly format: "chat"; readonly body: ChatBody }
  | { readonly format: "anthropic"; readonly body: AnthropicBody }
  | { readonly format: "gemini"; readonly body: GeminiBody }
  | { readonly format: "generic"; readonly body: GenericBody };

export type RequestFormat = PreparedRequest["format"];

// ---------------------------------------------------------------------------
// Collaborators (injected)
// ---------------------------------------------------------------------------

export interface ProviderCallResult {
  readonly content: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
}

/**
 * Performs the outbound call. Must honour `signal`: the dispatcher aborts it
 * on deadline or caller cancellation.
 */
export type CallProvider = (
  spec: ProviderSpec,
  prepared: PreparedRequest,
  signal: AbortSignal,
) => Promise<ProviderCallResult>;

export interface CostEstimator {
  estimateCost(spec: ProviderSpec, inputTokens: number, outputTokens: number): number;
  /** Blended unit price used by cost-aware ordering; only compared, never billed */
  unitPrice(spec: ProviderSpec): number;
}

export type ValidateCredential = (spec: ProviderSpec) => boolean | Promise<boolean>;

/** Bounded by the request's timeout and the caller's signal. */
export type RecordSpend = (
  callerId: string,
  spec: ProviderSpec,
  inputTokens: number,
  outputTokens: number,
  description: string,
) => Promise<void>;

/** Aggregates for one provider, used to seed metrics at startup */
export interface HistoricalMetrics {
  readonly provider: string;
  readonly successCount: number;
  readonly failureCount: number;
  readonly averageLatencyMs: number;
  readonly totalTokens: number;
  readonly totalCost: number;
  readonly lastSuccessAt?: number;
  readonly lastFailureAt?: number;
}

export type LoadHistoricalMetrics = () => Promise<readonly HistoricalMetrics[]>;

// ---------------------------------------------------------------------------
// Failure classification
// ---------------------------------------------------------------------------

export type FailureKind =
  | "rate_limit"
  | "timeout"
  | "authentication"
  | "network_error"
  | "service_unavailable"
  | "invalid_response"
  | "api_error";

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export interface ProviderMetrics {
  successCount: number;
  failureCount: number;
  totalLatencyMs: number;
  totalTokens: number;
  totalCost: number;
  failureKinds: Partial<Record<FailureKind, number>>;
  lastSuccessAt: number | undefined;
  lastFailureAt: number | undefined;
  consecutiveFailures: number;
}

/** Read-only view handed to ordering strategies */
export interface ProviderStats {
  readonly successRate: number;
  readonly averageLatencyMs: number;
  readonly lastSuccessAt: number | undefined;
}

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

export type RoutingStrategyName = "priority" | "round-robin" | "least-cost" | "fastest" | "adaptive";

export interface OrderingContext {
  readonly request: ResolvedDispatchRequest;
  readonly stats: (provider: string) => ProviderStats;
  readonly costEstimator: CostEstimator;
  readonly now: number;
  readonly recentSuccessWindowMs: number;
}

/**
 * Pluggable ordering strategy. Returns a new array; never mutates the input.
 */
export interface OrderingStrategy {
  readonly name: string;
  order(candidates: readonly ProviderSpec[], context: OrderingContext): readonly ProviderSpec[];
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type AttemptEvent =
  | {
      readonly type: "success";
      readonly provider: string;
      readonly model: string;
      readonly latencyMs: number;
      readonly inputTokens: number;
      readonly outputTokens: number;
      readonly cost: number;
      readonly timestamp: number;
    }
  | {
      readonly type: "failure";
      readonly provider: string;
      readonly model: string;
      readonly latencyMs: number;
      readonly kind: FailureKind;
      readonly message: string;
      readonly timestamp: number;
    };

// ---------------------------------------------------------------------------
// Health report
// ---------------------------------------------------------------------------

export interface ProviderHealth {
  readonly healthy: boolean;
  readonly successRate: number;
  readonly averageLatencyMs: number;
  readonly totalRequests: number;
  readonly consecutiveFailures: number;
  readonly circuitOpen: boolean;
  readonly rateLimited: boolean;
  readonly failureKinds: Readonly<Partial<Record<FailureKind, number>>>;
}

export interface HealthReport {
  readonly providers: Readonly<Record<string, ProviderHealth>>;
  readonly summary: {
    readonly totalProviders: number;
    readonly healthyProviders: number;
    readonly circuitBreakersOpen: number;
    readonly rateLimited: number;
  };
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type CacheScope = "global" | "caller";

export interface DispatcherConfig {
  /** Consecutive failures that open a provider's circuit (default: 5) */
  readonly circuitBreakerThreshold?: number;
  /** How long an opened circuit stays open (default: 600_000) */
  readonly circuitBreakerTimeoutMs?: number;
  /** How long a rate-limited provider is skipped (default: 300_000) */
  readonly rateLimitBackoffMs?: number;
  /** Response cache lifetime; 0 disables caching (default: 300_000) */
  readonly cacheTtlMs?: number;
  readonly cacheMaxEntries?: number;
  /** "caller" keys cache entries by caller id as well (default: "global") */
  readonly cacheScope?: CacheScope;
  readonly unhealthyConsecutiveFailures?: number;
  readonly unhealthyWindowMs?: number;
  /** Window in which a success earns the adaptive bonus (default: 300_000) */
  readonly recentSuccessWindowMs?: number;
  readonly defaultStrategy?: RoutingStrategyName;
}

export type ResolvedDispatcherConfig = Required<DispatcherConfig>;

export interface DispatcherDeps {
  readonly callProvider: CallProvider;
  readonly costEstimator?: CostEstimator;
  readonly validateCredential?: ValidateCredential;
  readonly recordSpend?: RecordSpend;
  readonly loadHistoricalMetrics?: LoadHistoricalMetrics;
}
