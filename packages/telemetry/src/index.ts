/**
 * @relaykit/telemetry — OpenTelemetry tracing and metrics for the dispatcher.
 *
 * Public API:
 * - setupTelemetry() / shutdownTelemetry() — SDK lifecycle
 * - isTelemetryEnabled() — check OTEL_ENABLED env var
 * - withSpan() — DRY span creation helper
 * - recordAttempt() / recordCacheAccess() — dispatch metrics
 */

export { context, type Span, SpanStatusCode, trace } from "@opentelemetry/api";
export {
  type AttemptOutcome,
  getCacheAccess,
  getCostTotal,
  getDispatchAttempts,
  getDispatchLatency,
  getTokenUsage,
  recordAttempt,
  recordCacheAccess,
} from "./metrics.js";
export {
  isTelemetryEnabled,
  resolveTelemetryConfig,
  setupTelemetry,
  shutdownTelemetry,
} from "./setup.js";
export { withSpan } from "./span-helpers.js";
export type { SpanAttributes, SpanAttributeValue, TelemetryConfig } from "./types.js";
