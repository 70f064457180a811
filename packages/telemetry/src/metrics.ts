/**
 * OTel metrics for dispatch operations.
 *
 * Lazily initialized — instruments are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "relaykit";

export type AttemptOutcome = "success" | "failure";

let _attempts: Counter | undefined;
let _latency: Histogram | undefined;
let _tokenUsage: Counter | undefined;
let _costTotal: Counter | undefined;
let _cacheAccess: Counter | undefined;

/**
 * Counter of provider attempts, by provider, outcome and failure kind.
 */
export function getDispatchAttempts(): Counter {
  if (_attempts === undefined) {
    _attempts = metrics.getMeter(METER_NAME).createCounter("relaykit.dispatch.attempts", {
      description: "Provider attempts made by the dispatcher",
    });
  }
  return _attempts;
}

/**
 * Histogram of provider attempt latency in milliseconds.
 */
export function getDispatchLatency(): Histogram {
  if (_latency === undefined) {
    _latency = metrics.getMeter(METER_NAME).createHistogram("relaykit.dispatch.latency_ms", {
      description: "Provider attempt latency in milliseconds",
      unit: "ms",
    });
  }
  return _latency;
}

export function getTokenUsage(): Counter {
  if (_tokenUsage === undefined) {
    _tokenUsage = metrics.getMeter(METER_NAME).createCounter("relaykit.tokens.total", {
      description: "Total tokens consumed",
    });
  }
  return _tokenUsage;
}

export function getCostTotal(): Counter {
  if (_costTotal === undefined) {
    _costTotal = metrics.getMeter(METER_NAME).createCounter("relaykit.cost.total", {
      description: "Total estimated provider cost",
      unit: "usd",
    });
  }
  return _costTotal;
}

export function getCacheAccess(): Counter {
  if (_cacheAccess === undefined) {
    _cacheAccess = metrics.getMeter(METER_NAME).createCounter("relaykit.cache.access", {
      description: "Response cache access count (hits and misses)",
    });
  }
  return _cacheAccess;
}

/**
 * Record one provider attempt. Success also feeds token and cost totals.
 */
export function recordAttempt(attempt: {
  readonly provider: string;
  readonly model: string;
  readonly outcome: AttemptOutcome;
  readonly latencyMs: number;
  readonly failureKind?: string;
  readonly tokens?: number;
  readonly cost?: number;
}): void {
  const attrs = {
    provider: attempt.provider,
    model: attempt.model,
    outcome: attempt.outcome,
    ...(attempt.failureKind !== undefined ? { failure_kind: attempt.failureKind } : {}),
  };
  getDispatchAttempts().add(1, attrs);
  getDispatchLatency().record(attempt.latencyMs, attrs);
  if (attempt.tokens !== undefined && attempt.tokens > 0) {
    getTokenUsage().add(attempt.tokens, { provider: attempt.provider, model: attempt.model });
  }
  if (attempt.cost !== undefined && attempt.cost > 0) {
    getCostTotal().add(attempt.cost, { provider: attempt.provider, model: attempt.model });
  }
}

/**
 * Record a response cache access (hit or miss).
 */
export function recordCacheAccess(hit: boolean): void {
  getCacheAccess().add(1, { result: hit ? "hit" : "miss" });
}
